import { describe, it, expect } from 'vitest';
import { ChunkAssembler, assembleChunks } from '../src/assembly/chunk-assembler';

function ones(length: number): Float32Array {
  return new Float32Array(length).fill(1);
}

describe('ChunkAssembler', () => {
  it('should pass a single chunk through unchanged', () => {
    const chunk = Float32Array.from([0.1, 0.2, 0.3, 0.4, 0.5, 0.6]);

    expect(Array.from(assembleChunks([chunk], 4))).toEqual(Array.from(chunk));
  });

  it('should overlap neighbours by the crossfade length', () => {
    const assembled = assembleChunks([ones(10), ones(10)], 4);

    expect(assembled).toHaveLength(16);
    for (let i = 0; i < 6; i++) {
      expect(assembled[i]).toBe(1);
    }
    for (let i = 10; i < 16; i++) {
      expect(assembled[i]).toBe(1);
    }
  });

  it('should blend with constant-power gains', () => {
    const assembled = assembleChunks([ones(10), ones(10)], 4);

    for (let i = 0; i < 4; i++) {
      const t = (i + 0.5) / 4;
      const expected = Math.cos(t * Math.PI / 2) + Math.sin(t * Math.PI / 2);
      expect(assembled[6 + i]).toBeCloseTo(expected, 6);
      expect(assembled[6 + i]).toBeGreaterThan(1);
      expect(assembled[6 + i]).toBeLessThanOrEqual(Math.SQRT2 + 1e-6);
    }
  });

  it('should fade out the tail and fade in the head', () => {
    const assembled = assembleChunks([ones(8), new Float32Array(8)], 4);

    // Zeros coming in: only the cosine fade-out of the tail remains
    expect(assembled[4]).toBeCloseTo(Math.cos(0.125 * Math.PI / 2), 6);
    expect(assembled[7]).toBeCloseTo(Math.cos(0.875 * Math.PI / 2), 6);
    expect(assembled[8]).toBe(0);
  });

  it('should shorten the fade for short chunks', () => {
    const assembled = assembleChunks([ones(10), ones(2), ones(10)], 4);

    // fades of 2 and 2
    expect(assembled).toHaveLength(22 - 4);
  });

  it('should concatenate without a crossfade', () => {
    const assembled = assembleChunks([Float32Array.from([1, 2]), Float32Array.from([3, 4])], 0);

    expect(Array.from(assembled)).toEqual([1, 2, 3, 4]);
  });

  it('should never rewrite committed samples', () => {
    const assembler = new ChunkAssembler(4);
    assembler.append(Float32Array.from([0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8]));

    const before = assembler.snapshot();
    assembler.append(new Float32Array(8).fill(-0.25));
    const after = assembler.snapshot();

    // Only the last crossfade-length tail of the first chunk is blended
    expect(Array.from(after.subarray(0, 4))).toEqual(Array.from(before.subarray(0, 4)));
    expect(after[4]).not.toBe(before[4]);
    expect(after).toHaveLength(12);
    expect(assembler.length).toBe(12);
  });

  it('should not alias caller buffers', () => {
    const first = ones(10);
    const assembler = new ChunkAssembler(2);
    assembler.append(first);
    first.fill(0);

    expect(assembler.snapshot()[0]).toBe(1);
  });

  it('should start over after reset', () => {
    const assembler = new ChunkAssembler(4);
    assembler.append(ones(10));
    assembler.reset();

    expect(assembler.length).toBe(0);
    expect(assembler.snapshot()).toHaveLength(0);

    // The next append is treated as a first chunk again
    assembler.append(ones(3));
    expect(Array.from(assembler.snapshot())).toEqual([1, 1, 1]);
  });
});
