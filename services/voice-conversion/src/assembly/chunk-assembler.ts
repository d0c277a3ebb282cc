import { concatFloat32 } from '../audio/dsp';

/**
 * Incremental reassembly of converted chunks.
 *
 * Everything except the last `crossfadeSamples` of audio is committed and
 * never rewritten; the uncommitted tail is blended with the head of the next
 * chunk using constant-power (quarter-sine) gains.
 */
export class ChunkAssembler {
  private readonly crossfadeSamples: number;
  private committed: Float32Array[] = [];
  private committedLength = 0;
  private tail: Float32Array = new Float32Array(0);
  private chunkCount = 0;

  constructor(crossfadeSamples: number) {
    this.crossfadeSamples = Math.max(0, Math.floor(crossfadeSamples));
  }

  /** Samples available in the streaming artifact */
  get length(): number {
    return this.committedLength + this.tail.length;
  }

  /**
   * Append the next converted chunk (in index order)
   */
  append(converted: Float32Array): void {
    let incoming: Float32Array;

    if (this.chunkCount === 0) {
      incoming = converted;
    } else {
      const fade = Math.min(this.crossfadeSamples, this.tail.length, converted.length);
      const keep = this.tail.length - fade;

      if (keep > 0) {
        this.commit(this.tail.subarray(0, keep));
      }

      const blended = new Float32Array(converted.length);
      for (let i = 0; i < fade; i++) {
        const t = (i + 0.5) / fade;
        const fadeOut = Math.cos(t * Math.PI / 2);
        const fadeIn = Math.sin(t * Math.PI / 2);
        blended[i] = this.tail[keep + i] * fadeOut + converted[i] * fadeIn;
      }
      blended.set(converted.subarray(fade), fade);
      incoming = blended;
    }

    const tailLength = Math.min(this.crossfadeSamples, incoming.length);
    const split = incoming.length - tailLength;

    if (split > 0) {
      this.commit(incoming.subarray(0, split));
    }
    this.tail = incoming.slice(split);
    this.chunkCount++;
  }

  /**
   * Streaming artifact: all completed chunks, cross-faded
   */
  snapshot(): Float32Array {
    return concatFloat32([...this.committed, this.tail]);
  }

  /**
   * Drop everything appended so far
   */
  reset(): void {
    this.committed = [];
    this.committedLength = 0;
    this.tail = new Float32Array(0);
    this.chunkCount = 0;
  }

  private commit(samples: Float32Array): void {
    // Copy: callers may reuse their buffers
    this.committed.push(samples.slice());
    this.committedLength += samples.length;
  }
}

/**
 * Full artifact from an ordered list of converted chunks
 */
export function assembleChunks(chunks: readonly Float32Array[], crossfadeSamples: number): Float32Array {
  const assembler = new ChunkAssembler(crossfadeSamples);
  for (const chunk of chunks) {
    assembler.append(chunk);
  }
  return assembler.snapshot();
}
