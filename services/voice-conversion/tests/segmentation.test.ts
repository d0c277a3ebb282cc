import { describe, it, expect } from 'vitest';
import { createAudioAsset, createSilence, createTone, createToneWithGaps } from '@timbre/test-utils';
import { Segmenter } from '../src/segmentation/segmenter';
import { findSilenceRegions, regionMidpoint } from '../src/segmentation/silence-detector';
import { concatFloat32 } from '../src/audio/dsp';

const SAMPLE_RATE = 1000;

// 50 Hz at 1 kHz: every 20 ms frame holds exactly one period
const TONE = { frequency: 50, amplitude: 0.5 };

const segmenter = new Segmenter({
  maxChunkSec: 10,
  silenceThresholdDb: -40,
  minSilenceSec: 0.3,
  frameMs: 20,
  searchWindowSec: 3
});

function bounds(chunks: Array<{ startSample: number; endSample: number }>): Array<[number, number]> {
  return chunks.map(chunk => [chunk.startSample, chunk.endSample]);
}

describe('findSilenceRegions', () => {
  it('should find quiet runs at frame resolution', () => {
    const samples = createToneWithGaps(5, SAMPLE_RATE, [[1, 1.6], [3, 3.1]], TONE);

    const regions = findSilenceRegions(samples, {
      thresholdDb: -40,
      frameSamples: 20,
      minSilenceSamples: 300
    });

    // The 100 ms gap is below the minimum length
    expect(regions).toEqual([{ start: 1000, end: 1600 }]);
    expect(regionMidpoint(regions[0])).toBe(1300);
  });

  it('should close a run that reaches the end', () => {
    const samples = concatFloat32([createTone(1, SAMPLE_RATE, TONE), createSilence(0.5, SAMPLE_RATE)]);

    expect(findSilenceRegions(samples, {
      thresholdDb: -40,
      frameSamples: 20,
      minSilenceSamples: 300
    })).toEqual([{ start: 1000, end: 1500 }]);
  });
});

describe('Segmenter', () => {
  it('should return one chunk when the source fits', () => {
    const asset = createAudioAsset({ samples: createTone(10, SAMPLE_RATE, TONE), sampleRate: SAMPLE_RATE });

    const chunks = segmenter.segment(asset);

    expect(chunks).toHaveLength(1);
    expect(bounds(chunks)).toEqual([[0, 10000]]);
    expect(Array.from(chunks[0].samples)).toEqual(Array.from(asset.samples));
  });

  it('should cut at the midpoint of the latest silence before each boundary', () => {
    const samples = createToneWithGaps(25, SAMPLE_RATE, [[8, 8.6], [17, 17.4]], TONE);
    const asset = createAudioAsset({ samples, sampleRate: SAMPLE_RATE });

    const chunks = segmenter.segment(asset);

    expect(bounds(chunks)).toEqual([[0, 8300], [8300, 17200], [17200, 25000]]);
    expect(chunks.map(chunk => chunk.index)).toEqual([0, 1, 2]);
  });

  it('should hard-cut at the boundary without silence', () => {
    const asset = createAudioAsset({ samples: createTone(25, SAMPLE_RATE, TONE), sampleRate: SAMPLE_RATE });

    expect(bounds(segmenter.segment(asset))).toEqual([[0, 10000], [10000, 20000], [20000, 25000]]);
  });

  it('should ignore silence outside the search window', () => {
    const samples = createToneWithGaps(25, SAMPLE_RATE, [[2, 2.6]], TONE);
    const asset = createAudioAsset({ samples, sampleRate: SAMPLE_RATE });

    expect(bounds(segmenter.segment(asset))).toEqual([[0, 10000], [10000, 20000], [20000, 25000]]);
  });

  it('should produce contiguous chunks that cover the source', () => {
    const samples = createToneWithGaps(
      47,
      SAMPLE_RATE,
      [[4, 4.5], [9.2, 9.8], [21, 22], [30, 30.4], [38.5, 39]],
      TONE
    );
    const asset = createAudioAsset({ samples, sampleRate: SAMPLE_RATE });

    const chunks = segmenter.segment(asset);

    expect(chunks[0].startSample).toBe(0);
    expect(chunks[chunks.length - 1].endSample).toBe(samples.length);
    for (let i = 1; i < chunks.length; i++) {
      expect(chunks[i].startSample).toBe(chunks[i - 1].endSample);
    }
    for (const chunk of chunks) {
      expect(chunk.samples.length).toBe(chunk.endSample - chunk.startSample);
      expect(chunk.samples.length).toBeLessThanOrEqual(10000);
      expect(chunk.samples.length).toBeGreaterThan(0);
    }

    const rejoined = concatFloat32(chunks.map(chunk => chunk.samples));
    expect(rejoined.length).toBe(samples.length);
    expect(Array.from(rejoined)).toEqual(Array.from(samples));
  });

  it('should copy chunk samples', () => {
    const asset = createAudioAsset({ samples: createTone(12, SAMPLE_RATE, TONE), sampleRate: SAMPLE_RATE });

    const chunks = segmenter.segment(asset);
    chunks[0].samples[0] = 0.9;

    expect(asset.samples[0]).toBe(0);
  });

  it('should never exceed a shorter span reported by the engine', () => {
    const asset = createAudioAsset({ samples: createTone(10, SAMPLE_RATE, TONE), sampleRate: SAMPLE_RATE });

    expect(bounds(segmenter.segment(asset, 4))).toEqual([[0, 4000], [4000, 8000], [8000, 10000]]);
    // A longer engine span does not raise the configured one
    expect(bounds(segmenter.segment(asset, 20))).toEqual([[0, 10000]]);
  });

  it('should reject a non-positive chunk length', () => {
    expect(() => new Segmenter({
      maxChunkSec: 0,
      silenceThresholdDb: -40,
      minSilenceSec: 0.3,
      frameMs: 20,
      searchWindowSec: 3
    })).toThrow('maxChunkSec must be positive');
  });
});
