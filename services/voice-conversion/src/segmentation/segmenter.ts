import {
  createLogger,
  ValidationError,
  type AudioAsset,
  type AudioChunk
} from '@timbre/core';
import { findSilenceRegions, regionMidpoint } from './silence-detector';

const logger = createLogger('segmenter');

export interface SegmenterConfig {
  maxChunkSec: number;
  silenceThresholdDb: number;
  minSilenceSec: number;
  frameMs: number;
  searchWindowSec: number;
}

/**
 * Silence-aware splitter.
 * Cuts a source longer than `maxChunkSec` into contiguous chunks, preferring
 * the silence closest below each chunk boundary.
 */
export class Segmenter {
  private config: SegmenterConfig;

  constructor(config: SegmenterConfig) {
    if (config.maxChunkSec <= 0) {
      throw new ValidationError('maxChunkSec must be positive', { maxChunkSec: config.maxChunkSec });
    }
    if (config.frameMs <= 0) {
      throw new ValidationError('frameMs must be positive', { frameMs: config.frameMs });
    }

    this.config = config;
  }

  /**
   * Split an asset into model-sized chunks. `engineMaxChunkSec` lowers the
   * configured span when the engine accepts less.
   */
  segment(asset: AudioAsset, engineMaxChunkSec?: number): AudioChunk[] {
    const { samples, sampleRate } = asset;
    const maxChunkSec = Math.min(this.config.maxChunkSec, engineMaxChunkSec ?? Infinity);
    const maxChunk = Math.max(1, Math.floor(maxChunkSec * sampleRate));

    if (samples.length <= maxChunk) {
      return [createChunk(samples, 0, 0, samples.length)];
    }

    const { cuts, hardCuts } = this.findCutPoints(samples, sampleRate, maxChunk);

    const chunks: AudioChunk[] = [];
    let start = 0;
    for (const cut of cuts) {
      chunks.push(createChunk(samples, chunks.length, start, cut));
      start = cut;
    }
    // Trailing remainder is kept however short it is
    chunks.push(createChunk(samples, chunks.length, start, samples.length));

    logger.info({
      durationSec: Number(asset.durationSec.toFixed(2)),
      maxChunkSec,
      chunks: chunks.length,
      hardCuts
    }, 'Source segmented');

    return chunks;
  }

  /**
   * Cut positions in ascending order; each cut is at most `maxChunk` after the previous one
   */
  private findCutPoints(
    samples: Float32Array,
    sampleRate: number,
    maxChunk: number
  ): { cuts: number[]; hardCuts: number } {
    const frameSamples = Math.max(1, Math.round(this.config.frameMs / 1000 * sampleRate));
    const window = Math.max(0, Math.floor(this.config.searchWindowSec * sampleRate));

    const candidates = findSilenceRegions(samples, {
      thresholdDb: this.config.silenceThresholdDb,
      frameSamples,
      minSilenceSamples: Math.max(1, Math.round(this.config.minSilenceSec * sampleRate))
    }).map(regionMidpoint);

    logger.debug({ candidates: candidates.length }, 'Silence candidates found');

    const cuts: number[] = [];
    let hardCuts = 0;
    let start = 0;
    let next = 0; // first candidate index not yet behind `start`

    while (samples.length - start > maxChunk) {
      const boundary = start + maxChunk;

      while (next < candidates.length && candidates[next] <= start) {
        next++;
      }

      // Latest candidate not past the boundary
      let chosen = -1;
      for (let i = next; i < candidates.length && candidates[i] <= boundary; i++) {
        chosen = candidates[i];
      }

      if (chosen >= 0 && chosen >= boundary - window) {
        cuts.push(chosen);
        start = chosen;
      } else {
        // No silence within reach: never exceed the engine span
        cuts.push(boundary);
        hardCuts++;
        start = boundary;
      }
    }

    return { cuts, hardCuts };
  }
}

function createChunk(samples: Float32Array, index: number, start: number, end: number): AudioChunk {
  return {
    index,
    startSample: start,
    endSample: end,
    samples: samples.slice(start, end)
  };
}
