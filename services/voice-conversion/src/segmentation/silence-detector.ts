import { rmsDb } from '../audio/dsp';

export interface SilenceDetectorConfig {
  thresholdDb: number;
  frameSamples: number;
  minSilenceSamples: number;
}

/**
 * Low-energy span of a waveform, [start, end) in samples
 */
export interface SilenceRegion {
  start: number;
  end: number;
}

/**
 * Find runs of consecutive quiet frames at least `minSilenceSamples` long
 */
export function findSilenceRegions(samples: Float32Array, config: SilenceDetectorConfig): SilenceRegion[] {
  const { thresholdDb, frameSamples, minSilenceSamples } = config;
  const regions: SilenceRegion[] = [];

  let runStart = -1;

  for (let frameStart = 0; frameStart < samples.length; frameStart += frameSamples) {
    const frameEnd = Math.min(frameStart + frameSamples, samples.length);
    const quiet = rmsDb(samples, frameStart, frameEnd) < thresholdDb;

    if (quiet && runStart < 0) {
      runStart = frameStart;
    } else if (!quiet && runStart >= 0) {
      pushRegion(regions, runStart, frameStart, minSilenceSamples);
      runStart = -1;
    }
  }

  if (runStart >= 0) {
    pushRegion(regions, runStart, samples.length, minSilenceSamples);
  }

  return regions;
}

function pushRegion(regions: SilenceRegion[], start: number, end: number, minLength: number): void {
  if (end - start >= minLength) {
    regions.push({ start, end });
  }
}

/**
 * Cut point inside a silent region
 */
export function regionMidpoint(region: SilenceRegion): number {
  return Math.floor((region.start + region.end) / 2);
}
