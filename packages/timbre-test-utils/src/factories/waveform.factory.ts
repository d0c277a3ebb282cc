import { faker } from '@faker-js/faker';
import type { AudioAsset, AudioProvenance, ContainerFormat } from '@timbre/core';

export interface ToneOptions {
  frequency?: number;
  amplitude?: number;
}

/**
 * Sine tone of `durationSec` seconds
 */
export function createTone(durationSec: number, sampleRate: number, options: ToneOptions = {}): Float32Array {
  const frequency = options.frequency ?? 220;
  const amplitude = options.amplitude ?? 0.5;
  const length = Math.round(durationSec * sampleRate);
  const samples = new Float32Array(length);

  for (let i = 0; i < length; i++) {
    samples[i] = amplitude * Math.sin((2 * Math.PI * frequency * i) / sampleRate);
  }
  return samples;
}

export function createSilence(durationSec: number, sampleRate: number): Float32Array {
  return new Float32Array(Math.round(durationSec * sampleRate));
}

/**
 * Tone with silent stretches at the given [startSec, endSec) ranges
 */
export function createToneWithGaps(
  durationSec: number,
  sampleRate: number,
  gaps: Array<[number, number]>,
  options: ToneOptions = {}
): Float32Array {
  const samples = createTone(durationSec, sampleRate, options);

  for (const [startSec, endSec] of gaps) {
    const start = Math.max(0, Math.round(startSec * sampleRate));
    const end = Math.min(samples.length, Math.round(endSec * sampleRate));
    samples.fill(0, start, end);
  }
  return samples;
}

/**
 * Low-level noise, handy where exact values do not matter
 */
export function createNoise(durationSec: number, sampleRate: number, amplitude = 0.3): Float32Array {
  const length = Math.round(durationSec * sampleRate);
  const samples = new Float32Array(length);

  for (let i = 0; i < length; i++) {
    samples[i] = faker.number.float({ min: -amplitude, max: amplitude });
  }
  return samples;
}

export interface AudioAssetFactoryOptions {
  samples?: Float32Array;
  durationSec?: number;
  sampleRate?: number;
  provenance?: AudioProvenance;
  format?: ContainerFormat;
  originalSampleRate?: number;
  originalChannels?: number;
  label?: string;
}

export function createAudioAsset(options: AudioAssetFactoryOptions = {}): AudioAsset {
  const sampleRate = options.sampleRate ?? 16000;
  const samples = options.samples ?? createTone(options.durationSec ?? 2, sampleRate, {
    frequency: faker.number.int({ min: 110, max: 880 })
  });

  return {
    samples,
    sampleRate,
    durationSec: samples.length / sampleRate,
    channels: 1,
    provenance: options.provenance ?? faker.helpers.arrayElement<AudioProvenance>(['path', 'inline', 'upload']),
    format: options.format ?? 'wav',
    byteSize: samples.length * 4,
    originalSampleRate: options.originalSampleRate ?? sampleRate,
    originalChannels: options.originalChannels ?? 1,
    label: options.label ?? `${faker.word.noun()}.wav`
  };
}
