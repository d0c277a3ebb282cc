import type { AudioProvenance, ContainerFormat } from '../schemas';

/**
 * Decoded mono waveform at the canonical rate
 */
export type AudioAsset = {
  samples: Float32Array;
  sampleRate: number;
  durationSec: number;
  channels: 1;
  provenance: AudioProvenance;
  format: ContainerFormat;
  byteSize: number;
  originalSampleRate: number;
  originalChannels: number;
  label?: string; // file name or path, for logs
};

/**
 * Contiguous slice of a source waveform
 */
export type AudioChunk = {
  index: number;
  startSample: number;
  endSample: number; // exclusive
  samples: Float32Array;
};
