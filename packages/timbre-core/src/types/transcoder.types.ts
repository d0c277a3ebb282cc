import type { OutputFormat } from '../schemas';

export type LossyFormat = Exclude<OutputFormat, 'wav'>;

export type ProbeResult = {
  sampleRate: number;
  channels: number;
};

/**
 * External codec for containers not handled in process
 */
export interface AudioTranscoder {
  /** Encode mono float samples into a lossy container */
  encode(samples: Float32Array, sampleRate: number, format: LossyFormat): Promise<Buffer>;
  /** Decode any supported container to mono float samples at `sampleRate` */
  decode(bytes: Buffer, sampleRate: number): Promise<Float32Array>;
  /** Native stream properties of an encoded input */
  probe(bytes: Buffer): Promise<ProbeResult>;
}
