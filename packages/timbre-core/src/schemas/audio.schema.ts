import { z } from 'zod';

/**
 * Output container enum - one lossless tag, two lossy tags
 */
export const outputFormatEnum = z.enum([
  'wav',
  'mp3',
  'ogg'
]);

export type OutputFormat = z.infer<typeof outputFormatEnum>;

/**
 * Input container enum - what the resolver recognizes by magic bytes
 */
export const containerFormatEnum = z.enum([
  'wav',
  'mp3',
  'ogg',
  'flac'
]);

export type ContainerFormat = z.infer<typeof containerFormatEnum>;

/**
 * Where an audio asset came from
 */
export const audioProvenanceEnum = z.enum([
  'path',
  'inline',
  'upload'
]);

export type AudioProvenance = z.infer<typeof audioProvenanceEnum>;

/**
 * Per-input metadata reported back to the caller
 */
export const audioInfoSchema = z.object({
  duration: z.number().nonnegative().describe('Duration in seconds'),
  sample_rate: z.number().int().positive().describe('Native sample rate of the input'),
  channels: z.literal(1).describe('Channel count after down-mix'),
  file_size: z.number().int().nonnegative().describe('Encoded input size in bytes'),
  file_format: containerFormatEnum.describe('Detected container')
});

export type AudioInfo = z.infer<typeof audioInfoSchema>;
