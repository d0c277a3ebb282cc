import { z } from 'zod';
import { audioInfoSchema, outputFormatEnum } from './audio.schema';

/**
 * Conversion response - success and failure share one shape
 */
export const conversionResponseSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  job_id: z.string().uuid().nullable(),

  // Output data
  streaming_output_path: z.string().nullable(),
  full_output_path: z.string().nullable(),
  streaming_output_base64: z.string().nullable(),
  full_output_base64: z.string().nullable(),
  streaming_output_format: outputFormatEnum.nullable(),
  output_format: z.string(),

  // Metadata
  processing_time: z.number().nonnegative().describe('Seconds from acceptance to response'),
  chunk_count: z.number().int().nonnegative().nullable(),
  input_info: z.object({
    source: audioInfoSchema,
    target: audioInfoSchema
  }).nullable(),

  error: z.object({
    kind: z.string(),
    code: z.string()
  }).nullable()
});

export type ConversionResponse = z.infer<typeof conversionResponseSchema>;

/**
 * Job state enum
 */
export const jobStateEnum = z.enum([
  'queued',
  'running',
  'completed',
  'failed',
  'cancelled'
]);

export type JobState = z.infer<typeof jobStateEnum>;

/**
 * Progress of an in-flight job
 */
export const jobProgressSchema = z.object({
  job_id: z.string().uuid(),
  state: jobStateEnum,
  completed_chunks: z.number().int().nonnegative(),
  total_chunks: z.number().int().nonnegative(),
  streaming_duration: z.number().nonnegative().describe('Seconds of converted audio available so far')
});

export type JobProgress = z.infer<typeof jobProgressSchema>;
