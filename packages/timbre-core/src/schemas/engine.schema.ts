import { z } from 'zod';

/**
 * Engine access mode across admitted jobs
 */
export const engineAccessModeEnum = z.enum([
  'parallel',
  'serialized'
]);

export type EngineAccessMode = z.infer<typeof engineAccessModeEnum>;

/**
 * Inference server health payload
 */
export const engineHealthSchema = z.object({
  status: z.string(),
  models_loaded: z.boolean(),
  device: z.string().nullable().optional(),
  max_chunk_sec: z.number().positive().nullable().optional()
});

export type EngineHealth = z.infer<typeof engineHealthSchema>;

/**
 * Reference conditioning handle returned by the inference server
 */
export const engineReferenceResponseSchema = z.object({
  conditioning_id: z.string().min(1),
  duration_sec: z.number().nonnegative().optional()
});

export type EngineReferenceResponse = z.infer<typeof engineReferenceResponseSchema>;

/**
 * Converted chunk payload - base64 little-endian float32 samples
 */
export const engineConvertResponseSchema = z.object({
  audio: z.string(),
  sample_rate: z.number().int().positive()
});

export type EngineConvertResponse = z.infer<typeof engineConvertResponseSchema>;
