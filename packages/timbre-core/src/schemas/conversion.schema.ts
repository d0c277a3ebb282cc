import { z } from 'zod';
import { outputFormatEnum } from './audio.schema';

/**
 * Boolean field that also accepts multipart form strings
 */
const formBoolean = z.preprocess((value) => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  }
  return value;
}, z.boolean());

/**
 * Number field that also accepts numeric form strings; other types are rejected
 */
function formNumber<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => {
    if (typeof value === 'string' && value.trim() !== '') {
      return Number(value);
    }
    return value;
  }, schema);
}

/**
 * Optional string field; empty form values count as absent
 */
const optionalText = z.preprocess(
  (value) => (value === '' || value === null ? undefined : value),
  z.string().min(1).optional()
);

/**
 * Conversion parameters - generation controls and output options
 */
export const conversionParametersSchema = z.object({
  // Model parameters
  diffusion_steps: formNumber(z.number().int().min(1).max(200)).default(30).describe('Number of diffusion steps'),
  length_adjust: formNumber(z.number().min(0.5).max(2.0)).default(1.0).describe('Length adjustment factor'),

  // Control parameters
  intelligibility_cfg_rate: formNumber(z.number().min(0.0).max(1.0)).default(0.5).describe('CFG rate for intelligibility'),
  similarity_cfg_rate: formNumber(z.number().min(0.0).max(1.0)).default(0.5).describe('CFG rate for similarity'),
  top_p: formNumber(z.number().min(0.1).max(1.0)).default(0.9).describe('Nucleus sampling top-p'),
  temperature: formNumber(z.number().min(0.1).max(2.0)).default(1.0).describe('Sampling temperature'),
  repetition_penalty: formNumber(z.number().min(1.0).max(3.0)).default(1.0).describe('Repetition penalty'),

  // Processing options
  convert_style: formBoolean.default(false).describe('Enable style conversion'),
  anonymization_only: formBoolean.default(false).describe('Anonymization only mode'),

  // Output
  output_format: outputFormatEnum.default('wav').describe('Full output container'),
  return_base64: formBoolean.default(false).describe('Return outputs as base64 text'),
  cleanup_temp_files: formBoolean.default(true).describe('Remove temp artifacts once they are not needed')
});

export type ConversionParameters = z.infer<typeof conversionParametersSchema>;

/**
 * Conversion request body - audio slots plus parameters.
 * Slot exclusivity is checked by the resolver, not here.
 */
export const conversionRequestSchema = conversionParametersSchema.extend({
  request_id: z.string().uuid().optional().describe('Caller-chosen job id for progress polling'),

  source_audio_path: optionalText.describe('Path to source audio'),
  source_audio_base64: optionalText.describe('Base64 encoded source audio'),
  target_audio_path: optionalText.describe('Path to reference audio'),
  target_audio_base64: optionalText.describe('Base64 encoded reference audio')
});

export type ConversionRequestBody = z.infer<typeof conversionRequestSchema>;
