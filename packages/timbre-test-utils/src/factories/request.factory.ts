import { faker } from '@faker-js/faker';
import type { OutputFormat } from '@timbre/core';

export interface ConversionRequestFactoryOptions {
  request_id?: string;
  source_audio_path?: string;
  source_audio_base64?: string;
  target_audio_path?: string;
  target_audio_base64?: string;
  output_format?: OutputFormat;
  return_base64?: boolean;
  cleanup_temp_files?: boolean;
  diffusion_steps?: number;
  length_adjust?: number;
}

/**
 * JSON body for POST /convert; generation controls are randomized within range
 */
export function createConversionRequest(options: ConversionRequestFactoryOptions = {}): Record<string, unknown> {
  return {
    diffusion_steps: faker.number.int({ min: 10, max: 50 }),
    intelligibility_cfg_rate: faker.number.float({ min: 0, max: 1, precision: 0.01 }),
    similarity_cfg_rate: faker.number.float({ min: 0, max: 1, precision: 0.01 }),
    top_p: faker.number.float({ min: 0.5, max: 1, precision: 0.01 }),
    temperature: faker.number.float({ min: 0.5, max: 1.5, precision: 0.01 }),
    length_adjust: 1.0,
    output_format: 'wav',
    return_base64: false,
    cleanup_temp_files: true,
    ...options
  };
}
