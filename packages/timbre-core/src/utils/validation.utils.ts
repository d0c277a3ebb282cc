import type { z } from 'zod';
import { ValidationError } from '../errors';
import {
  conversionParametersSchema,
  conversionRequestSchema,
  outputFormatEnum,
  type ConversionParameters,
  type ConversionRequestBody,
  type OutputFormat
} from '../schemas';
import type { EngineParameters } from '../types';

/**
 * Render zod issues as `field: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'request';
    return `${field}: ${issue.message}`;
  });
}

/**
 * Parse a value with a schema, rejecting with ValidationError
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  what: string
): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, { issues });
  }

  return result.data;
}

/**
 * Build conversion parameters, enforcing ranges and defaults
 */
export function createConversionParameters(input: unknown = {}): ConversionParameters {
  return parseOrThrow(conversionParametersSchema, input, 'conversion parameters');
}

/**
 * Parse a full conversion request body
 */
export function parseConversionRequest(input: unknown): ConversionRequestBody {
  return parseOrThrow(conversionRequestSchema, input ?? {}, 'conversion request');
}

/**
 * Validate an output container tag
 */
export function parseOutputFormat(tag: unknown): OutputFormat {
  const result = outputFormatEnum.safeParse(tag);

  if (!result.success) {
    throw new ValidationError(
      `Invalid output format: ${String(tag)}. Must be one of: ${outputFormatEnum.options.join(', ')}`,
      { tag }
    );
  }

  return result.data;
}

/**
 * Extract the generation controls the engine consumes
 */
export function toEngineParameters(parameters: ConversionParameters): EngineParameters {
  return {
    diffusion_steps: parameters.diffusion_steps,
    length_adjust: parameters.length_adjust,
    intelligibility_cfg_rate: parameters.intelligibility_cfg_rate,
    similarity_cfg_rate: parameters.similarity_cfg_rate,
    top_p: parameters.top_p,
    temperature: parameters.temperature,
    repetition_penalty: parameters.repetition_penalty,
    convert_style: parameters.convert_style,
    anonymization_only: parameters.anonymization_only
  };
}
