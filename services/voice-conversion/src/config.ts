import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import {
  CROSSFADE_HOPS,
  DEFAULT_MAX_CONCURRENT_JOBS,
  ENGINE_HOP_SIZE,
  ENGINE_MAX_CHUNK_SEC,
  ENGINE_SAMPLE_RATE,
  engineAccessModeEnum,
  outputFormatEnum,
  parseOrThrow,
  REFERENCE_MAX_SEC,
  SEGMENT_SEARCH_WINDOW_SEC,
  SILENCE_FRAME_MS,
  SILENCE_MIN_DURATION_SEC,
  SILENCE_THRESHOLD_DB,
  SOURCE_HARD_MAX_SEC,
  SOURCE_RECOMMENDED_MAX_SEC,
  type EngineAccessMode,
  type OutputFormat
} from '@timbre/core';

/**
 * Environment variables read by the service
 */
const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),

  ENGINE_URL: z.string().url().default('http://localhost:9000'),
  ENGINE_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  ENGINE_LOAD_RETRY_SEC: z.coerce.number().nonnegative().default(15),

  SAMPLE_RATE: z.coerce.number().int().positive().default(ENGINE_SAMPLE_RATE),
  ENGINE_HOP_SIZE: z.coerce.number().int().positive().default(ENGINE_HOP_SIZE),
  MAX_CHUNK_SEC: z.coerce.number().positive().default(ENGINE_MAX_CHUNK_SEC),
  CROSSFADE_HOPS: z.coerce.number().int().nonnegative().default(CROSSFADE_HOPS),

  SILENCE_THRESHOLD_DB: z.coerce.number().max(0).default(SILENCE_THRESHOLD_DB),
  MIN_SILENCE_SEC: z.coerce.number().positive().default(SILENCE_MIN_DURATION_SEC),
  SILENCE_FRAME_MS: z.coerce.number().positive().default(SILENCE_FRAME_MS),
  SEARCH_WINDOW_SEC: z.coerce.number().nonnegative().default(SEGMENT_SEARCH_WINDOW_SEC),

  MAX_CONCURRENT_JOBS: z.coerce.number().int().min(1).default(DEFAULT_MAX_CONCURRENT_JOBS),
  ENGINE_ACCESS_MODE: engineAccessModeEnum.default('parallel'),

  MAX_SOURCE_DURATION_SEC: z.coerce.number().positive().default(SOURCE_HARD_MAX_SEC),
  MAX_REFERENCE_DURATION_SEC: z.coerce.number().positive().default(REFERENCE_MAX_SEC),
  RECOMMENDED_SOURCE_DURATION_SEC: z.coerce.number().positive().default(SOURCE_RECOMMENDED_MAX_SEC),

  STREAMING_FORMAT: outputFormatEnum.default('mp3'),
  OUTPUT_DIR: z.string().min(1).optional(),
  MAX_OUTPUT_SIZE_MB: z.coerce.number().positive().default(2048),

  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),

  MAX_UPLOAD_MB: z.coerce.number().positive().default(100),
  CORS_ORIGINS: z.string().default('*')
});

export interface ServiceConfig {
  port: number;
  host: string;
  engine: {
    url: string;
    timeoutMs: number;
    loadRetrySec: number;
  };
  audio: {
    sampleRate: number;
    hopSize: number;
  };
  segmentation: {
    maxChunkSec: number;
    silenceThresholdDb: number;
    minSilenceSec: number;
    frameMs: number;
    searchWindowSec: number;
  };
  crossfadeSamples: number;
  scheduler: {
    maxConcurrentJobs: number;
    accessMode: EngineAccessMode;
  };
  limits: {
    maxSourceSec: number;
    recommendedSourceSec: number;
    maxReferenceSec: number;
    maxUploadBytes: number;
  };
  output: {
    streamingFormat: OutputFormat;
    directory: string;
    maxSizeBytes: number;
  };
  ffmpegPath: string;
  ffprobePath: string;
  corsOrigins: string[] | '*';
}

/**
 * Build the service configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  // Blank values fall back to defaults
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = parseOrThrow(envSchema, present, 'configuration');

  if (parsed.RECOMMENDED_SOURCE_DURATION_SEC > parsed.MAX_SOURCE_DURATION_SEC) {
    parsed.RECOMMENDED_SOURCE_DURATION_SEC = parsed.MAX_SOURCE_DURATION_SEC;
  }

  const origins = parsed.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean);

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    engine: {
      url: parsed.ENGINE_URL,
      timeoutMs: parsed.ENGINE_TIMEOUT_MS,
      loadRetrySec: parsed.ENGINE_LOAD_RETRY_SEC
    },
    audio: {
      sampleRate: parsed.SAMPLE_RATE,
      hopSize: parsed.ENGINE_HOP_SIZE
    },
    segmentation: {
      maxChunkSec: parsed.MAX_CHUNK_SEC,
      silenceThresholdDb: parsed.SILENCE_THRESHOLD_DB,
      minSilenceSec: parsed.MIN_SILENCE_SEC,
      frameMs: parsed.SILENCE_FRAME_MS,
      searchWindowSec: parsed.SEARCH_WINDOW_SEC
    },
    crossfadeSamples: parsed.CROSSFADE_HOPS * parsed.ENGINE_HOP_SIZE,
    scheduler: {
      maxConcurrentJobs: parsed.MAX_CONCURRENT_JOBS,
      accessMode: parsed.ENGINE_ACCESS_MODE
    },
    limits: {
      maxSourceSec: parsed.MAX_SOURCE_DURATION_SEC,
      recommendedSourceSec: parsed.RECOMMENDED_SOURCE_DURATION_SEC,
      maxReferenceSec: parsed.MAX_REFERENCE_DURATION_SEC,
      maxUploadBytes: Math.round(parsed.MAX_UPLOAD_MB * 1024 * 1024)
    },
    output: {
      streamingFormat: parsed.STREAMING_FORMAT,
      directory: path.resolve(parsed.OUTPUT_DIR ?? path.join(os.tmpdir(), 'timbre-outputs')),
      maxSizeBytes: Math.round(parsed.MAX_OUTPUT_SIZE_MB * 1024 * 1024)
    },
    ffmpegPath: parsed.FFMPEG_PATH,
    ffprobePath: parsed.FFPROBE_PATH,
    corsOrigins: origins.length === 0 || origins.includes('*') ? '*' : origins
  };
}
