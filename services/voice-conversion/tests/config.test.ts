import { describe, it, expect } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import { ValidationError } from '@timbre/core';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8000);
    expect(config.engine).toEqual({ url: 'http://localhost:9000', timeoutMs: 120000, loadRetrySec: 15 });
    expect(config.audio).toEqual({ sampleRate: 22050, hopSize: 256 });
    expect(config.crossfadeSamples).toBe(1024);
    expect(config.segmentation.maxChunkSec).toBe(30);
    expect(config.scheduler).toEqual({ maxConcurrentJobs: 1, accessMode: 'parallel' });
    expect(config.limits).toEqual({
      maxSourceSec: 600,
      recommendedSourceSec: 240,
      maxReferenceSec: 120,
      maxUploadBytes: 100 * 1024 * 1024
    });
    expect(config.output.streamingFormat).toBe('mp3');
    expect(config.output.directory).toBe(path.join(os.tmpdir(), 'timbre-outputs'));
    expect(config.corsOrigins).toBe('*');
  });

  it('should coerce numeric strings', () => {
    const config = loadConfig({
      PORT: '9100',
      MAX_CONCURRENT_JOBS: '3',
      ENGINE_ACCESS_MODE: 'serialized',
      CROSSFADE_HOPS: '2',
      ENGINE_HOP_SIZE: '512'
    });

    expect(config.port).toBe(9100);
    expect(config.scheduler).toEqual({ maxConcurrentJobs: 3, accessMode: 'serialized' });
    expect(config.crossfadeSamples).toBe(1024);
  });

  it('should treat blank values as unset', () => {
    expect(loadConfig({ PORT: '', OUTPUT_DIR: '  ' }).port).toBe(8000);
  });

  it('should split CORS origins', () => {
    expect(loadConfig({ CORS_ORIGINS: 'http://localhost:3000, http://localhost:3001' }).corsOrigins)
      .toEqual(['http://localhost:3000', 'http://localhost:3001']);
  });

  it('should cap the recommended duration at the hard limit', () => {
    const config = loadConfig({ MAX_SOURCE_DURATION_SEC: '120' });

    expect(config.limits.recommendedSourceSec).toBe(120);
  });

  it('should reject invalid settings', () => {
    expect(() => loadConfig({ MAX_CONCURRENT_JOBS: '0' })).toThrow(ValidationError);
    expect(() => loadConfig({ ENGINE_ACCESS_MODE: 'exclusive' })).toThrow(ValidationError);
    expect(() => loadConfig({ STREAMING_FORMAT: 'flac' })).toThrow(ValidationError);
    expect(() => loadConfig({ ENGINE_URL: 'not a url' })).toThrow(ValidationError);
  });
});
