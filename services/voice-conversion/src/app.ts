import type { AudioTranscoder, VoiceModelEngine } from '@timbre/core';
import { AudioResolver } from './audio/audio-resolver';
import { FfmpegTranscoder } from './audio/ffmpeg-transcoder';
import type { ServiceConfig } from './config';
import { FormatEncoder } from './encoding/format-encoder';
import { EngineMonitor } from './engine/engine-monitor';
import { RemoteVoiceModelEngine } from './engine/remote-engine';
import { VoiceConversionService } from './pipeline/conversion-service';
import { ConversionScheduler } from './scheduler/conversion-scheduler';
import { Segmenter } from './segmentation/segmenter';
import { VoiceConversionServer } from './server';
import { ArtifactStore } from './storage/artifact-store';

export interface AppOverrides {
  engine?: VoiceModelEngine;
  transcoder?: AudioTranscoder;
}

export interface VoiceConversionApp {
  engine: VoiceModelEngine;
  monitor: EngineMonitor;
  scheduler: ConversionScheduler;
  store: ArtifactStore;
  service: VoiceConversionService;
  server: VoiceConversionServer;
}

/**
 * Wire the service graph. One engine instance is shared by every request.
 */
export function createVoiceConversion(config: ServiceConfig, overrides: AppOverrides = {}): VoiceConversionApp {
  const engine = overrides.engine ?? new RemoteVoiceModelEngine({
    baseUrl: config.engine.url,
    timeoutMs: config.engine.timeoutMs,
    sampleRate: config.audio.sampleRate
  });
  const transcoder = overrides.transcoder ?? new FfmpegTranscoder(config.ffmpegPath, config.ffprobePath);

  const monitor = new EngineMonitor(engine, { retryMs: config.engine.loadRetrySec * 1000 });
  const scheduler = new ConversionScheduler(engine, config.scheduler);
  const store = new ArtifactStore({
    rootDir: config.output.directory,
    maxSizeBytes: config.output.maxSizeBytes
  });

  const service = new VoiceConversionService({
    resolver: new AudioResolver({ sampleRate: config.audio.sampleRate, transcoder }),
    segmenter: new Segmenter(config.segmentation),
    scheduler,
    encoder: new FormatEncoder(transcoder),
    store,
    sampleRate: config.audio.sampleRate,
    crossfadeSamples: config.crossfadeSamples,
    streamingFormat: config.output.streamingFormat,
    limits: {
      maxSourceSec: config.limits.maxSourceSec,
      recommendedSourceSec: config.limits.recommendedSourceSec,
      maxReferenceSec: config.limits.maxReferenceSec
    }
  });

  const server = new VoiceConversionServer(service, {
    corsOrigins: config.corsOrigins,
    maxUploadBytes: config.limits.maxUploadBytes
  });

  return { engine, monitor, scheduler, store, service, server };
}
