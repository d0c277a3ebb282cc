import {
  CancelledError,
  createLogger,
  describeError,
  parseConversionRequest,
  ValidationError,
  type AudioAsset,
  type ConversionRequestBody,
  type ConversionResponse,
  type JobProgress,
  type OutputFormat
} from '@timbre/core';
import {
  AudioResolver,
  describeAsset,
  selectAudioSource,
  type UploadedAudio
} from '../audio/audio-resolver';
import { encodeWav } from '../audio/wav-codec';
import { FormatEncoder, type EncodedAudio } from '../encoding/format-encoder';
import { ConversionJob, type ConversionResult } from '../scheduler/conversion-job';
import { ConversionScheduler } from '../scheduler/conversion-scheduler';
import { Segmenter } from '../segmentation/segmenter';
import { ArtifactStore } from '../storage/artifact-store';

const logger = createLogger('conversion-service');

const RECENT_JOB_LIMIT = 100;

export interface ConversionUploads {
  source?: UploadedAudio;
  target?: UploadedAudio;
}

export interface ConvertHooks {
  /** Called once the job exists, before it waits for admission */
  onJob?: (job: ConversionJob) => void;
}

export interface ConversionOutcome {
  statusCode: number;
  body: ConversionResponse;
}

export interface DurationLimits {
  maxSourceSec: number;
  recommendedSourceSec: number;
  maxReferenceSec: number;
}

export interface ConversionServiceOptions {
  resolver: AudioResolver;
  segmenter: Segmenter;
  scheduler: ConversionScheduler;
  encoder: FormatEncoder;
  store: ArtifactStore;
  sampleRate: number;
  crossfadeSamples: number;
  streamingFormat: OutputFormat;
  limits: DurationLimits;
}

interface DeliveredOutputs {
  streamingPath: string | null;
  fullPath: string | null;
  streamingBase64: string | null;
  fullBase64: string | null;
}

/**
 * Request pipeline: resolve inputs, segment, convert through the scheduler,
 * encode both artifacts and hand them back as files or base64 text.
 */
export class VoiceConversionService {
  private readonly options: ConversionServiceOptions;
  private readonly recent = new Map<string, JobProgress>();

  constructor(options: ConversionServiceOptions) {
    this.options = options;

    logger.info({
      sampleRate: options.sampleRate,
      crossfadeSamples: options.crossfadeSamples,
      streamingFormat: options.streamingFormat
    }, 'Conversion service initialized');
  }

  async initialize(): Promise<void> {
    await this.options.store.initialize();
  }

  /**
   * Run one conversion request end to end. Never throws: every failure is
   * turned into a structured response.
   */
  async convert(
    input: unknown,
    uploads: ConversionUploads = {},
    hooks: ConvertHooks = {}
  ): Promise<ConversionOutcome> {
    const startTime = Date.now();
    let request: ConversionRequestBody | undefined;
    let job: ConversionJob | undefined;

    try {
      request = parseConversionRequest(input);

      const sourceInput = selectAudioSource('source', {
        path: request.source_audio_path,
        base64: request.source_audio_base64,
        upload: uploads.source
      });
      const referenceInput = selectAudioSource('reference', {
        path: request.target_audio_path,
        base64: request.target_audio_base64,
        upload: uploads.target
      });

      this.options.scheduler.assertEngineReady();

      const [source, reference] = await Promise.all([
        this.options.resolver.resolve(sourceInput),
        this.options.resolver.resolve(referenceInput)
      ]);
      this.checkDurations(source, reference);

      if (request.request_id) {
        this.assertIdAvailable(request.request_id);
      }

      const chunks = this.options.segmenter.segment(source, this.options.scheduler.engineMaxChunkSec());
      job = new ConversionJob({
        id: request.request_id,
        chunks,
        reference,
        parameters: request,
        sampleRate: this.options.sampleRate,
        crossfadeSamples: this.options.crossfadeSamples
      });

      logger.info({
        jobId: job.id,
        sourceSec: Number(source.durationSec.toFixed(2)),
        referenceSec: Number(reference.durationSec.toFixed(2)),
        chunks: chunks.length
      }, 'Conversion job created');

      hooks.onJob?.(job);

      let result: ConversionResult;
      try {
        result = await this.options.scheduler.submit(job);
      } finally {
        this.remember(job);
      }

      const outputs = await this.deliver(result, request);
      const processingTime = (Date.now() - startTime) / 1000;

      logger.info({
        jobId: job.id,
        chunks: result.chunkCount,
        processingTime,
        returnBase64: request.return_base64
      }, 'Conversion completed');

      return {
        statusCode: 200,
        body: {
          success: true,
          message: 'Voice conversion completed successfully',
          job_id: job.id,
          streaming_output_path: outputs.streamingPath,
          full_output_path: outputs.fullPath,
          streaming_output_base64: outputs.streamingBase64,
          full_output_base64: outputs.fullBase64,
          streaming_output_format: this.options.streamingFormat,
          output_format: request.output_format,
          processing_time: processingTime,
          chunk_count: result.chunkCount,
          input_info: {
            source: describeAsset(source),
            target: describeAsset(reference)
          },
          error: null
        }
      };

    } catch (error) {
      if (job && request?.cleanup_temp_files !== false) {
        await this.releaseQuietly(job.id);
      }
      return toErrorResponse(error, {
        jobId: job?.id ?? null,
        outputFormat: request?.output_format,
        startTime
      });
    }
  }

  /**
   * State of an in-flight or recently finished job
   */
  progress(jobId: string): JobProgress | null {
    const job = this.options.scheduler.getJob(jobId);
    if (job) {
      return job.progress();
    }
    return this.recent.get(jobId) ?? null;
  }

  /**
   * Streaming prefix of an in-flight job as WAV bytes
   */
  streamingPreview(jobId: string): Buffer | null {
    const job = this.options.scheduler.getJob(jobId);
    if (!job) {
      return null;
    }
    return encodeWav(job.streamingSnapshot(), job.sampleRate);
  }

  /**
   * Cancel a job that is still waiting for admission
   */
  cancel(jobId: string): boolean {
    const cancelled = this.options.scheduler.cancel(jobId);
    if (cancelled) {
      logger.info({ jobId }, 'Cancellation requested');
    }
    return cancelled;
  }

  async locateArtifact(jobId: string, name: string): Promise<string | null> {
    return this.options.store.locate(jobId, name);
  }

  async cleanup(jobId: string): Promise<boolean> {
    return this.options.store.release(jobId);
  }

  health() {
    const engine = this.options.scheduler.engineStatus();

    return {
      status: engine.loaded ? 'healthy' : 'degraded',
      models_loaded: engine.loaded,
      device: engine.device,
      scheduler: this.options.scheduler.stats(),
      storage: this.options.store.getStats()
    };
  }

  private checkDurations(source: AudioAsset, reference: AudioAsset): void {
    const { limits } = this.options;

    if (reference.durationSec > limits.maxReferenceSec) {
      throw new ValidationError(
        `Reference audio is too long: ${reference.durationSec.toFixed(1)}s (max ${limits.maxReferenceSec}s)`,
        { durationSec: reference.durationSec, maxSec: limits.maxReferenceSec }
      );
    }

    if (source.durationSec > limits.maxSourceSec) {
      throw new ValidationError(
        `Source audio is too long: ${source.durationSec.toFixed(1)}s (max ${limits.maxSourceSec}s)`,
        { durationSec: source.durationSec, maxSec: limits.maxSourceSec }
      );
    }

    if (source.durationSec > limits.recommendedSourceSec) {
      logger.warn({
        durationSec: Number(source.durationSec.toFixed(2)),
        recommendedSec: limits.recommendedSourceSec
      }, 'Source audio exceeds the recommended duration');
    }
  }

  private assertIdAvailable(jobId: string): void {
    if (this.options.scheduler.getJob(jobId) || this.recent.has(jobId)) {
      throw new ValidationError(`request_id is already in use: ${jobId}`, { jobId });
    }
  }

  private async deliver(result: ConversionResult, request: ConversionRequestBody): Promise<DeliveredOutputs> {
    const { encoder, store } = this.options;

    const full = await encoder.encode(result.full, result.sampleRate, request.output_format);
    const streaming = await encoder.encode(result.streaming, result.sampleRate, this.options.streamingFormat);

    const keepFiles = !(request.return_base64 && request.cleanup_temp_files);

    let streamingPath: string | null = null;
    let fullPath: string | null = null;

    if (keepFiles) {
      streamingPath = await store.write(result.jobId, artifactName('streaming', streaming), streaming.bytes);
      fullPath = await store.write(result.jobId, artifactName('full', full), full.bytes);
    }

    return {
      streamingPath,
      fullPath,
      streamingBase64: request.return_base64 ? encoder.toTransport(streaming.bytes) : null,
      fullBase64: request.return_base64 ? encoder.toTransport(full.bytes) : null
    };
  }

  private remember(job: ConversionJob): void {
    this.recent.set(job.id, job.progress());

    if (this.recent.size > RECENT_JOB_LIMIT) {
      const oldest = this.recent.keys().next();
      if (!oldest.done) {
        this.recent.delete(oldest.value);
      }
    }
  }

  private async releaseQuietly(jobId: string): Promise<void> {
    try {
      await this.options.store.release(jobId);
    } catch (error) {
      logger.warn({ jobId, error }, 'Failed to release artifacts after failure');
    }
  }
}

function artifactName(kind: 'streaming' | 'full', encoded: EncodedAudio): string {
  return `${kind}.${encoded.extension}`;
}

/**
 * Structured failure response with the status code of the error kind
 */
export function toErrorResponse(
  error: unknown,
  context: { jobId?: string | null; outputFormat?: string; startTime?: number } = {}
): ConversionOutcome {
  const described = describeError(error);
  const processingTime = context.startTime !== undefined ? (Date.now() - context.startTime) / 1000 : 0;

  if (error instanceof CancelledError) {
    logger.info({ jobId: context.jobId, code: described.code }, 'Conversion cancelled');
  } else if (described.statusCode >= 500) {
    logger.error({ jobId: context.jobId, error }, 'Conversion failed');
  } else {
    logger.warn({ jobId: context.jobId, kind: described.kind, message: described.message }, 'Conversion rejected');
  }

  return {
    statusCode: described.statusCode,
    body: {
      success: false,
      message: described.message,
      job_id: context.jobId ?? null,
      streaming_output_path: null,
      full_output_path: null,
      streaming_output_base64: null,
      full_output_base64: null,
      streaming_output_format: null,
      output_format: context.outputFormat ?? 'wav',
      processing_time: processingTime,
      chunk_count: null,
      input_info: null,
      error: {
        kind: described.kind,
        code: described.code
      }
    }
  };
}
