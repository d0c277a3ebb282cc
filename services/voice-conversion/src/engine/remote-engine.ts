import axios, { AxiosInstance } from 'axios';
import {
  createLogger,
  engineConvertResponseSchema,
  engineHealthSchema,
  engineReferenceResponseSchema,
  ModelUnavailableError,
  ProcessingError,
  type EngineParameters,
  type EngineStatus,
  type ReferenceConditioning,
  type VoiceModelEngine
} from '@timbre/core';
import type { z } from 'zod';
import { resample } from '../audio/dsp';
import { bytesToFloat32, float32ToBytes } from '../audio/pcm';

const logger = createLogger('remote-engine');

export interface RemoteEngineOptions {
  baseUrl: string;
  timeoutMs: number;
  sampleRate: number;
}

/**
 * Client for the model inference server.
 * Waveforms travel as base64 little-endian float32.
 */
export class RemoteVoiceModelEngine implements VoiceModelEngine {
  private client: AxiosInstance;
  private readonly sampleRate: number;
  private current: EngineStatus = { loaded: false, device: null };

  constructor(options: RemoteEngineOptions) {
    this.sampleRate = options.sampleRate;
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxBodyLength: Infinity,
      maxContentLength: Infinity
    });

    logger.info({ baseUrl: options.baseUrl, timeout: options.timeoutMs }, 'Remote engine client initialized');
  }

  status(): EngineStatus {
    return { ...this.current };
  }

  /**
   * Ask the inference server whether its models are loaded
   */
  async load(): Promise<EngineStatus> {
    try {
      const response = await this.client.get('/health');
      const health = this.parse(engineHealthSchema, response.data, 'health');

      this.current = {
        loaded: health.models_loaded,
        device: health.device ?? null,
        maxChunkSec: health.max_chunk_sec ?? undefined
      };

      logger.info(this.current, 'Engine status refreshed');
      return this.status();

    } catch (error) {
      this.current = { loaded: false, device: null };

      if (axios.isAxiosError(error)) {
        logger.warn({ status: error.response?.status, error: error.message }, 'Engine health check failed');
        throw new ModelUnavailableError(`Voice model engine is not reachable: ${error.message}`);
      }
      throw error;
    }
  }

  async prepareReference(waveform: Float32Array, sampleRate: number): Promise<ReferenceConditioning> {
    const data = await this.post('/v1/references', {
      audio: float32ToBytes(waveform).toString('base64'),
      sample_rate: sampleRate
    }, 'prepare reference');

    const reference = this.parse(engineReferenceResponseSchema, data, 'reference');

    return {
      id: reference.conditioning_id,
      durationSec: reference.duration_sec ?? waveform.length / sampleRate
    };
  }

  async convert(
    chunk: Float32Array,
    conditioning: ReferenceConditioning,
    parameters: EngineParameters
  ): Promise<Float32Array> {
    const data = await this.post('/v1/convert', {
      conditioning_id: conditioning.id,
      audio: float32ToBytes(chunk).toString('base64'),
      sample_rate: this.sampleRate,
      parameters
    }, 'convert');

    const converted = this.parse(engineConvertResponseSchema, data, 'convert');
    const samples = bytesToFloat32(Buffer.from(converted.audio, 'base64'));

    if (converted.sample_rate !== this.sampleRate) {
      logger.warn({
        expected: this.sampleRate,
        received: converted.sample_rate
      }, 'Engine returned a different sample rate, resampling');
      return resample(samples, converted.sample_rate, this.sampleRate);
    }

    return samples;
  }

  async releaseReference(conditioning: ReferenceConditioning): Promise<void> {
    await this.client.delete(`/v1/references/${encodeURIComponent(conditioning.id)}`);
  }

  private async post(url: string, body: Record<string, unknown>, step: string): Promise<unknown> {
    const startTime = Date.now();

    try {
      const response = await this.client.post(url, body);

      logger.debug({ step, duration: Date.now() - startTime }, 'Engine call complete');
      return response.data;

    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;

        logger.error({ step, status, error: error.message, duration: Date.now() - startTime }, 'Engine call failed');

        if (status === 503) {
          this.current = { ...this.current, loaded: false };
          throw new ModelUnavailableError('Voice model engine reports models not loaded');
        }
        throw new ProcessingError(`Engine ${step} failed: ${error.message}`, { status });
      }
      throw error;
    }
  }

  private parse<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.output<T> {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new ProcessingError(`Engine returned a malformed ${what} response`, {
        issues: result.error.issues.map(issue => issue.message)
      });
    }
    return result.data;
  }
}
