import {
  BaseError,
  CancelledError,
  createLogger,
  ModelUnavailableError,
  ProcessingError,
  toEngineParameters,
  type EngineAccessMode,
  type ReferenceConditioning,
  type VoiceModelEngine
} from '@timbre/core';
import { Semaphore, type Release } from './semaphore';
import type { ConversionJob, ConversionResult } from './conversion-job';

const logger = createLogger('conversion-scheduler');

export interface SchedulerOptions {
  maxConcurrentJobs: number;
  accessMode: EngineAccessMode;
}

export interface SchedulerStats {
  capacity: number;
  accessMode: EngineAccessMode;
  active: number;
  queued: number;
  peakActive: number;
  peakEngineCalls: number;
  completed: number;
  failed: number;
  cancelled: number;
}

/**
 * Sole owner of the engine handle.
 *
 * At most `maxConcurrentJobs` jobs are admitted at once (FIFO). Chunks of a job
 * go to the engine one at a time in index order. In `serialized` mode every
 * engine call additionally takes a single global permit.
 */
export class ConversionScheduler {
  private readonly engine: VoiceModelEngine;
  private readonly options: SchedulerOptions;
  private readonly admission: Semaphore;
  private readonly engineGate: Semaphore | null;
  private readonly jobs = new Map<string, ConversionJob>();

  private activeJobs = 0;
  private engineCalls = 0;
  private counters = {
    peakActive: 0,
    peakEngineCalls: 0,
    completed: 0,
    failed: 0,
    cancelled: 0
  };

  constructor(engine: VoiceModelEngine, options: SchedulerOptions) {
    this.engine = engine;
    this.options = options;
    this.admission = new Semaphore(options.maxConcurrentJobs);
    this.engineGate = options.accessMode === 'serialized' ? new Semaphore(1) : null;

    logger.info({
      maxConcurrentJobs: options.maxConcurrentJobs,
      accessMode: options.accessMode
    }, 'Scheduler initialized');
  }

  /**
   * Fail fast when the model is not loaded
   */
  assertEngineReady(): void {
    const status = this.engine.status();
    if (!status.loaded) {
      throw new ModelUnavailableError();
    }
  }

  engineStatus() {
    return this.engine.status();
  }

  /**
   * Longest chunk the engine accepts, when it reports one
   */
  engineMaxChunkSec(): number | undefined {
    const { maxChunkSec } = this.engine.status();
    return maxChunkSec !== undefined && maxChunkSec > 0 ? maxChunkSec : undefined;
  }

  /**
   * Run a job to completion; resolves with both artifacts
   */
  async submit(job: ConversionJob): Promise<ConversionResult> {
    if (job.state !== 'queued' || this.jobs.has(job.id)) {
      throw new ProcessingError('Job was already submitted', { jobId: job.id });
    }

    try {
      this.assertEngineReady();
    } catch (error) {
      if (error instanceof ModelUnavailableError) {
        job.fail(error);
        this.counters.failed++;
      }
      throw error;
    }

    this.jobs.set(job.id, job);

    try {
      const release = await this.admit(job);
      try {
        return await this.execute(job);
      } finally {
        this.activeJobs--;
        release();
      }
    } finally {
      this.jobs.delete(job.id);
    }
  }

  /**
   * Cancel a queued job by id
   */
  cancel(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    return job ? job.cancel() : false;
  }

  /**
   * Look up a job that is queued or running
   */
  getJob(jobId: string): ConversionJob | undefined {
    return this.jobs.get(jobId);
  }

  stats(): SchedulerStats {
    return {
      capacity: this.admission.capacity,
      accessMode: this.options.accessMode,
      active: this.activeJobs,
      queued: this.admission.waiting,
      ...this.counters
    };
  }

  private async admit(job: ConversionJob): Promise<Release> {
    logger.debug({ jobId: job.id, queued: this.admission.waiting }, 'Waiting for admission');

    let release: Release;
    try {
      release = await this.admission.acquire(job.signal);
    } catch (error) {
      job.markCancelled();
      this.counters.cancelled++;
      logger.info({ jobId: job.id }, 'Job cancelled while queued');
      throw error;
    }

    // Cancelled between the grant and this continuation
    if (job.signal.aborted) {
      release();
      job.markCancelled();
      this.counters.cancelled++;
      throw new CancelledError('Job was cancelled before dispatch', { jobId: job.id });
    }

    this.activeJobs++;
    this.counters.peakActive = Math.max(this.counters.peakActive, this.activeJobs);
    return release;
  }

  private async execute(job: ConversionJob): Promise<ConversionResult> {
    const startTime = Date.now();
    const parameters = toEngineParameters(job.parameters);
    let conditioning: ReferenceConditioning | null = null;

    logger.info({ jobId: job.id, chunks: job.totalChunks }, 'Job admitted');

    try {
      this.assertEngineReady();
      job.markDispatched();

      const prepared = await this.callEngine(() =>
        this.engine.prepareReference(job.reference.samples, job.reference.sampleRate)
      );
      conditioning = prepared;

      for (const chunk of job.chunks) {
        const chunkStart = Date.now();
        const converted = await this.callEngine(() =>
          this.engine.convert(chunk.samples, prepared, parameters)
        );
        job.appendConverted(chunk.index, converted);

        logger.debug({
          jobId: job.id,
          chunk: chunk.index,
          duration: Date.now() - chunkStart
        }, 'Chunk converted');
      }

      const result = job.complete(Date.now() - startTime);
      this.counters.completed++;

      logger.info({
        jobId: job.id,
        chunks: result.chunkCount,
        duration: result.engineLatencyMs
      }, 'Job completed');

      return result;

    } catch (error) {
      const failure = this.toFailure(error, job);

      if (job.state === 'queued' || job.state === 'running') {
        job.fail(failure);
      }
      this.counters.failed++;

      logger.error({
        jobId: job.id,
        completedChunks: job.completedChunks,
        error: failure
      }, 'Job failed');

      throw failure;

    } finally {
      if (conditioning) {
        await this.releaseConditioning(job.id, conditioning);
      }
    }
  }

  private async callEngine<T>(call: () => Promise<T>): Promise<T> {
    const run = async () => {
      this.engineCalls++;
      this.counters.peakEngineCalls = Math.max(this.counters.peakEngineCalls, this.engineCalls);
      try {
        return await call();
      } finally {
        this.engineCalls--;
      }
    };

    return this.engineGate ? this.engineGate.run(run) : run();
  }

  private async releaseConditioning(jobId: string, conditioning: ReferenceConditioning): Promise<void> {
    if (!this.engine.releaseReference) {
      return;
    }

    try {
      await this.engine.releaseReference(conditioning);
    } catch (error) {
      // The job outcome stands; a leaked conditioning is only logged
      logger.warn({ jobId, conditioningId: conditioning.id, error }, 'Failed to release reference conditioning');
    }
  }

  private toFailure(error: unknown, job: ConversionJob): BaseError {
    if (error instanceof BaseError) {
      return error;
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    return new ProcessingError(`Voice conversion failed: ${message}`, {
      jobId: job.id,
      failedChunk: job.completedChunks
    });
  }
}
