import { createLogger, type EngineStatus, type VoiceModelEngine } from '@timbre/core';

const logger = createLogger('engine-monitor');

export interface EngineMonitorOptions {
  /** Delay between load attempts while the engine is not loaded; 0 disables retries */
  retryMs: number;
}

/**
 * Brings the engine back whenever it reports its models as not loaded,
 * at start-up or after it drops out between requests.
 */
export class EngineMonitor {
  private readonly engine: VoiceModelEngine;
  private readonly options: EngineMonitorOptions;
  private timer: NodeJS.Timeout | null = null;
  private pending: Promise<void> | null = null;

  constructor(engine: VoiceModelEngine, options: EngineMonitorOptions) {
    this.engine = engine;
    this.options = options;

    logger.info({ retryMs: options.retryMs }, 'Engine monitor initialized');
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * First load attempt, then keep watching. Never rejects: a failed load
   * leaves requests answered with MODEL_UNAVAILABLE until a retry succeeds.
   */
  async start(): Promise<EngineStatus> {
    await this.check();

    if (this.options.retryMs > 0 && !this.timer) {
      this.timer = setInterval(() => {
        this.check().catch(error => logger.error({ error }, 'Engine check failed'));
      }, this.options.retryMs);
      this.timer.unref();
    }

    return this.engine.status();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Attempt a load if the engine is not loaded; overlapping calls share one attempt
   */
  check(): Promise<void> {
    if (this.engine.status().loaded) {
      return Promise.resolve();
    }
    if (!this.pending) {
      this.pending = this.attemptLoad().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async attemptLoad(): Promise<void> {
    try {
      const status = await this.engine.load();

      if (status.loaded) {
        logger.info({ device: status.device, maxChunkSec: status.maxChunkSec }, 'Engine models loaded');
      } else {
        logger.warn({ retryMs: this.options.retryMs }, 'Engine is up but models are not loaded yet');
      }
    } catch (error) {
      // Any failure counts as not loaded; the next tick retries
      logger.warn({ error, retryMs: this.options.retryMs }, 'Engine load failed');
    }
  }
}
