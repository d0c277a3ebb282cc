import {
  ModelUnavailableError,
  type EngineParameters,
  type EngineStatus,
  type ReferenceConditioning,
  type VoiceModelEngine
} from '@timbre/core';

export interface FakeEngineOptions {
  loaded?: boolean;
  device?: string;
  /** Chunk span reported by `status()` */
  maxChunkSec?: number;
  /** Latency of every engine call */
  delayMs?: number;
  /** 1-based convert call that throws */
  failOnConvertCall?: number;
  /** 1-based convert call that drops the models; the next `load()` restores them */
  unloadOnConvertCall?: number;
  /** Gain applied to converted samples */
  gain?: number;
}

export type EngineCall =
  | { kind: 'prepare'; conditioningId: string; samples: number }
  | { kind: 'convert'; conditioningId: string; samples: number }
  | { kind: 'release'; conditioningId: string };

/**
 * In-process engine: converts by resampling each chunk to
 * `length * length_adjust` samples and applying a gain.
 * Records every call and the peak number of overlapping calls.
 */
export class FakeVoiceModelEngine implements VoiceModelEngine {
  readonly calls: EngineCall[] = [];
  loaded: boolean;
  activeCalls = 0;
  peakActiveCalls = 0;

  private readonly options: FakeEngineOptions;
  private convertCount = 0;
  private referenceCount = 0;
  private dropped = false;

  constructor(options: FakeEngineOptions = {}) {
    this.options = options;
    this.loaded = options.loaded ?? true;
  }

  get convertCalls(): number {
    return this.calls.filter(call => call.kind === 'convert').length;
  }

  get prepareCalls(): number {
    return this.calls.filter(call => call.kind === 'prepare').length;
  }

  status(): EngineStatus {
    return {
      loaded: this.loaded,
      device: this.loaded ? (this.options.device ?? 'cpu') : null,
      maxChunkSec: this.options.maxChunkSec
    };
  }

  async load(): Promise<EngineStatus> {
    if (this.dropped) {
      this.dropped = false;
      this.loaded = true;
    }
    return this.status();
  }

  async prepareReference(waveform: Float32Array, sampleRate: number): Promise<ReferenceConditioning> {
    const id = `ref-${++this.referenceCount}`;
    this.calls.push({ kind: 'prepare', conditioningId: id, samples: waveform.length });

    await this.track(async () => undefined);
    return { id, durationSec: waveform.length / sampleRate };
  }

  async convert(
    chunk: Float32Array,
    conditioning: ReferenceConditioning,
    parameters: EngineParameters
  ): Promise<Float32Array> {
    const call = ++this.convertCount;
    this.calls.push({ kind: 'convert', conditioningId: conditioning.id, samples: chunk.length });

    return this.track(async () => {
      if (call === this.options.unloadOnConvertCall) {
        this.dropped = true;
        this.loaded = false;
        throw new ModelUnavailableError('Voice model engine reports models not loaded');
      }
      if (call === this.options.failOnConvertCall) {
        throw new Error(`fake engine failure on call ${call}`);
      }
      return transform(chunk, parameters.length_adjust, this.options.gain ?? 1);
    });
  }

  async releaseReference(conditioning: ReferenceConditioning): Promise<void> {
    this.calls.push({ kind: 'release', conditioningId: conditioning.id });
  }

  private async track<T>(work: () => Promise<T>): Promise<T> {
    this.activeCalls++;
    this.peakActiveCalls = Math.max(this.peakActiveCalls, this.activeCalls);
    try {
      if (this.options.delayMs) {
        await new Promise(resolve => setTimeout(resolve, this.options.delayMs));
      }
      return await work();
    } finally {
      this.activeCalls--;
    }
  }
}

function transform(chunk: Float32Array, lengthAdjust: number, gain: number): Float32Array {
  const length = Math.max(1, Math.round(chunk.length * lengthAdjust));
  const output = new Float32Array(length);

  for (let i = 0; i < length; i++) {
    const source = Math.min(chunk.length - 1, Math.floor(i * chunk.length / length));
    output[i] = chunk[source] * gain;
  }
  return output;
}
