import { randomUUID } from 'crypto';
import {
  CancelledError,
  JOB_STATE_TRANSITIONS,
  ProcessingError,
  type AudioAsset,
  type AudioChunk,
  type ConversionParameters,
  type JobProgress,
  type JobState
} from '@timbre/core';
import { ChunkAssembler } from '../assembly/chunk-assembler';

export interface ConversionJobInit {
  id?: string;
  chunks: AudioChunk[];
  reference: AudioAsset;
  parameters: ConversionParameters;
  sampleRate: number;
  crossfadeSamples: number;
}

export interface ConversionResult {
  jobId: string;
  streaming: Float32Array;
  full: Float32Array;
  sampleRate: number;
  chunkCount: number;
  engineLatencyMs: number;
}

export interface ChunkCompletion {
  jobId: string;
  index: number;
  completedChunks: number;
  totalChunks: number;
  streamingLength: number;
}

type ChunkListener = (completion: ChunkCompletion) => void;

/**
 * One request's unit of work: ordered chunks, a cursor and the streaming buffer.
 * State changes go through the scheduler.
 */
export class ConversionJob {
  readonly id: string;
  readonly chunks: readonly AudioChunk[];
  readonly reference: AudioAsset;
  readonly parameters: ConversionParameters;
  readonly sampleRate: number;
  readonly createdAt: number = Date.now();

  private currentState: JobState = 'queued';
  private cursor = 0;
  private readonly assembler: ChunkAssembler;
  private readonly abortController = new AbortController();
  private readonly listeners: ChunkListener[] = [];
  private failure?: Error;

  constructor(init: ConversionJobInit) {
    if (init.chunks.length === 0) {
      throw new ProcessingError('A conversion job needs at least one chunk');
    }

    this.id = init.id ?? randomUUID();
    this.chunks = init.chunks;
    this.reference = init.reference;
    this.parameters = init.parameters;
    this.sampleRate = init.sampleRate;
    this.assembler = new ChunkAssembler(init.crossfadeSamples);
  }

  get state(): JobState {
    return this.currentState;
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get completedChunks(): number {
    return this.cursor;
  }

  get totalChunks(): number {
    return this.chunks.length;
  }

  get error(): Error | undefined {
    return this.failure;
  }

  /**
   * Cancel a job that has not reached the engine yet
   */
  cancel(): boolean {
    if (this.currentState !== 'queued' || this.abortController.signal.aborted) {
      return false;
    }
    this.abortController.abort();
    return true;
  }

  /**
   * Subscribe to chunk completions; returns an unsubscribe function
   */
  onChunk(listener: ChunkListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  /**
   * Converted audio available so far
   */
  streamingSnapshot(): Float32Array {
    return this.assembler.snapshot();
  }

  progress(): JobProgress {
    return {
      job_id: this.id,
      state: this.currentState,
      completed_chunks: this.cursor,
      total_chunks: this.chunks.length,
      streaming_duration: this.assembler.length / this.sampleRate
    };
  }

  /** @internal scheduler: first engine call is about to happen */
  markDispatched(): void {
    if (this.abortController.signal.aborted) {
      throw new CancelledError('Job was cancelled before dispatch', { jobId: this.id });
    }
    this.transition('running');
  }

  /** @internal scheduler: chunk `index` came back from the engine */
  appendConverted(index: number, converted: Float32Array): void {
    if (this.currentState !== 'running') {
      throw new ProcessingError(`Cannot append to a ${this.currentState} job`, { jobId: this.id });
    }
    if (index !== this.cursor) {
      throw new ProcessingError('Converted chunk arrived out of order', {
        jobId: this.id,
        expected: this.cursor,
        received: index
      });
    }

    this.assembler.append(converted);
    this.cursor++;

    const completion: ChunkCompletion = {
      jobId: this.id,
      index,
      completedChunks: this.cursor,
      totalChunks: this.chunks.length,
      streamingLength: this.assembler.length
    };
    for (const listener of [...this.listeners]) {
      listener(completion);
    }
  }

  /** @internal scheduler: all chunks converted */
  complete(engineLatencyMs: number): ConversionResult {
    if (this.cursor !== this.chunks.length) {
      throw new ProcessingError('Job completed with missing chunks', {
        jobId: this.id,
        completed: this.cursor,
        total: this.chunks.length
      });
    }

    this.transition('completed');

    return {
      jobId: this.id,
      streaming: this.assembler.snapshot(),
      full: this.assembler.snapshot(),
      sampleRate: this.sampleRate,
      chunkCount: this.chunks.length,
      engineLatencyMs
    };
  }

  /** @internal scheduler: abort with no partial result */
  fail(error: Error): void {
    this.failure = error;
    this.assembler.reset();
    this.transition('failed');
  }

  /** @internal scheduler: removed from the queue before dispatch */
  markCancelled(): void {
    this.transition('cancelled');
  }

  private transition(next: JobState): void {
    if (!JOB_STATE_TRANSITIONS[this.currentState].includes(next)) {
      throw new ProcessingError(`Invalid job transition ${this.currentState} -> ${next}`, { jobId: this.id });
    }
    this.currentState = next;
  }
}
