import { CancelledError } from '@timbre/core';

export type Release = () => void;

interface Waiter {
  grant: (release: Release) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Counting semaphore with FIFO hand-off and abortable waits
 */
export class Semaphore {
  private readonly permits: number;
  private inUse = 0;
  private readonly waiters: Waiter[] = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.permits = permits;
  }

  get capacity(): number {
    return this.permits;
  }

  get active(): number {
    return this.inUse;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a permit. Rejects with CancelledError if `signal` aborts first.
   */
  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError('Cancelled before admission'));
    }

    if (this.inUse < this.permits && this.waiters.length === 0) {
      this.inUse++;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = { grant: resolve, signal };

      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
            reject(new CancelledError('Cancelled while waiting for admission'));
          }
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.waiters.push(waiter);
    });
  }

  /**
   * Run `task` while holding a permit
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff();
    };
  }

  /**
   * Pass a freed permit straight to the oldest waiter
   */
  private handOff(): void {
    const waiter = this.waiters.shift();

    if (!waiter) {
      this.inUse--;
      return;
    }

    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener('abort', waiter.onAbort);
    }
    waiter.grant(this.createRelease());
  }
}
