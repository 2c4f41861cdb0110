/**
 * Counting admission gate for page work
 */

import { Sema } from 'async-sema';

export class ConcurrencyLimiter {
  private readonly sema: Sema;
  private active = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Concurrency must be a positive integer, got ${capacity}`);
    }
    this.sema = new Sema(capacity);
  }

  async acquire(): Promise<void> {
    await this.sema.acquire();
    this.active++;
  }

  release(): void {
    if (this.active === 0) {
      throw new Error('ConcurrencyLimiter.release() called without a matching acquire()');
    }
    this.active--;
    this.sema.release();
  }

  /**
   * Run `task` inside a slot; the slot is released however the task ends
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get inFlight(): number {
    return this.active;
  }

  get waiting(): number {
    return this.sema.nrWaiting();
  }
}
