/**
 * Bounded concurrency for handler invocations
 */

import { ConfigurationError } from '../utils/errors.js';

/**
 * Counting semaphore. At most `size` tasks run at once; the rest wait in
 * arrival order.
 */
export class WorkerPool {
  readonly size: number;
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw ConfigurationError.invalid('server.workers', 'must be a positive integer', size);
    }
    this.size = size;
  }

  /**
   * Run `task` once a slot is free and release the slot when it settles
   */
  async run<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /** Tasks currently holding a slot */
  get activeCount(): number {
    return this.active;
  }

  /** Tasks waiting for a slot */
  get queuedCount(): number {
    return this.waiting.length;
  }

  private acquire(): Promise<void> {
    if (this.active < this.size) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // The slot passes straight to the next waiter
      next();
    } else {
      this.active--;
    }
  }
}
