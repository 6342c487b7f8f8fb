/**
 * Concurrency control for dictionary lookups.
 *
 * @module stages/concurrency
 */

import { silentLogger, type Logger } from '../logging/logger.js';

/**
 * Statistics about the current state of the ConcurrencyLimiter.
 */
export interface ConcurrencyStats {
  /** Number of currently running operations */
  running: number;
  /** Number of operations waiting in queue */
  queued: number;
  /** Maximum concurrent operations allowed */
  limit: number;
}

/**
 * ConcurrencyLimiter caps the number of outstanding operations.
 *
 * Uses a semaphore pattern with a FIFO promise queue for waiting callers.
 * The enrichment stage runs every dictionary lookup through one limiter so
 * the service never sees more than `limit` requests at once.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(2);
 * const entries = await Promise.all(
 *   words.map((word) => limiter.run(() => dictionary.lookup(word)))
 * );
 * ```
 */
export class ConcurrencyLimiter {
  private readonly limit: number;
  private running: number = 0;
  private queue: Array<() => void> = [];
  private readonly logger: Logger;

  /**
   * @param limit - Maximum number of concurrent operations
   * @throws Error if limit is not a positive integer
   */
  constructor(limit: number, logger: Logger = silentLogger) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error('Concurrency limit must be a positive integer');
    }
    this.limit = limit;
    this.logger = logger;
  }

  /**
   * Acquires a slot, waiting in FIFO order when all slots are taken.
   */
  async acquire(): Promise<void> {
    if (this.running < this.limit) {
      this.running++;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Releases a slot and hands it to the next waiter, if any.
   * Always call this in a finally block.
   */
  release(): void {
    if (this.running <= 0) {
      this.logger.warn('ConcurrencyLimiter: release() called without matching acquire()');
      return;
    }

    this.running--;

    const next = this.queue.shift();
    if (next) {
      this.running++;
      next();
    }
  }

  /**
   * Executes a function inside a slot, releasing it even if the function
   * throws.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStats(): ConcurrencyStats {
    return {
      running: this.running,
      queued: this.queue.length,
      limit: this.limit,
    };
  }
}
