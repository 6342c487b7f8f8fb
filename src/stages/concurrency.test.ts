import { describe, it, expect, jest } from '@jest/globals';
import { ConcurrencyLimiter } from './concurrency.js';
import type { Logger } from '../logging/logger.js';

describe('ConcurrencyLimiter', () => {
  describe('constructor', () => {
    it('throws error for a limit that is not a positive integer', () => {
      expect(() => new ConcurrencyLimiter(0)).toThrow('Concurrency limit must be a positive integer');
      expect(() => new ConcurrencyLimiter(2.5)).toThrow('Concurrency limit must be a positive integer');
    });

    it('reports its limit', () => {
      expect(new ConcurrencyLimiter(2).getStats()).toEqual({ running: 0, queued: 0, limit: 2 });
    });
  });

  describe('acquire and release', () => {
    it('allows up to limit concurrent operations', async () => {
      const limiter = new ConcurrencyLimiter(2);
      let running = 0;
      let maxRunning = 0;

      const tasks = Array.from({ length: 5 }, async () => {
        await limiter.acquire();
        running++;
        maxRunning = Math.max(maxRunning, running);
        await new Promise((r) => setTimeout(r, 10));
        running--;
        limiter.release();
      });

      await Promise.all(tasks);
      expect(maxRunning).toBe(2);
    });

    it('maintains FIFO queue ordering', async () => {
      const limiter = new ConcurrencyLimiter(1);
      const order: string[] = [];

      await limiter.acquire();
      const waiting = ['A', 'B', 'C'].map((label) =>
        limiter.acquire().then(() => {
          order.push(label);
          limiter.release();
        })
      );
      expect(limiter.getStats().queued).toBe(3);

      limiter.release();
      await Promise.all(waiting);

      expect(order).toEqual(['A', 'B', 'C']);
      expect(limiter.getStats()).toEqual({ running: 0, queued: 0, limit: 1 });
    });

    it('warns on release without acquire', () => {
      const logger: Logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
      const limiter = new ConcurrencyLimiter(1, logger);

      limiter.release();

      expect(logger.warn).toHaveBeenCalledWith('ConcurrencyLimiter: release() called without matching acquire()');
      expect(limiter.getStats().running).toBe(0);
    });
  });

  describe('run', () => {
    it('returns the result and frees the slot', async () => {
      const limiter = new ConcurrencyLimiter(1);

      await expect(limiter.run(async () => 42)).resolves.toBe(42);
      expect(limiter.getStats().running).toBe(0);
    });

    it('frees the slot when the function throws', async () => {
      const limiter = new ConcurrencyLimiter(1);

      await expect(
        limiter.run(async () => {
          throw new Error('lookup failed');
        })
      ).rejects.toThrow('lookup failed');
      expect(limiter.getStats().running).toBe(0);
    });
  });
});
