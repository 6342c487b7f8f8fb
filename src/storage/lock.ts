/**
 * Advisory File Lock
 *
 * File-based exclusive lock guarding a shared file (a checkpoint document)
 * across processes. The lock is a sibling file created with the exclusive
 * `wx` flag; whoever creates it owns the lock until it is unlinked.
 *
 * @module storage/lock
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type { Logger } from '../logging/logger.js';

/** Lock metadata stored in the lock file */
const LockInfoSchema = z.object({
  /** PID of the process holding the lock */
  pid: z.number().int(),
  /** When the lock was acquired */
  acquiredAt: z.string(),
  /** What operation is being performed */
  operation: z.string(),
});

export type LockInfo = z.infer<typeof LockInfoSchema>;

export interface FileLockOptions {
  /** Attempts before giving up (default: 200) */
  maxRetries?: number;
  /** Wait between attempts in milliseconds (default: 50) */
  retryIntervalMs?: number;
  /** Age after which a lock is considered abandoned (default: 30s) */
  staleAfterMs?: number;
  logger?: Logger;
}

/**
 * Raised when the lock stays held by another process for every attempt.
 */
export class LockTimeoutError extends Error {
  constructor(
    public readonly lockPath: string,
    attempts: number
  ) {
    super(`Could not acquire lock ${lockPath} after ${attempts} attempts`);
    this.name = 'LockTimeoutError';
  }
}

const DEFAULT_MAX_RETRIES = 200;
const DEFAULT_RETRY_INTERVAL_MS = 50;
const DEFAULT_STALE_AFTER_MS = 30_000;

/**
 * Exclusive advisory lock on a lock file.
 *
 * @example
 * ```typescript
 * const lock = new FileLock('/data/checkpoints/generation_progress.lock');
 * await lock.withLock('save', async () => {
 *   await atomicWriteJson(checkpointPath, record);
 * });
 * ```
 */
export class FileLock {
  private readonly maxRetries: number;
  private readonly retryIntervalMs: number;
  private readonly staleAfterMs: number;
  private readonly logger?: Logger;

  constructor(
    readonly lockPath: string,
    options: FileLockOptions = {}
  ) {
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryIntervalMs = options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
    this.logger = options.logger;
  }

  /**
   * Acquire the lock, waiting while another holder owns it.
   *
   * @throws LockTimeoutError when every attempt finds the lock held
   */
  async acquire(operation: string): Promise<void> {
    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      const lockInfo: LockInfo = {
        pid: process.pid,
        acquiredAt: new Date().toISOString(),
        operation,
      };

      try {
        await fs.writeFile(this.lockPath, JSON.stringify(lockInfo), { flag: 'wx' });
        return;
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== 'EEXIST') {
          throw error;
        }
      }

      if (await this.removeIfStale()) {
        continue;
      }
      await sleep(this.retryIntervalMs);
    }

    throw new LockTimeoutError(this.lockPath, this.maxRetries);
  }

  /**
   * Release the lock. Missing lock files are ignored.
   */
  async release(): Promise<void> {
    try {
      await fs.unlink(this.lockPath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }
  }

  /**
   * Execute a function while holding the lock.
   *
   * The lock is released on every exit path, including thrown errors.
   */
  async withLock<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    await this.acquire(operation);
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  /**
   * Read the current holder, or null when unlocked.
   */
  async holder(): Promise<LockInfo | null> {
    let content: string;
    try {
      content = await fs.readFile(this.lockPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      return null;
    }
    const parsed = LockInfoSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  private async removeIfStale(): Promise<boolean> {
    let ageMs: number;
    try {
      const stat = await fs.stat(this.lockPath);
      ageMs = Date.now() - stat.mtimeMs;
    } catch {
      // Released between our write attempt and the stat
      return true;
    }

    if (ageMs <= this.staleAfterMs) {
      return false;
    }

    this.logger?.warn(
      `[Lock] Stale lock detected on ${this.lockPath} (${Math.round(ageMs / 1000)}s old), removing`
    );
    await this.release();
    return true;
  }
}

/**
 * Lock file that guards a given data file.
 *
 * @example
 * lockPathFor('/data/checkpoints/generation_progress.json');
 * // '/data/checkpoints/generation_progress.lock'
 */
export function lockPathFor(filePath: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}.lock`);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
