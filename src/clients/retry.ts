/**
 * Retry Helpers
 *
 * Exponential backoff shared by the dictionary and generation clients.
 *
 * @module clients/retry
 */

import { sleep as defaultSleep, type SleepFn } from '../pipeline/sleep.js';

// ============================================================================
// Types
// ============================================================================

export interface RetryOptions {
  /** Total attempts including the first */
  maxAttempts: number;
  /** Delay before the second attempt */
  baseDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
  /** Decides whether a thrown error deserves another attempt */
  shouldRetry: (error: unknown) => boolean;
  /** Called before each wait */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: SleepFn;
  signal?: AbortSignal;
}

// ============================================================================
// Backoff
// ============================================================================

/**
 * Calculate the exponential backoff delay after a failed attempt.
 *
 * @param attempt - Failed attempt number (1-indexed)
 * @example
 * calculateDelay(1, 1000, 10000); // 1000
 * calculateDelay(3, 1000, 10000); // 4000
 * calculateDelay(6, 1000, 10000); // 10000
 */
export function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponential = baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(maxDelayMs, exponential);
}

/**
 * Execute an async operation, retrying with exponential backoff while
 * `shouldRetry` accepts the error and attempts remain.
 *
 * @throws The last error when attempts are exhausted or it is not retryable
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= options.maxAttempts || !options.shouldRetry(error)) {
        throw error;
      }

      const delay = calculateDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      options.onRetry?.(error, attempt, delay);
      await wait(delay, options.signal);
    }
  }
}
