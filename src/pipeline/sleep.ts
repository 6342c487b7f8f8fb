/**
 * Cancellable Sleep
 *
 * Every suspension point in the pipeline (retry backoff, batch pause,
 * scheduler wait) goes through this helper so an operator interrupt can
 * cut it short.
 *
 * @module pipeline/sleep
 */

/**
 * Signature of a sleep function, injectable for tests.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Create the error thrown when a sleep is aborted.
 */
export function createAbortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Resolve after `ms` milliseconds, or reject with an AbortError when the
 * signal fires first.
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(createAbortError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(createAbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Throw an AbortError if the signal already fired.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw createAbortError();
  }
}
