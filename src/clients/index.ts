/**
 * External Service Clients
 *
 * @module clients
 */

export * from './types.js';
export { calculateDelay, withRetry, type RetryOptions } from './retry.js';
export * from './dictionary/index.js';
export * from './generation/index.js';
