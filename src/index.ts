/**
 * lexibatch
 *
 * Library entry point. The CLI lives in `cli/index.ts`.
 *
 * @module lexibatch
 */

export * from './errors.js';
export * from './config/index.js';
export * from './logging/logger.js';
export * from './schemas/index.js';
export * from './storage/index.js';
export * from './clients/index.js';
export * from './stages/index.js';
export * from './pipeline/index.js';
export * from './scheduler/index.js';
