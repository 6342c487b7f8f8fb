/**
 * Pipeline Steps
 *
 * Step 1 selects words, step 2 enriches them with dictionary data and
 * step 3 generates definitions and examples.
 *
 * @module stages
 */

// Step 1: Selection
export { runSelectionStage, selectWords } from './selection.js';

// Step 2: Enrichment
export {
  enrichWord,
  enrichWords,
  runEnrichmentStage,
  type EnrichmentContext,
  type EnrichmentOptions,
  type EnrichmentResult,
  type EnrichmentServices,
} from './enrichment.js';

// Step 3: Generation
export {
  createFinalEntry,
  generateEntries,
  runGenerationStage,
  validateEntry,
  type GenerationContext,
  type GenerationServices,
  type GenerationStageOptions,
  type GenerationStageResult,
  type ValidationWarning,
} from './generation.js';

// Shared helpers
export { ConcurrencyLimiter, type ConcurrencyStats } from './concurrency.js';
export * from './vocabulary.js';
