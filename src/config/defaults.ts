/**
 * Processing Defaults
 *
 * Tunables for batching, retries, rate limiting and generation.
 * Every value can be overridden through createPipelineConfig().
 *
 * @module config/defaults
 */

/** Width of one batch: frequency values (frequency mode) or rows (row mode) */
export const DEFAULT_BATCH_SIZE = 100;

/** Highest frequency value covered by frequency-mode batching */
export const DEFAULT_MAX_FREQUENCY = 20000;

/** Attempts per partition before the batch is declared failed */
export const DEFAULT_MAX_RETRIES = 3;

/** Fixed wait between partition attempts */
export const DEFAULT_RETRY_BACKOFF_MS = 5000;

/** Fixed pause between successful batches */
export const DEFAULT_BATCH_PAUSE_MS = 5000;

/**
 * Share of the expected item count an existing artifact must hold for a
 * batch to be skipped.
 */
export const BATCH_SKIP_THRESHOLD = 0.5;

/** Minimum entries for a produced artifact to be kept after an attempt */
export const SALVAGE_MIN_ITEMS = 1;

/** Words processed by --dry-run */
export const DRY_RUN_LIMIT = 10;

// ============================================================================
// Enrichment (dictionary lookups)
// ============================================================================

export const DEFAULT_DICTIONARY_API_URL = 'https://api.dictionaryapi.dev/api/v2/entries/en';

/** Outstanding dictionary lookups at any moment */
export const DEFAULT_LOOKUP_CONCURRENCY = 2;

/** Delay after each lookup, holding its concurrency slot */
export const DEFAULT_LOOKUP_DELAY_MS = 500;

export const DEFAULT_DICTIONARY_TIMEOUT_MS = 10_000;

export const DEFAULT_DICTIONARY_MAX_ATTEMPTS = 5;

// ============================================================================
// Generation
// ============================================================================

export const DEFAULT_GENERATION_MODEL = 'gpt-4o';

export const DEFAULT_GENERATION_TIMEOUT_MS = 180_000;

/** Attempts per word when the generation request times out */
export const DEFAULT_GENERATION_MAX_ATTEMPTS = 3;

/** Consecutive generation failures that abort the stage */
export const DEFAULT_CONSECUTIVE_FAILURE_THRESHOLD = 2;

/** Generated entries between periodic saves of the output artifact */
export const DEFAULT_SAVE_EVERY = 10;

/** One example sentence is generated per style */
export const EXAMPLE_STYLES = [
  'Formal',
  'Definitional',
  'Contrastive',
  'Collocational',
  'Philosophical',
  'Warm',
  'Poetic',
  'Inspirational',
  'News-like',
] as const;
