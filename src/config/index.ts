/**
 * Configuration Module
 *
 * Loads and validates environment variables and builds the immutable
 * PipelineConfig that every component receives at construction time.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { getDataDir, resolvePaths, type PipelinePaths } from '../storage/paths.js';
import {
  DEFAULT_BATCH_PAUSE_MS,
  DEFAULT_BATCH_SIZE,
  DEFAULT_CONSECUTIVE_FAILURE_THRESHOLD,
  DEFAULT_DICTIONARY_API_URL,
  DEFAULT_DICTIONARY_MAX_ATTEMPTS,
  DEFAULT_DICTIONARY_TIMEOUT_MS,
  DEFAULT_GENERATION_MAX_ATTEMPTS,
  DEFAULT_GENERATION_MODEL,
  DEFAULT_GENERATION_TIMEOUT_MS,
  DEFAULT_LOOKUP_CONCURRENCY,
  DEFAULT_LOOKUP_DELAY_MS,
  DEFAULT_MAX_FREQUENCY,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_BACKOFF_MS,
  DEFAULT_SAVE_EVERY,
  DRY_RUN_LIMIT,
  EXAMPLE_STYLES,
} from './defaults.js';

// Environment schema with optional values and defaults
const envSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),

  // Data directory
  LEXIBATCH_DATA_DIR: z.string().optional(),

  // Service overrides
  GENERATION_MODEL: z.string().optional(),
  DICTIONARY_API_URL: z.string().url().optional(),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate environment variables.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const details = parseResult.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment variables: ${details}`);
  }

  return parseResult.data;
}

// ============================================================================
// Pipeline Configuration
// ============================================================================

/** How batch indices map onto the vocabulary */
export type PartitionMode = 'frequency' | 'row';

export interface BatchSettings {
  mode: PartitionMode;
  batchSize: number;
  /** Upper frequency bound in frequency mode */
  maxFrequency: number;
  maxRetries: number;
  retryBackoffMs: number;
  batchPauseMs: number;
}

export interface EnrichmentSettings {
  dictionaryApiUrl: string;
  concurrency: number;
  requestDelayMs: number;
  timeoutMs: number;
  maxAttempts: number;
}

export interface GenerationSettings {
  apiKey?: string;
  model: string;
  timeoutMs: number;
  maxAttempts: number;
  consecutiveFailureThreshold: number;
  saveEvery: number;
  exampleStyles: readonly string[];
}

/**
 * Configuration passed explicitly into every pipeline component.
 */
export interface PipelineConfig {
  paths: PipelinePaths;
  batch: BatchSettings;
  enrichment: EnrichmentSettings;
  generation: GenerationSettings;
  dryRunLimit: number;
}

export interface PipelineConfigOverrides {
  dataDir?: string;
  batch?: Partial<BatchSettings>;
  enrichment?: Partial<EnrichmentSettings>;
  generation?: Partial<GenerationSettings>;
  dryRunLimit?: number;
}

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer (got ${value})`);
  }
}

function assertNonNegative(value: number, name: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be zero or greater (got ${value})`);
  }
}

/**
 * Build a validated, frozen pipeline configuration.
 *
 * @example
 * const config = createPipelineConfig({ dataDir: '/tmp/vocab', batch: { retryBackoffMs: 0 } });
 */
export function createPipelineConfig(
  overrides: PipelineConfigOverrides = {},
  env: Env = loadEnv()
): PipelineConfig {
  const batch: BatchSettings = {
    mode: 'frequency',
    batchSize: DEFAULT_BATCH_SIZE,
    maxFrequency: DEFAULT_MAX_FREQUENCY,
    maxRetries: DEFAULT_MAX_RETRIES,
    retryBackoffMs: DEFAULT_RETRY_BACKOFF_MS,
    batchPauseMs: DEFAULT_BATCH_PAUSE_MS,
    ...overrides.batch,
  };
  const enrichment: EnrichmentSettings = {
    dictionaryApiUrl: env.DICTIONARY_API_URL ?? DEFAULT_DICTIONARY_API_URL,
    concurrency: DEFAULT_LOOKUP_CONCURRENCY,
    requestDelayMs: DEFAULT_LOOKUP_DELAY_MS,
    timeoutMs: DEFAULT_DICTIONARY_TIMEOUT_MS,
    maxAttempts: DEFAULT_DICTIONARY_MAX_ATTEMPTS,
    ...overrides.enrichment,
  };
  const generation: GenerationSettings = {
    apiKey: env.OPENAI_API_KEY,
    model: env.GENERATION_MODEL ?? DEFAULT_GENERATION_MODEL,
    timeoutMs: DEFAULT_GENERATION_TIMEOUT_MS,
    maxAttempts: DEFAULT_GENERATION_MAX_ATTEMPTS,
    consecutiveFailureThreshold: DEFAULT_CONSECUTIVE_FAILURE_THRESHOLD,
    saveEvery: DEFAULT_SAVE_EVERY,
    exampleStyles: EXAMPLE_STYLES,
    ...overrides.generation,
  };
  const dryRunLimit = overrides.dryRunLimit ?? DRY_RUN_LIMIT;

  assertPositiveInteger(batch.batchSize, 'batch size');
  assertPositiveInteger(batch.maxFrequency, 'max frequency');
  assertPositiveInteger(batch.maxRetries, 'max retries');
  assertNonNegative(batch.retryBackoffMs, 'retry backoff');
  assertNonNegative(batch.batchPauseMs, 'batch pause');
  assertPositiveInteger(enrichment.concurrency, 'lookup concurrency');
  assertNonNegative(enrichment.requestDelayMs, 'lookup delay');
  assertPositiveInteger(enrichment.maxAttempts, 'dictionary attempts');
  assertPositiveInteger(generation.maxAttempts, 'generation attempts');
  assertPositiveInteger(generation.consecutiveFailureThreshold, 'consecutive failure threshold');
  assertPositiveInteger(generation.saveEvery, 'save interval');
  assertPositiveInteger(dryRunLimit, 'dry run limit');

  return Object.freeze({
    paths: resolvePaths(overrides.dataDir ?? getDataDir(env.LEXIBATCH_DATA_DIR)),
    batch: Object.freeze(batch),
    enrichment: Object.freeze(enrichment),
    generation: Object.freeze(generation),
    dryRunLimit,
  });
}

/**
 * Get the generation API key or throw if not configured.
 */
export function requireApiKey(config: PipelineConfig): string {
  const key = config.generation.apiKey;
  if (!key) {
    throw new ConfigurationError(
      'Missing required API key: OPENAI_API_KEY. Please set it in your .env file.'
    );
  }
  return key;
}

export * from './defaults.js';
