/**
 * Step 2: Dictionary Enrichment
 *
 * Looks up phonetics and parts of speech for a slice of the selected words.
 * Lookups run through a ConcurrencyLimiter and each one holds its slot for
 * a short delay afterwards to stay under the dictionary's rate limit.
 *
 * A word the dictionary does not know, or a lookup that keeps failing,
 * still yields an entry with no phonetic and no parts of speech, so
 * generation can proceed for every word.
 *
 * @module stages/enrichment
 */

import type { PipelineConfig } from '../config/index.js';
import {
  DictionaryLookupError,
  WordNotFoundError,
  type DictionaryEntry,
  type DictionaryService,
} from '../clients/types.js';
import { CheckpointStore } from '../pipeline/checkpoint.js';
import type { RowRange } from '../pipeline/partition.js';
import { sleep as defaultSleep, throwIfAborted, type SleepFn } from '../pipeline/sleep.js';
import type { EnrichedWord, SelectedWord } from '../schemas/vocabulary.js';
import { getCheckpointPath } from '../storage/paths.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { ConcurrencyLimiter } from './concurrency.js';
import { loadEnrichedWords, loadSelectedWords, saveEnrichedWords } from './vocabulary.js';

// ============================================================================
// Types
// ============================================================================

export interface EnrichmentOptions {
  /** Rows of the vocabulary to enrich, end exclusive. Default: all rows */
  range?: RowRange;
  /** Skip words the checkpoint already holds and keep their saved entries */
  resume?: boolean;
  /** Only the first few words, when no range is given */
  dryRun?: boolean;
  /** Vocabulary file; defaults to the selected-words CSV */
  vocabularyPath?: string;
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
}

export interface EnrichmentServices {
  dictionary: DictionaryService;
  sleep?: SleepFn;
}

export interface EnrichmentResult {
  entries: EnrichedWord[];
  /** Words looked up during this run */
  lookedUp: number;
  withPhonetic: number;
  withPartsOfSpeech: number;
}

/**
 * Everything enrichWords needs besides the words themselves.
 */
export interface EnrichmentContext {
  dictionary: DictionaryService;
  checkpoint: CheckpointStore;
  concurrency: number;
  requestDelayMs: number;
  sleep: SleepFn;
  logger: Logger;
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
}

// ============================================================================
// Enrichment
// ============================================================================

function emptyEntry(word: string): EnrichedWord {
  return { word, phonetic: null, partsOfSpeech: [] };
}

/**
 * Look up one word, mapping dictionary failures to an empty entry.
 */
export async function enrichWord(
  word: string,
  dictionary: DictionaryService,
  logger: Logger = silentLogger,
  signal?: AbortSignal
): Promise<EnrichedWord> {
  let found: DictionaryEntry;
  try {
    found = await dictionary.lookup(word, signal);
  } catch (error) {
    if (error instanceof WordNotFoundError) {
      logger.debug(`  Not in dictionary: ${word}`);
      return emptyEntry(word);
    }
    if (error instanceof DictionaryLookupError) {
      logger.warn(`  Dictionary lookup failed for ${word}: ${error.message}`);
      return emptyEntry(word);
    }
    throw error;
  }
  return { word, phonetic: found.phonetic, partsOfSpeech: found.partsOfSpeech };
}

/**
 * Enrich the given words, recording each one in the checkpoint.
 *
 * @param words - Words paired with their row index in the vocabulary
 * @param results - Collected entries keyed by word; updated in place
 */
export async function enrichWords(
  words: ReadonlyArray<{ word: string; index: number }>,
  results: Map<string, EnrichedWord>,
  context: EnrichmentContext
): Promise<void> {
  const limiter = new ConcurrencyLimiter(context.concurrency, context.logger);
  let done = 0;

  await Promise.all(
    words.map(({ word, index }) =>
      limiter.run(async () => {
        throwIfAborted(context.signal);
        const entry = await enrichWord(word, context.dictionary, context.logger, context.signal);
        results.set(word, entry);
        await context.checkpoint.markProcessed(word, index);
        done++;
        context.onProgress?.(done, words.length);
        if (context.requestDelayMs > 0) {
          await context.sleep(context.requestDelayMs, context.signal);
        }
      })
    )
  );
}

/**
 * Run step 2 for a slice of the vocabulary and save the enriched words.
 *
 * The saved list follows vocabulary order and covers the whole slice,
 * including words restored from a previous run when resuming.
 */
export async function runEnrichmentStage(
  config: PipelineConfig,
  services: EnrichmentServices,
  options: EnrichmentOptions = {},
  logger: Logger = silentLogger
): Promise<EnrichmentResult> {
  logger.info('Step 2: Enriching words with dictionary data...');

  const vocabulary = await loadSelectedWords(options.vocabularyPath ?? config.paths.selectedWordsCsv);
  logger.info(`  Loaded ${vocabulary.length} selected words`);

  let start = 0;
  let slice: SelectedWord[];
  if (options.range) {
    start = options.range.start;
    slice = vocabulary.slice(options.range.start, options.range.end);
  } else if (options.dryRun) {
    slice = vocabulary.slice(0, config.dryRunLimit);
    logger.info(`  Dry run: processing ${slice.length} words`);
  } else {
    slice = vocabulary;
  }

  const checkpoint = new CheckpointStore(getCheckpointPath(config.paths, 'enrichment'), { logger });
  const results = new Map<string, EnrichedWord>();

  let pending = slice.map((item, offset) => ({ word: item.word, index: start + offset }));
  if (options.resume) {
    for (const entry of await loadEnrichedWords(config.paths.enrichedWordsJson)) {
      results.set(entry.word, entry);
    }
    const unprocessed = new Set(await checkpoint.unprocessedKeys(pending.map((p) => p.word)));
    pending = pending.filter((p) => unprocessed.has(p.word) || !results.has(p.word));
  }

  if (pending.length === 0) {
    logger.info('  No words to process (all already completed)');
  } else {
    logger.info(`  Processing ${pending.length} words...`);
    await enrichWords(pending, results, {
      dictionary: services.dictionary,
      checkpoint,
      concurrency: config.enrichment.concurrency,
      requestDelayMs: config.enrichment.requestDelayMs,
      sleep: services.sleep ?? defaultSleep,
      logger,
      signal: options.signal,
      onProgress: options.onProgress,
    });
  }

  const entries: EnrichedWord[] = [];
  const seen = new Set<string>();
  for (const item of slice) {
    const entry = results.get(item.word);
    if (entry && !seen.has(item.word)) {
      entries.push(entry);
      seen.add(item.word);
    }
  }

  await saveEnrichedWords(config.paths.enrichedWordsJson, entries);
  logger.info(`  Saved ${entries.length} enriched words to: ${config.paths.enrichedWordsJson}`);

  const withPhonetic = entries.filter((e) => e.phonetic).length;
  const withPartsOfSpeech = entries.filter((e) => e.partsOfSpeech.length > 0).length;
  logger.info(`  Words with phonetic: ${withPhonetic}/${entries.length}`);
  logger.info(`  Words with POS: ${withPartsOfSpeech}/${entries.length}`);

  return { entries, lookedUp: pending.length, withPhonetic, withPartsOfSpeech };
}
