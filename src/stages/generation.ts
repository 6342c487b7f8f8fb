/**
 * Step 3: Example Generation
 *
 * Generates a definition and example sentences for every enriched word and
 * writes them to a timestamped output artifact in the working data folder.
 *
 * Entries accumulate in a map keyed by word and are saved every few words.
 * When the generation service fails for several words in a row the stage
 * stops with a SystemicFailureError and leaves the artifact as it was at
 * the last periodic save.
 *
 * @module stages/generation
 */

import * as path from 'node:path';
import type { PipelineConfig } from '../config/index.js';
import { isGenerationError, type GenerationService } from '../clients/types.js';
import { loadPromptTemplate } from '../clients/generation/prompts.js';
import { SystemicFailureError } from '../errors.js';
import { CheckpointStore } from '../pipeline/checkpoint.js';
import { findArtifacts } from '../pipeline/output-validator.js';
import { throwIfAborted } from '../pipeline/sleep.js';
import type { FinalEntry, GenerationPayload } from '../schemas/entry.js';
import type { EnrichedWord } from '../schemas/vocabulary.js';
import { getCheckpointPath, getOutputArtifactPath } from '../storage/paths.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { loadEnrichedWords, loadFinalOutput, saveFinalOutput } from './vocabulary.js';

// ============================================================================
// Types
// ============================================================================

export interface GenerationStageOptions {
  /**
   * Skip words the checkpoint already holds and continue the latest
   * artifact in the working data folder
   */
  resume?: boolean;
  /** Only the first few enriched words */
  dryRun?: boolean;
  /** Artifact to write; a new timestamped file by default */
  outputPath?: string;
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
}

export interface GenerationServices {
  generator: GenerationService;
  /** Used to name new artifacts */
  clock?: () => Date;
}

export interface ValidationWarning {
  word: string;
  messages: string[];
}

export interface GenerationStageResult {
  outputPath: string;
  entries: FinalEntry[];
  /** Words generated during this run */
  generated: number;
  /** Words that failed during this run */
  failed: number;
  warnings: ValidationWarning[];
}

/**
 * Everything generateEntries needs besides the words themselves.
 */
export interface GenerationContext {
  generator: GenerationService;
  checkpoint: CheckpointStore;
  promptTemplate: string;
  outputPath: string;
  saveEvery: number;
  consecutiveFailureThreshold: number;
  exampleStyles: readonly string[];
  logger: Logger;
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
}

/** Validation warnings printed in the end-of-stage summary */
const WARNINGS_SHOWN = 5;

const EM_DASH = '—';

// ============================================================================
// Entries
// ============================================================================

/**
 * Combine enrichment data with generated content.
 */
export function createFinalEntry(enriched: EnrichedWord, generated: GenerationPayload): FinalEntry {
  return {
    word: enriched.word,
    phonetic: enriched.phonetic,
    partsOfSpeech: enriched.partsOfSpeech,
    selectedPartOfSpeech: generated.selectedPartOfSpeech,
    definition: generated.definition,
    examples: generated.examples,
  };
}

/**
 * Check a generated entry for content problems. Warnings never reject the
 * entry.
 *
 * @returns Warning messages; empty when the entry looks right
 */
export function validateEntry(entry: FinalEntry, exampleStyles: readonly string[]): string[] {
  const warnings: string[] = [];

  if (entry.examples.length !== exampleStyles.length) {
    warnings.push(`Expected ${exampleStyles.length} examples, got ${entry.examples.length}`);
  }

  entry.examples.forEach((example, i) => {
    if (example.translatedWord && !example.translation.includes(example.translatedWord)) {
      warnings.push(`Example ${i + 1}: translated word '${example.translatedWord}' not in translation`);
    }
    if (example.sentence.includes(EM_DASH) || example.translation.includes(EM_DASH)) {
      warnings.push(`Example ${i + 1}: contains em dash`);
    }
  });

  return warnings;
}

// ============================================================================
// Generation Loop
// ============================================================================

/**
 * Generate entries for the given words in order.
 *
 * @param entries - Accumulated entries keyed by word; updated in place and
 *   saved every `saveEvery` words and once at the end
 * @throws SystemicFailureError after `consecutiveFailureThreshold` failures
 *   in a row; nothing accumulated since the last periodic save is written
 */
export async function generateEntries(
  words: readonly EnrichedWord[],
  entries: Map<string, FinalEntry>,
  context: GenerationContext
): Promise<{ generated: number; failed: number; warnings: ValidationWarning[] }> {
  const { logger, checkpoint } = context;
  const total = words.length;
  const warnings: ValidationWarning[] = [];
  let generated = 0;
  let failed = 0;
  let consecutiveFailures = 0;

  for (const [i, enriched] of words.entries()) {
    throwIfAborted(context.signal);
    const position = `[${i + 1}/${total}]`;
    logger.debug(`  ${position} Processing: ${enriched.word}`);

    try {
      const payload = await context.generator.generate(
        enriched.word,
        enriched.partsOfSpeech,
        context.promptTemplate,
        context.signal
      );
      const entry = createFinalEntry(enriched, payload);
      entries.set(enriched.word, entry);
      await checkpoint.markProcessed(enriched.word, i);
      generated++;
      consecutiveFailures = 0;
      logger.info(`  ${position} Success: ${enriched.word}`);

      const messages = validateEntry(entry, context.exampleStyles);
      if (messages.length > 0) {
        warnings.push({ word: enriched.word, messages });
        logger.warn(`  ${position} Validation warning for ${enriched.word}: ${messages.join('; ')}`);
      }
    } catch (error) {
      if (!isGenerationError(error)) {
        throw error;
      }

      await checkpoint.markFailed(enriched.word);
      failed++;
      consecutiveFailures++;
      logger.error(`  ${position} Failed: ${enriched.word} - ${error.message}`);
      logger.warn(
        `  Consecutive generation failures: ${consecutiveFailures}/${context.consecutiveFailureThreshold}`
      );

      if (consecutiveFailures >= context.consecutiveFailureThreshold) {
        logger.error('  Stopping early due to consecutive failures. Partial results NOT saved.');
        throw new SystemicFailureError(
          `Stopping after ${consecutiveFailures} consecutive generation errors`,
          consecutiveFailures,
          { cause: error }
        );
      }
    }

    context.onProgress?.(i + 1, total);

    if ((i + 1) % context.saveEvery === 0) {
      await saveFinalOutput(context.outputPath, [...entries.values()]);
      logger.info(`  Checkpoint saved: ${entries.size} words`);
    }
  }

  await saveFinalOutput(context.outputPath, [...entries.values()]);
  return { generated, failed, warnings };
}

/**
 * Pick the artifact this run writes to.
 *
 * A resumed run continues the newest artifact left in the working data
 * folder, if any.
 */
async function resolveOutputPath(
  config: PipelineConfig,
  options: GenerationStageOptions,
  clock: () => Date
): Promise<string> {
  if (options.outputPath) {
    return options.outputPath;
  }
  if (options.resume) {
    const existing = await findArtifacts(config.paths.dataDir);
    const latest = existing[existing.length - 1];
    if (latest) {
      return latest;
    }
  }
  return getOutputArtifactPath(config.paths, clock());
}

/**
 * Run step 3 over the enriched words.
 *
 * @throws SystemicFailureError when the generation service keeps failing
 */
export async function runGenerationStage(
  config: PipelineConfig,
  services: GenerationServices,
  options: GenerationStageOptions = {},
  logger: Logger = silentLogger
): Promise<GenerationStageResult> {
  logger.info('Step 3: Generating examples...');

  const enrichedWords = await loadEnrichedWords(config.paths.enrichedWordsJson);
  logger.info(`  Loaded ${enrichedWords.length} enriched words`);

  const promptTemplate = await loadPromptTemplate(config.paths.promptTemplate);
  const outputPath = await resolveOutputPath(config, options, services.clock ?? (() => new Date()));
  const checkpoint = new CheckpointStore(getCheckpointPath(config.paths, 'generation'), { logger });

  const entries = new Map<string, FinalEntry>();
  if (options.resume) {
    for (const entry of await loadFinalOutput(outputPath)) {
      entries.set(entry.word, entry);
    }
  }

  let words = enrichedWords;
  if (options.dryRun) {
    words = words.slice(0, config.dryRunLimit);
    logger.info(`  Dry run: processing ${words.length} words`);
  }
  if (options.resume) {
    const unprocessed = new Set(await checkpoint.unprocessedKeys(words.map((w) => w.word)));
    words = words.filter((w) => unprocessed.has(w.word) || !entries.has(w.word));
  }

  if (words.length === 0) {
    logger.info('  No words to process (all already completed)');
    return { outputPath, entries: [...entries.values()], generated: 0, failed: 0, warnings: [] };
  }

  logger.info(`  Processing ${words.length} words...`);
  const outcome = await generateEntries(words, entries, {
    generator: services.generator,
    checkpoint,
    promptTemplate,
    outputPath,
    saveEvery: config.generation.saveEvery,
    consecutiveFailureThreshold: config.generation.consecutiveFailureThreshold,
    exampleStyles: config.generation.exampleStyles,
    logger,
    signal: options.signal,
    onProgress: options.onProgress,
  });

  logger.info(`  Saved ${entries.size} entries to: ${path.relative(config.paths.rootDir, outputPath)}`);
  logger.info(`  Successfully processed: ${await checkpoint.processedCount()}`);
  logger.info(`  Failed: ${await checkpoint.failedCount()}`);

  if (outcome.warnings.length > 0) {
    logger.warn(`Validation warnings (${outcome.warnings.length} words):`);
    for (const warning of outcome.warnings.slice(0, WARNINGS_SHOWN)) {
      logger.warn(`  ${warning.word}: ${warning.messages.join('; ')}`);
    }
    if (outcome.warnings.length > WARNINGS_SHOWN) {
      logger.warn(`  ... and ${outcome.warnings.length - WARNINGS_SHOWN} more`);
    }
  }

  return { outputPath, entries: [...entries.values()], ...outcome };
}
