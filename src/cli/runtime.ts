/**
 * Command Runtime
 *
 * Plumbing shared by the pipeline commands: numeric option parsing,
 * interrupt handling, and construction of the external service clients.
 *
 * @module cli/runtime
 */

import * as fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { FreeDictionaryClient } from '../clients/dictionary/index.js';
import { OpenAIGenerationClient } from '../clients/generation/index.js';
import type { DictionaryService, GenerationService } from '../clients/types.js';
import { requireApiKey, type PipelineConfig, type PipelineConfigOverrides } from '../config/index.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { RowRange } from '../pipeline/partition.js';
import type { SleepFn } from '../pipeline/sleep.js';
import type { StageServices } from '../pipeline/stage-runner.js';
import type { SelectedWord } from '../schemas/vocabulary.js';
import { loadSelectedWords } from '../stages/vocabulary.js';
import { fileExists } from '../storage/atomic.js';
import { EXIT_CODES, exitCodeFor, type BaseCommand, type ExitCode } from './base-command.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Seams for the pipeline commands. Anything left out is built from the
 * configuration.
 */
export interface PipelineCommandDeps {
  /** Merged under the overrides a command derives from its options */
  overrides?: Omit<PipelineConfigOverrides, 'dataDir'>;
  dictionary?: DictionaryService;
  generator?: GenerationService;
  sleep?: SleepFn;
  clock?: () => Date;
}

// ============================================================================
// Option Parsing
// ============================================================================

/**
 * Parse an integer CLI value.
 *
 * @throws ConfigurationError when the value is not an integer `>= min`
 */
export function parseIntegerOption(value: string, name: string, min = 0): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(parsed) || parsed < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min} (got "${value}")`);
  }
  return parsed;
}

/**
 * Parse a positive decimal CLI value, such as an interval in hours.
 *
 * @throws ConfigurationError when the value is not a number above zero
 */
export function parsePositiveNumberOption(value: string, name: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive number (got "${value}")`);
  }
  return parsed;
}

/**
 * Parse a `start-end` row range. The end is exclusive.
 *
 * @example
 * parseWordRange('200-300'); // { start: 200, end: 300 }
 */
export function parseWordRange(value: string): RowRange {
  const parts = value.split('-');
  const [startText, endText] = parts;
  if (parts.length !== 2 || startText === undefined || endText === undefined) {
    throw new ConfigurationError(`Invalid range format: ${value}. Use format: start-end`);
  }

  const start = parseIntegerOption(startText, 'Range start');
  const end = parseIntegerOption(endText, 'Range end');
  if (end < start) {
    throw new ConfigurationError(`Invalid range: ${value}. End must not be before start`);
  }
  return { start, end };
}

// ============================================================================
// Services
// ============================================================================

export function createDictionaryService(config: PipelineConfig, logger: Logger): DictionaryService {
  const { dictionaryApiUrl, timeoutMs, maxAttempts } = config.enrichment;
  return new FreeDictionaryClient({ baseUrl: dictionaryApiUrl, timeoutMs, maxAttempts, logger });
}

/**
 * @throws ConfigurationError when no API key is configured
 */
export function createGenerationService(config: PipelineConfig, logger: Logger): GenerationService {
  const { model, timeoutMs, maxAttempts } = config.generation;
  return new OpenAIGenerationClient({ apiKey: requireApiKey(config), model, timeoutMs, maxAttempts, logger });
}

/**
 * Dictionary and generation services for the batch commands.
 *
 * @throws ConfigurationError when no API key is configured and no generator is injected
 */
export function resolveStageServices(
  config: PipelineConfig,
  logger: Logger,
  deps: PipelineCommandDeps
): StageServices {
  return {
    dictionary: deps.dictionary ?? createDictionaryService(config, logger),
    generator: deps.generator ?? createGenerationService(config, logger),
    sleep: deps.sleep,
  };
}

/**
 * Load the selected words the batch commands partition.
 *
 * @throws ConfigurationError when step 1 has not produced the file yet
 */
export async function loadVocabulary(config: PipelineConfig): Promise<SelectedWord[]> {
  const filePath = config.paths.selectedWordsCsv;
  if (!(await fileExists(filePath))) {
    throw new ConfigurationError(`Selected words not found: ${filePath}. Run "lexibatch select" first.`);
  }
  return loadSelectedWords(filePath);
}

// ============================================================================
// Output Verification
// ============================================================================

/**
 * Number of partition folders under final_data/.
 */
export async function countPartitionFolders(finalDataDir: string): Promise<number> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(finalDataDir, { withFileTypes: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return 0;
    }
    throw error;
  }
  return entries.filter((entry) => entry.isDirectory()).length;
}

// ============================================================================
// Execution
// ============================================================================

/**
 * Handler for a pipeline command. Resolves to the process exit code.
 */
export type CommandHandler = (signal: AbortSignal) => Promise<ExitCode>;

/**
 * Run a command handler with SIGINT wired to an AbortSignal.
 *
 * The first interrupt aborts the signal so in-flight work stops at its next
 * suspension point with checkpoints intact; a second one exits at once.
 * The exit code is left in `process.exitCode`.
 */
export async function executeCommand(base: BaseCommand, handler: CommandHandler): Promise<ExitCode> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      process.exit(EXIT_CODES.CANCELLED);
    }
    base.warn('Interrupt received, stopping...');
    controller.abort();
  };

  process.on('SIGINT', onInterrupt);
  let code: ExitCode;
  try {
    code = await handler(controller.signal);
  } catch (error) {
    code = exitCodeFor(error);
    if (code === EXIT_CODES.CANCELLED) {
      base.printError('Interrupted by user. Progress has been saved.');
    } else {
      base.printError(errorMessage(error), error);
    }
  } finally {
    process.off('SIGINT', onInterrupt);
  }

  process.exitCode = code;
  return code;
}
