/**
 * Run Command
 *
 * Runs pipeline steps directly, outside the batch loop:
 * 1. selection, 2. dictionary enrichment, 3. example generation.
 * A word range restricts enrichment to a slice of the vocabulary rows.
 *
 * @module cli/commands/run
 */

import { Command } from 'commander';
import type { PipelineConfig } from '../../config/index.js';
import { ConfigurationError, errorMessage, isAbortError } from '../../errors.js';
import type { Logger } from '../../logging/logger.js';
import type { RowRange } from '../../pipeline/partition.js';
import { runEnrichmentStage } from '../../stages/enrichment.js';
import { runGenerationStage } from '../../stages/generation.js';
import { runSelectionStage } from '../../stages/selection.js';
import { getLogFilePath } from '../../storage/paths.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { createSpinner, trackProgress, type ProgressCallback } from '../formatters/progress.js';
import {
  createDictionaryService,
  createGenerationService,
  executeCommand,
  parseIntegerOption,
  parseWordRange,
  type PipelineCommandDeps,
} from '../runtime.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the run command.
 */
export interface RunCommandOptions {
  /** First step to run (1-3) */
  startStep?: string;
  /** Last step to run (1-3) */
  endStep?: string;
  /** Row range `start-end`, end exclusive */
  wordRange?: string;
  /** Continue from the checkpoints */
  resume?: boolean;
  /** Process only the first few words */
  dryRun?: boolean;
  /** Vocabulary file (.csv or .txt) for step 2 instead of the selected words */
  vocabulary?: string;
}

export type PipelineStep = 1 | 2 | 3;

export interface StepRange {
  startStep: PipelineStep;
  endStep: PipelineStep;
}

const FIRST_STEP: PipelineStep = 1;
const LAST_STEP: PipelineStep = 3;

/** Without --start-step the run begins at enrichment; selection has its own command. */
const DEFAULT_START_STEP: PipelineStep = 2;

// ============================================================================
// Helper Functions
// ============================================================================

function toStep(value: number, name: string): PipelineStep {
  if (value === 1 || value === 2 || value === 3) {
    return value;
  }
  throw new ConfigurationError(`${name} must be between ${FIRST_STEP} and ${LAST_STEP} (got ${value})`);
}

/**
 * Resolve and check the step window.
 *
 * @throws ConfigurationError when a step is out of range or the window is empty
 */
export function parseStepRange(options: Pick<RunCommandOptions, 'startStep' | 'endStep'>): StepRange {
  const startStep =
    options.startStep === undefined
      ? DEFAULT_START_STEP
      : toStep(parseIntegerOption(options.startStep, 'Start step', FIRST_STEP), 'Start step');
  const endStep =
    options.endStep === undefined
      ? LAST_STEP
      : toStep(parseIntegerOption(options.endStep, 'End step', FIRST_STEP), 'End step');

  if (endStep < startStep) {
    throw new ConfigurationError(`End step (${endStep}) must not be before start step (${startStep})`);
  }
  return { startStep, endStep };
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the run command.
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run pipeline steps: 1 selection, 2 enrichment, 3 generation')
    .option('--start-step <n>', 'First step to run (default: 2)')
    .option('--end-step <n>', 'Last step to run (default: 3)')
    .option('-r, --word-range <range>', "Vocabulary rows to enrich, e.g. '0-100' (0-based, end exclusive)")
    .option('--resume', 'Resume from checkpoint')
    .option('--dry-run', 'Process only the first few words for testing')
    .option('--vocabulary <path>', 'Vocabulary file (.csv or .txt) for step 2')
    .addHelpText(
      'after',
      `
Examples:
  $ lexibatch run --dry-run                 Enrich and generate 10 words
  $ lexibatch run --start-step 1            Select words, then enrich and generate
  $ lexibatch run --word-range 0-100        Rows 0-99 only
  $ lexibatch run --resume                  Continue after an interruption`
    )
    .action(async (options: RunCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await executeCommand(base, (signal) => handleRun(options, base, signal));
    });
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Handle the run command.
 *
 * Step failures are logged with a hint to resume; an interrupt yields
 * CANCELLED after the same hint.
 */
export async function handleRun(
  options: RunCommandOptions,
  base: BaseCommand,
  signal: AbortSignal,
  deps: PipelineCommandDeps = {}
): Promise<ExitCode> {
  const steps = parseStepRange(options);
  const range = options.wordRange === undefined ? undefined : parseWordRange(options.wordRange);
  const config = base.loadConfig(deps.overrides);

  // On a TTY the spinner replaces the info lines; they still reach the log file.
  const useSpinner = process.stdout.isTTY === true && !base.isVerbose() && !base.isQuiet();
  const logFile = getLogFilePath(config.paths, 'run', deps.clock?.());
  const logger = base.createLogger(logFile, 'pipeline', useSpinner);
  logger.info(`Log file: ${logFile}`);

  logger.info('='.repeat(60));
  logger.info('Vocabulary Pipeline');
  logger.info('='.repeat(60));
  logger.info(`Steps: ${steps.startStep} to ${steps.endStep}`);
  if (range) {
    logger.info(`Word range: ${range.start} to ${range.end}`);
  }
  if (options.resume) {
    logger.info('Mode: Resume from checkpoint');
  }
  if (options.dryRun) {
    logger.info(`Mode: Dry run (${config.dryRunLimit} words)`);
  }
  logger.info('='.repeat(60));

  try {
    await runSteps(config, steps, { ...options, range }, logger, signal, deps, useSpinner);
  } catch (error) {
    if (isAbortError(error)) {
      logger.warn('Pipeline interrupted by user.');
      logger.warn('Progress has been saved. Use --resume to continue.');
      return EXIT_CODES.CANCELLED;
    }
    if (error instanceof ConfigurationError) {
      throw error;
    }
    logger.error(`Pipeline error: ${errorMessage(error)}`);
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    logger.warn('Progress has been saved. Use --resume to continue.');
    return EXIT_CODES.ERROR;
  }

  logger.info('='.repeat(60));
  logger.info('Pipeline completed successfully!');
  logger.info('='.repeat(60));
  if (useSpinner) {
    base.success(`Pipeline completed. Log: ${logFile}`);
  }
  return EXIT_CODES.SUCCESS;
}

interface StepOptions {
  range?: RowRange;
  resume?: boolean;
  dryRun?: boolean;
  vocabulary?: string;
}

async function runSteps(
  config: PipelineConfig,
  steps: StepRange,
  options: StepOptions,
  logger: Logger,
  signal: AbortSignal,
  deps: PipelineCommandDeps,
  useSpinner: boolean
): Promise<void> {
  const includes = (step: PipelineStep): boolean => step >= steps.startStep && step <= steps.endStep;

  // Built up front so a missing API key fails before any step runs.
  const dictionary = includes(2) ? (deps.dictionary ?? createDictionaryService(config, logger)) : undefined;
  const generator = includes(3) ? (deps.generator ?? createGenerationService(config, logger)) : undefined;

  if (includes(1)) {
    await withSpinner(useSpinner, 'Selecting words', () => runSelectionStage(config, logger));
  }

  if (dictionary) {
    await withSpinner(useSpinner, 'Enriching words', (onProgress) =>
      runEnrichmentStage(
        config,
        { dictionary, sleep: deps.sleep },
        {
          range: options.range,
          resume: options.resume,
          dryRun: options.dryRun,
          vocabularyPath: options.vocabulary,
          signal,
          onProgress,
        },
        logger
      )
    );
  }

  if (generator) {
    const result = await withSpinner(useSpinner, 'Generating examples', (onProgress) =>
      runGenerationStage(
        config,
        { generator, clock: deps.clock },
        { resume: options.resume, dryRun: options.dryRun, signal, onProgress },
        logger
      )
    );
    logger.info(`Output: ${result.outputPath}`);
  }
}

/**
 * Run one step, mirrored by a spinner when enabled.
 */
async function withSpinner<T>(
  enabled: boolean,
  label: string,
  run: (onProgress?: ProgressCallback) => Promise<T>
): Promise<T> {
  if (!enabled) {
    return run();
  }

  const spinner = createSpinner(`${label}...`).start();
  try {
    const result = await run(trackProgress(spinner, label));
    spinner.succeed(`${label} complete`);
    return result;
  } catch (error) {
    spinner.fail(`${label} failed`);
    throw error;
  }
}

export default registerRunCommand;
