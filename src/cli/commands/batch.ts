/**
 * Batch Command
 *
 * Processes partitions of the selected vocabulary from a start batch
 * onward, one after the other, stopping at the first batch that fails.
 *
 * @module cli/commands/batch
 */

import { Command } from 'commander';
import type { BatchSettings, PartitionMode } from '../../config/index.js';
import { ConfigurationError } from '../../errors.js';
import { BatchOrchestrator } from '../../pipeline/orchestrator.js';
import { StageRunner, createInProcessStages } from '../../pipeline/stage-runner.js';
import { getLogFilePath } from '../../storage/paths.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { formatBatchSummary, logSummary, resumeCommand, type ResumeOptions } from '../formatters/summary.js';
import {
  countPartitionFolders,
  executeCommand,
  loadVocabulary,
  parseIntegerOption,
  resolveStageServices,
  type PipelineCommandDeps,
} from '../runtime.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the batch command.
 */
export interface BatchCommandOptions {
  /** Number of batch indices to visit */
  count?: string;
  /** Reprocess batches that already have valid output */
  force?: boolean;
  /** Partition by frequency value or by row */
  mode?: string;
  /** Frequencies or rows per batch */
  batchSize?: string;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * @throws ConfigurationError for anything but frequency or row
 */
export function parsePartitionMode(value: string): PartitionMode {
  if (value === 'frequency' || value === 'row') {
    return value;
  }
  throw new ConfigurationError(`Invalid mode: ${value}. Use "frequency" or "row"`);
}

/**
 * Batch settings set on the command line. Unset options are left out so
 * the configuration defaults apply.
 */
export function batchOverrides(options: BatchCommandOptions): Partial<BatchSettings> {
  const batch: Partial<BatchSettings> = {};
  if (options.mode !== undefined) {
    batch.mode = parsePartitionMode(options.mode);
  }
  if (options.batchSize !== undefined) {
    batch.batchSize = parseIntegerOption(options.batchSize, 'Batch size', 1);
  }
  return batch;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the batch command.
 */
export function registerBatchCommand(program: Command): void {
  program
    .command('batch [startBatch]')
    .description('Process vocabulary batches from a start index, stopping at the first failure')
    .option('-n, --count <n>', 'Number of batches to process (default: all remaining)')
    .option('-f, --force', 'Reprocess batches that already have valid output')
    .option('-m, --mode <mode>', 'Partition by "frequency" value or by "row"')
    .option('-b, --batch-size <n>', 'Frequencies (or rows) per batch')
    .addHelpText(
      'after',
      `
Examples:
  $ lexibatch batch                 Process every batch
  $ lexibatch batch 20 --count 10   Process batches 20-29
  $ lexibatch batch 5 --force       Redo batch 5 onward even if output exists`
    )
    .action(async (startBatch: string | undefined, options: BatchCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await executeCommand(base, (signal) => handleBatch(startBatch, options, base, signal));
    });
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Handle the batch command.
 *
 * @returns ERROR when a batch failed, SUCCESS otherwise
 */
export async function handleBatch(
  startBatchArg: string | undefined,
  options: BatchCommandOptions,
  base: BaseCommand,
  signal: AbortSignal,
  deps: PipelineCommandDeps = {}
): Promise<ExitCode> {
  const startBatch = startBatchArg === undefined ? 0 : parseIntegerOption(startBatchArg, 'Start batch');
  const count = options.count === undefined ? undefined : parseIntegerOption(options.count, 'Count', 1);
  const config = base.loadConfig({
    ...deps.overrides,
    batch: { ...deps.overrides?.batch, ...batchOverrides(options) },
  });

  const logFile = getLogFilePath(config.paths, `batch_from_${startBatch}`);
  const logger = base.createLogger(logFile, 'batch');
  logger.info(`Log file: ${logFile}`);

  const { mode, batchSize, maxFrequency } = config.batch;
  logger.info('='.repeat(60));
  if (mode === 'frequency') {
    logger.info('Batch Processing (by Frequency)');
    logger.info('='.repeat(60));
    logger.info(`Frequency range: 1 to ${maxFrequency}`);
    logger.info(`Batch size: ${batchSize} frequencies per batch`);
  } else {
    logger.info('Batch Processing (by Row)');
    logger.info('='.repeat(60));
    logger.info(`Batch size: ${batchSize} words per batch`);
  }

  logger.info('Loading selected words...');
  const vocabulary = await loadVocabulary(config);
  const services = resolveStageServices(config, logger, deps);

  const runner = new StageRunner(config, vocabulary, createInProcessStages(config, services, logger), {
    logger,
    signal,
    sleep: deps.sleep,
  });
  const resume: ResumeOptions = { mode, batchSize, dataDir: base.options.dataDir, force: options.force };
  const orchestrator = new BatchOrchestrator(config, vocabulary, runner, {
    logger,
    signal,
    sleep: deps.sleep,
    resumeCommand: (batchIndex) => resumeCommand(batchIndex, resume),
  });

  const totalBatches = orchestrator.totalBatches();
  logger.info(`Total batches: ${totalBatches}`);
  logger.info(`Output directory: ${config.paths.finalDataDir}`);
  logger.info(`Starting from batch: ${startBatch}`);
  if (options.force) {
    logger.info('Force mode: will reprocess all batches');
  }
  logger.info(`Total words loaded: ${vocabulary.length}`);
  logger.info('='.repeat(60));

  if (startBatch >= totalBatches) {
    logger.warn(`Start batch ${startBatch} is past the last batch (${totalBatches} in total). Nothing to do.`);
    return EXIT_CODES.SUCCESS;
  }

  const summary = await orchestrator.runFrom(startBatch, { count, force: options.force === true });
  logSummary(logger, formatBatchSummary(summary, await countPartitionFolders(config.paths.finalDataDir), resume));

  return summary.failed.length > 0 ? EXIT_CODES.ERROR : EXIT_CODES.SUCCESS;
}

export default registerBatchCommand;
