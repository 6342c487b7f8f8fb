/**
 * Schedule Command
 *
 * Runs blocks of batches at fixed trigger times between a start and an
 * end time, e.g. ten batches every five hours overnight.
 *
 * @module cli/commands/schedule
 */

import { Command } from 'commander';
import { BatchOrchestrator } from '../../pipeline/orchestrator.js';
import { StageRunner, createInProcessStages } from '../../pipeline/stage-runner.js';
import { formatScheduleTime, parseScheduleTime } from '../../scheduler/schedule.js';
import { Scheduler } from '../../scheduler/scheduler.js';
import { getLogFilePath } from '../../storage/paths.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import {
  formatBatchSummary,
  formatSchedulerSummary,
  logSummary,
  resumeCommand,
  type ResumeOptions,
} from '../formatters/summary.js';
import {
  countPartitionFolders,
  executeCommand,
  loadVocabulary,
  parseIntegerOption,
  parsePositiveNumberOption,
  resolveStageServices,
  type PipelineCommandDeps,
} from '../runtime.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the schedule command. Commander enforces the required ones.
 */
export interface ScheduleCommandOptions {
  startTime: string;
  endTime: string;
  /** Hours between runs, decimals allowed */
  interval: string;
  startBatch: string;
  /** Batches per run */
  batchCount: string;
  force?: boolean;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the schedule command.
 */
export function registerScheduleCommand(program: Command): void {
  program
    .command('schedule')
    .description('Run blocks of batches at fixed times')
    .requiredOption('--start-time <time>', "First run, 'YYYY-MM-DD HH:MM'")
    .requiredOption('--end-time <time>', "Last possible run, 'YYYY-MM-DD HH:MM'")
    .requiredOption('--interval <hours>', 'Hours between runs')
    .requiredOption('--start-batch <n>', 'First batch index of the first run')
    .requiredOption('--batch-count <n>', 'Batches per run')
    .option('-f, --force', 'Reprocess batches that already have valid output')
    .addHelpText(
      'after',
      `
Example:
  # Batches 20-29, 30-39, 40-49, 50-59 at 17:00, 22:00, 03:00, 08:00
  $ lexibatch schedule --start-time "2026-02-10 17:00" --end-time "2026-02-11 09:00" \\
      --interval 5 --start-batch 20 --batch-count 10`
    )
    .action(async (options: ScheduleCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await executeCommand(base, (signal) => handleSchedule(options, base, signal));
    });
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Handle the schedule command.
 *
 * @returns ERROR when any run failed, SUCCESS otherwise (including when
 * the whole window is already in the past)
 */
export async function handleSchedule(
  options: ScheduleCommandOptions,
  base: BaseCommand,
  signal: AbortSignal,
  deps: PipelineCommandDeps = {}
): Promise<ExitCode> {
  const clock = deps.clock ?? (() => new Date());
  const schedule = {
    startTime: parseScheduleTime(options.startTime),
    endTime: parseScheduleTime(options.endTime),
    intervalHours: parsePositiveNumberOption(options.interval, 'Interval'),
    startBatch: parseIntegerOption(options.startBatch, 'Start batch'),
    batchCount: parseIntegerOption(options.batchCount, 'Batch count', 1),
    force: options.force === true,
  };
  const config = base.loadConfig(deps.overrides);
  const logFile = getLogFilePath(config.paths, 'scheduler', clock());
  const logger = base.createLogger(logFile, 'scheduler');
  const resume: ResumeOptions = {
    mode: config.batch.mode,
    batchSize: config.batch.batchSize,
    dataDir: base.options.dataDir,
    force: schedule.force,
  };

  // Constructing the scheduler validates the window before any data loads.
  const scheduler = new Scheduler(schedule, (startBatch, count, force) => runBlock(startBatch, count, force), {
    clock,
    sleep: deps.sleep,
    logger,
    signal,
  });

  let orchestrator: BatchOrchestrator | undefined;

  // Built on the first block: an ended schedule loads no vocabulary and needs no API key.
  async function createOrchestrator(): Promise<BatchOrchestrator> {
    const vocabulary = await loadVocabulary(config);
    const services = resolveStageServices(config, logger, deps);
    const runner = new StageRunner(config, vocabulary, createInProcessStages(config, services, logger), {
      logger,
      signal,
      sleep: deps.sleep,
    });
    return new BatchOrchestrator(config, vocabulary, runner, {
      logger,
      signal,
      sleep: deps.sleep,
      resumeCommand: (batchIndex) => resumeCommand(batchIndex, resume),
    });
  }

  async function runBlock(startBatch: number, count: number, force: boolean): Promise<boolean> {
    if (!orchestrator) {
      orchestrator = await createOrchestrator();
    }
    const batchSummary = await orchestrator.runFrom(startBatch, { count, force });
    const folderCount = await countPartitionFolders(config.paths.finalDataDir);
    logSummary(logger, formatBatchSummary(batchSummary, folderCount, resume));
    return batchSummary.failed.length === 0;
  }

  logger.info(`Log file: ${logFile}`);
  scheduler.logPlan();
  logger.info(`Current time: ${formatScheduleTime(clock())}`);

  const summary = await scheduler.run();
  logSummary(logger, formatSchedulerSummary(summary));

  return summary.failed > 0 ? EXIT_CODES.ERROR : EXIT_CODES.SUCCESS;
}

export default registerScheduleCommand;
