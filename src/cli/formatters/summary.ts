/**
 * Summary Formatters
 *
 * End-of-run summaries for the batch and schedule commands. Each formatter
 * returns leveled lines so the caller can route them through its logger,
 * which keeps the summary in the log file as well as on the terminal.
 *
 * @module cli/formatters/summary
 */

import { DEFAULT_BATCH_SIZE, type PartitionMode } from '../../config/index.js';
import type { LogLevel, Logger } from '../../logging/logger.js';
import type { BatchRunSummary } from '../../pipeline/orchestrator.js';
import type { SchedulerSummary } from '../../scheduler/scheduler.js';

// ============================================================================
// Types
// ============================================================================

export interface SummaryLine {
  level: Exclude<LogLevel, 'debug'>;
  text: string;
}

/**
 * Settings a resumed run must repeat to land on the same partitions.
 */
export interface ResumeOptions {
  mode?: PartitionMode;
  batchSize?: number;
  /** Data directory given on the command line */
  dataDir?: string;
  force?: boolean;
}

const RULE = '='.repeat(60);
const THIN_RULE = '-'.repeat(40);

const info = (text: string): SummaryLine => ({ level: 'info', text });
const warn = (text: string): SummaryLine => ({ level: 'warn', text });

// ============================================================================
// Batch Summary
// ============================================================================

/**
 * Summary printed after `lexibatch batch`.
 *
 * @param folderCount - Partition folders present under final_data/
 *
 * @example
 * ```
 * ============================================================
 * BATCH PROCESSING COMPLETE
 * ============================================================
 * Processed: 3 batches
 * Skipped (empty): 1 batches
 * Failed: 0 batches
 * All batches completed successfully!
 * ----------------------------------------
 * Verification:
 *   Output folders created: 3
 * ```
 */
export function formatBatchSummary(
  summary: BatchRunSummary,
  folderCount: number,
  resume: ResumeOptions = {}
): SummaryLine[] {
  const lines: SummaryLine[] = [
    info(RULE),
    info(summary.stoppedEarly ? 'BATCH PROCESSING STOPPED (due to failure)' : 'BATCH PROCESSING COMPLETE'),
    info(RULE),
    info(`Processed: ${summary.processed} batches`),
    info(`Skipped (empty): ${summary.skipped} batches`),
    info(`Failed: ${summary.failed.length} batches`),
  ];

  const firstFailed = summary.failed[0];
  if (firstFailed) {
    lines.push(warn('Failed batches:'));
    for (const partition of summary.failed) {
      lines.push(warn(`  - Batch ${partition.index}: ${partition.label}`));
    }
    lines.push(info('To resume, run:'));
    lines.push(info(`  ${resumeCommand(firstFailed.index, resume)}`));
  } else {
    lines.push(info('All batches completed successfully!'));
  }

  lines.push(info(THIN_RULE));
  lines.push(info('Verification:'));
  lines.push(info(`  Output folders created: ${folderCount}`));
  return lines;
}

/**
 * Command that continues batch processing at `batchIndex`. Mode and batch
 * size appear only when they differ from the defaults.
 *
 * @example
 * ```typescript
 * resumeCommand(3, { mode: 'row', batchSize: 50 });
 * // 'lexibatch batch 3 --mode row --batch-size 50'
 * ```
 */
export function resumeCommand(batchIndex: number, options: ResumeOptions = {}): string {
  const args = ['lexibatch'];
  if (options.dataDir !== undefined) {
    args.push('--data-dir', shellQuote(options.dataDir));
  }
  args.push('batch', String(batchIndex));
  if (options.mode !== undefined && options.mode !== 'frequency') {
    args.push('--mode', options.mode);
  }
  if (options.batchSize !== undefined && options.batchSize !== DEFAULT_BATCH_SIZE) {
    args.push('--batch-size', String(options.batchSize));
  }
  if (options.force === true) {
    args.push('--force');
  }
  return args.join(' ');
}

function shellQuote(value: string): string {
  return /^[\w@%+=:,./-]+$/.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`;
}

// ============================================================================
// Scheduler Summary
// ============================================================================

/**
 * Summary printed after `lexibatch schedule`.
 */
export function formatSchedulerSummary(summary: SchedulerSummary): SummaryLine[] {
  if (summary.nothingToDo) {
    return [];
  }

  const lines: SummaryLine[] = [
    info(RULE),
    info('SCHEDULED BATCH PROCESSING COMPLETE'),
    info(RULE),
    info(`Successful runs: ${summary.successful}`),
    info(`Failed runs: ${summary.failed}`),
    info(`Skipped runs: ${summary.skipped}`),
    info(`Total scheduled: ${summary.total}`),
  ];

  if (summary.failed > 0) {
    lines.push(warn('Some runs failed. Check the batch output above for details.'));
  } else {
    lines.push(info('All runs completed successfully!'));
  }
  return lines;
}

// ============================================================================
// Output
// ============================================================================

/**
 * Send summary lines to a logger at their levels.
 */
export function logSummary(logger: Logger, lines: readonly SummaryLine[]): void {
  for (const line of lines) {
    logger[line.level](line.text);
  }
}
