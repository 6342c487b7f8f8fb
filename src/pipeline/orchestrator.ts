/**
 * Batch Orchestrator
 *
 * Walks batch indices in order and hands each partition to the Stage
 * Runner. The first failed batch ends the run: a batch that exhausted its
 * retries points at an outage, and later batches would fail the same way.
 *
 * @module pipeline/orchestrator
 */

import type { PipelineConfig } from '../config/index.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { SelectedWord } from '../schemas/vocabulary.js';
import { batchInfo, countItemsInPartition, totalBatchesFor, type Partition } from './partition.js';
import type { PartitionResult, StageRunner } from './stage-runner.js';
import { sleep as defaultSleep, throwIfAborted, type SleepFn } from './sleep.js';

// ============================================================================
// Types
// ============================================================================

export interface BatchRunOptions {
  /** Batch indices to visit, starting at `startBatch`. Default: all remaining */
  count?: number;
  /** Reprocess batches that already have valid output */
  force?: boolean;
}

export interface BatchRunSummary {
  startBatch: number;
  /** One past the last batch index visited */
  endBatch: number;
  totalBatches: number;
  /** Batches that ran to success or already had valid output */
  processed: number;
  /** Batches with no words */
  skipped: number;
  failed: Partition[];
  /** The run ended at a failed batch */
  stoppedEarly: boolean;
  results: PartitionResult[];
}

export interface BatchOrchestratorOptions {
  logger?: Logger;
  sleep?: SleepFn;
  signal?: AbortSignal;
  /** Called after each non-empty batch */
  onBatchComplete?: (result: PartitionResult) => void;
  /** Command line that resumes at a failed batch, for the stop message */
  resumeCommand?: (batchIndex: number) => string;
}

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * @example
 * ```typescript
 * const orchestrator = new BatchOrchestrator(config, vocabulary, runner, { logger, signal });
 * const summary = await orchestrator.runFrom(20, { count: 10 });
 * if (summary.failed.length > 0) process.exitCode = EXIT_CODES.ERROR;
 * ```
 */
export class BatchOrchestrator {
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly signal?: AbortSignal;
  private readonly onBatchComplete?: (result: PartitionResult) => void;
  private readonly resumeCommand?: (batchIndex: number) => string;

  constructor(
    private readonly config: PipelineConfig,
    private readonly vocabulary: readonly SelectedWord[],
    private readonly runner: Pick<StageRunner, 'runPartition'>,
    options: BatchOrchestratorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
    this.signal = options.signal;
    this.onBatchComplete = options.onBatchComplete;
    this.resumeCommand = options.resumeCommand;
  }

  /**
   * Total batches for the configured mode.
   */
  totalBatches(): number {
    const { mode, batchSize, maxFrequency } = this.config.batch;
    return totalBatchesFor(this.vocabulary, mode, batchSize, maxFrequency);
  }

  /**
   * Partition for a batch index in the configured mode.
   */
  partitionFor(batchIndex: number): Partition {
    const { mode, batchSize } = this.config.batch;
    return batchInfo(batchIndex, batchSize, mode, this.vocabulary.length);
  }

  /**
   * Process batches from `startBatch` until the end, `count` indices, or
   * the first failure.
   */
  async runFrom(startBatch: number, options: BatchRunOptions = {}): Promise<BatchRunSummary> {
    const total = this.totalBatches();
    const endBatch = options.count === undefined ? total : Math.min(total, startBatch + options.count);
    const force = options.force === true;

    const summary: BatchRunSummary = {
      startBatch,
      endBatch,
      totalBatches: total,
      processed: 0,
      skipped: 0,
      failed: [],
      stoppedEarly: false,
      results: [],
    };

    for (let batchIndex = startBatch; batchIndex < endBatch; batchIndex++) {
      throwIfAborted(this.signal);
      const partition = this.partitionFor(batchIndex);

      if (countItemsInPartition(this.vocabulary, partition) === 0) {
        summary.skipped++;
        continue;
      }

      const result = await this.runner.runPartition(partition, force);
      summary.results.push(result);
      this.onBatchComplete?.(result);

      if (result.state === 'failed') {
        summary.failed.push(partition);
        summary.stoppedEarly = true;
        this.logger.error('='.repeat(60));
        this.logger.error(
          `STOPPING: Batch ${batchIndex} (${partition.label}) failed to produce valid output`
        );
        this.logger.error('This likely indicates a systemic issue (rate limiting, API errors, etc.)');
        if (this.resumeCommand) {
          this.logger.error(`To resume from this batch, run: ${this.resumeCommand(batchIndex)}`);
        } else {
          this.logger.error(`Resume from batch ${batchIndex} with the same mode and batch size`);
        }
        this.logger.error('='.repeat(60));
        break;
      }

      summary.processed++;

      if (batchIndex + 1 < endBatch && this.config.batch.batchPauseMs > 0) {
        this.logger.info(`Waiting ${this.config.batch.batchPauseMs / 1000} seconds before next batch...`);
        await this.sleep(this.config.batch.batchPauseMs, this.signal);
      }
    }

    return summary;
  }
}
