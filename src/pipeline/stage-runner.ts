/**
 * Stage Runner
 *
 * Drives one partition through enrichment and generation with bounded
 * retries, then moves the artifacts it produced into the partition folder.
 *
 * ```
 * pending → attempting → success
 *              ↓  ↑
 *            retry → failed (attempts exhausted)
 * ```
 *
 * @module pipeline/stage-runner
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { PipelineConfig } from '../config/index.js';
import type { DictionaryService, GenerationService } from '../clients/types.js';
import { errorMessage, isAbortError } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { SelectedWord } from '../schemas/vocabulary.js';
import { runEnrichmentStage } from '../stages/enrichment.js';
import { runGenerationStage } from '../stages/generation.js';
import { moveFile } from '../storage/atomic.js';
import { CHECKPOINT_STAGES, getCheckpointPath, getPartitionDir } from '../storage/paths.js';
import { CheckpointStore } from './checkpoint.js';
import { findArtifacts, hasValidOutput, isValidArtifact } from './output-validator.js';
import { countItemsInPartition, rowRangeForPartition, type Partition, type RowRange } from './partition.js';
import { sleep as defaultSleep, throwIfAborted, type SleepFn } from './sleep.js';

// ============================================================================
// Types
// ============================================================================

export type PartitionState = 'pending' | 'attempting' | 'success' | 'retry' | 'failed';

/** Why a partition ended the way it did */
export type PartitionOutcome = 'empty' | 'existing_output' | 'generated' | 'exhausted';

export interface PartitionResult {
  partition: Partition;
  state: Extract<PartitionState, 'success' | 'failed'>;
  outcome: PartitionOutcome;
  itemCount: number;
  attempts: number;
  /** Artifacts moved into the partition folder */
  moved: string[];
}

/**
 * The two external stages as the runner sees them.
 */
export interface PartitionStages {
  /** Enrich the vocabulary rows in `range` */
  enrich(range: RowRange, resume: boolean, signal?: AbortSignal): Promise<void>;
  /** Generate entries for everything the last enrichment produced */
  generate(resume: boolean, signal?: AbortSignal): Promise<void>;
  /** Forget progress left by a previous partition */
  clearProgress(): Promise<void>;
}

/**
 * Callbacks for partition lifecycle events
 */
export interface StageRunnerCallbacks {
  onStateChange?: (partition: Partition, state: PartitionState, attempt: number) => void;
  onStageStart?: (stage: 'enrichment' | 'generation', attempt: number) => void;
}

export interface StageRunnerOptions {
  logger?: Logger;
  sleep?: SleepFn;
  signal?: AbortSignal;
  callbacks?: StageRunnerCallbacks;
}

// ============================================================================
// In-process Stages
// ============================================================================

export interface StageServices {
  dictionary: DictionaryService;
  generator: GenerationService;
  sleep?: SleepFn;
}

/**
 * PartitionStages that run the enrichment and generation stages in this
 * process against the configured data directory.
 */
export function createInProcessStages(
  config: PipelineConfig,
  services: StageServices,
  logger: Logger = silentLogger
): PartitionStages {
  return {
    async enrich(range, resume, signal) {
      await runEnrichmentStage(
        config,
        { dictionary: services.dictionary, sleep: services.sleep },
        { range, resume, signal },
        logger
      );
    },
    async generate(resume, signal) {
      await runGenerationStage(config, { generator: services.generator }, { resume, signal }, logger);
    },
    async clearProgress() {
      for (const stage of CHECKPOINT_STAGES) {
        await new CheckpointStore(getCheckpointPath(config.paths, stage), { logger }).reset();
        logger.debug(`Cleared checkpoint: ${stage}`);
      }
    },
  };
}

// ============================================================================
// Runner
// ============================================================================

/**
 * Runs partitions one at a time.
 *
 * @example
 * ```typescript
 * const runner = new StageRunner(config, vocabulary, createInProcessStages(config, services, logger), { logger });
 * const result = await runner.runPartition(batchInfo(1, 100), false);
 * ```
 */
export class StageRunner {
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly signal?: AbortSignal;
  private readonly callbacks: StageRunnerCallbacks;

  constructor(
    private readonly config: PipelineConfig,
    private readonly vocabulary: readonly SelectedWord[],
    private readonly stages: PartitionStages,
    options: StageRunnerOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
    this.signal = options.signal;
    this.callbacks = options.callbacks ?? {};
  }

  /**
   * Process one partition.
   *
   * Stage failures are retried; an AbortError from the signal propagates.
   *
   * @param force - Reprocess even if the partition folder holds valid output
   */
  async runPartition(partition: Partition, force: boolean): Promise<PartitionResult> {
    const { label, index } = partition;
    const tag = `[Batch ${index}] ${label}`;
    const itemCount = countItemsInPartition(this.vocabulary, partition);
    const done = (
      state: PartitionResult['state'],
      outcome: PartitionOutcome,
      attempts: number,
      moved: string[] = []
    ): PartitionResult => {
      this.callbacks.onStateChange?.(partition, state, attempts);
      return { partition, state, outcome, itemCount, attempts, moved };
    };

    this.callbacks.onStateChange?.(partition, 'pending', 0);

    const range = rowRangeForPartition(this.vocabulary, partition);
    if (itemCount === 0 || range === null) {
      this.logger.info(`${tag}: No words in range, skipping`);
      return done('success', 'empty', 0);
    }

    const partitionDir = getPartitionDir(this.config.paths, label);
    if (!force && (await hasValidOutput(partitionDir, itemCount, this.logger))) {
      this.logger.info(`${tag}: Already has valid output, skipping`);
      return done('success', 'existing_output', 0);
    }

    this.logger.info('='.repeat(60));
    this.logger.info(
      `Processing batch ${index}: ${label} (${itemCount} words, rows ${range.start}-${range.end})`
    );
    this.logger.info('='.repeat(60));

    await fs.mkdir(partitionDir, { recursive: true });
    await this.stages.clearProgress();
    await this.setAsideLeftovers();

    const { maxRetries } = this.config.batch;
    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      throwIfAborted(this.signal);
      this.callbacks.onStateChange?.(partition, 'attempting', attempt);
      this.logger.info(`Attempt ${attempt}/${maxRetries}`);
      const resume = attempt > 1;

      this.callbacks.onStageStart?.('enrichment', attempt);
      if (!(await this.runStage('Step 2 (enrichment)', () => this.stages.enrich(range, resume, this.signal)))) {
        await this.retryAfterBackoff(partition, attempt, 'Step 2 failed');
        continue;
      }

      this.callbacks.onStageStart?.('generation', attempt);
      if (!(await this.runStage('Step 3 (generation)', () => this.stages.generate(resume, this.signal)))) {
        await this.retryAfterBackoff(partition, attempt, 'Step 3 failed');
        continue;
      }

      const moved = await this.salvageArtifacts(partitionDir);
      if (moved.length > 0) {
        this.logger.info(`Batch ${label} completed successfully!`);
        return done('success', 'generated', attempt, moved);
      }

      await this.retryAfterBackoff(partition, attempt, 'No valid output produced');
    }

    this.logger.error(`FAILED: Batch ${label} failed after ${maxRetries} attempts`);
    return done('failed', 'exhausted', maxRetries);
  }

  /**
   * Run a stage, reporting failure as `false`. Aborts propagate.
   */
  private async runStage(description: string, run: () => Promise<void>): Promise<boolean> {
    try {
      await run();
      return true;
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      this.logger.error(`${description} failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private async retryAfterBackoff(partition: Partition, attempt: number, reason: string): Promise<void> {
    this.callbacks.onStateChange?.(partition, 'retry', attempt);
    if (attempt >= this.config.batch.maxRetries) {
      this.logger.warn(reason);
      return;
    }
    const seconds = this.config.batch.retryBackoffMs / 1000;
    this.logger.warn(`${reason}, retrying in ${seconds} seconds...`);
    await this.sleep(this.config.batch.retryBackoffMs, this.signal);
  }

  /**
   * Move artifacts left in the working data folder by an earlier partition
   * out of the way, so only this partition's output gets salvaged.
   */
  private async setAsideLeftovers(): Promise<void> {
    const leftovers = await findArtifacts(this.config.paths.dataDir);
    for (const artifact of leftovers) {
      const destination = path.join(this.config.paths.staleOutputDir, path.basename(artifact));
      await moveFile(artifact, destination);
      this.logger.warn(`Set aside leftover output file: ${artifact} -> ${destination}`);
    }
  }

  /**
   * Move every artifact with at least one entry from the working data
   * folder into the partition folder and delete the rest.
   *
   * @returns Destination paths of the moved artifacts
   */
  private async salvageArtifacts(partitionDir: string): Promise<string[]> {
    const artifacts = await findArtifacts(this.config.paths.dataDir);
    if (artifacts.length === 0) {
      this.logger.warn('No output file found!');
      return [];
    }

    const moved: string[] = [];
    for (const artifact of artifacts) {
      const check = await isValidArtifact(artifact);
      if (check.valid) {
        const destination = path.join(partitionDir, path.basename(artifact));
        await moveFile(artifact, destination);
        this.logger.info(`Moved: ${artifact} -> ${destination} (${check.count} words)`);
        moved.push(destination);
      } else {
        await fs.rm(artifact, { force: true });
        this.logger.warn(`Deleted empty output file: ${artifact}`);
      }
    }
    return moved;
  }
}
