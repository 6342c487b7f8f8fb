/**
 * Time-Bucket Scheduler
 *
 * Runs a block of batches at each trigger time. Runs happen one after the
 * other; a run that overlaps later trigger times causes those buckets to be
 * skipped, not queued. A failed run is recorded and the schedule goes on.
 *
 * @module scheduler/scheduler
 */

import { ConfigurationError, errorMessage, isAbortError } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { sleep as defaultSleep, throwIfAborted, type SleepFn } from '../pipeline/sleep.js';
import { calculateRunTimes, findCurrentBucket, formatDuration, formatScheduleTime } from './schedule.js';

// ============================================================================
// Types
// ============================================================================

export interface ScheduleOptions {
  startTime: Date;
  endTime: Date;
  intervalHours: number;
  /** First batch index of the first run */
  startBatch: number;
  /** Batch indices per run */
  batchCount: number;
  force?: boolean;
}

export interface ScheduledRun {
  /** 0-based bucket index */
  index: number;
  scheduledAt: Date;
  startBatch: number;
  /** Inclusive */
  endBatch: number;
}

/**
 * Runs `count` batches from `startBatch`; resolves true when none failed.
 */
export type RunBatchesFn = (startBatch: number, count: number, force: boolean) => Promise<boolean>;

export interface SchedulerSummary {
  successful: number;
  failed: number;
  skipped: number;
  total: number;
  /** The schedule had already ended when the scheduler started */
  nothingToDo: boolean;
}

export interface SchedulerDeps {
  clock?: () => Date;
  sleep?: SleepFn;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Longest single sleep while waiting for a trigger. Long waits are split so
 * each stays well inside the timer range.
 */
export const MAX_WAIT_CHUNK_MS = 60 * 60 * 1000;

// ============================================================================
// Scheduler
// ============================================================================

/**
 * @example
 * ```typescript
 * const scheduler = new Scheduler(
 *   { startTime, endTime, intervalHours: 5, startBatch: 20, batchCount: 10 },
 *   async (start, count, force) => (await orchestrator.runFrom(start, { count, force })).failed.length === 0,
 *   { logger }
 * );
 * const summary = await scheduler.run();
 * ```
 */
export class Scheduler {
  private readonly runTimes: Date[];
  private readonly clock: () => Date;
  private readonly sleep: SleepFn;
  private readonly logger: Logger;
  private readonly signal?: AbortSignal;

  /**
   * @throws ConfigurationError on an empty window or invalid batch numbers
   */
  constructor(
    private readonly options: ScheduleOptions,
    private readonly runBatches: RunBatchesFn,
    deps: SchedulerDeps = {}
  ) {
    if (options.endTime.getTime() <= options.startTime.getTime()) {
      throw new ConfigurationError('end-time must be after start-time');
    }
    if (!Number.isInteger(options.startBatch) || options.startBatch < 0) {
      throw new ConfigurationError(`start batch must be a non-negative integer (got ${options.startBatch})`);
    }
    if (!Number.isInteger(options.batchCount) || options.batchCount < 1) {
      throw new ConfigurationError(`batch count must be a positive integer (got ${options.batchCount})`);
    }

    this.runTimes = calculateRunTimes(options.startTime, options.endTime, options.intervalHours);
    this.clock = deps.clock ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
    this.logger = deps.logger ?? silentLogger;
    this.signal = deps.signal;
  }

  /**
   * Every scheduled run with the batches it owns.
   */
  plan(): ScheduledRun[] {
    const { startBatch, batchCount } = this.options;
    return this.runTimes.map((scheduledAt, index) => {
      const first = startBatch + index * batchCount;
      return { index, scheduledAt, startBatch: first, endBatch: first + batchCount - 1 };
    });
  }

  /**
   * Log the schedule header and the run preview.
   */
  logPlan(): void {
    const { startTime, endTime, intervalHours, startBatch, batchCount, force } = this.options;
    this.logger.info('='.repeat(60));
    this.logger.info('Scheduled Batch Processing');
    this.logger.info('='.repeat(60));
    this.logger.info(`Schedule: ${formatScheduleTime(startTime)} to ${formatScheduleTime(endTime)}`);
    this.logger.info(`Interval: ${intervalHours} hours`);
    this.logger.info(`Starting batch: ${startBatch}`);
    this.logger.info(`Batches per run: ${batchCount}`);
    this.logger.info(`Force mode: ${force === true}`);
    this.logger.info(`Total scheduled runs: ${this.runTimes.length}`);
    this.logger.info('-'.repeat(40));
    this.logger.info('Scheduled run times:');
    for (const run of this.plan()) {
      this.logger.info(
        `  Run ${run.index + 1}: ${formatScheduleTime(run.scheduledAt)} - Batches ${run.startBatch}-${run.endBatch}`
      );
    }
    this.logger.info('='.repeat(60));
  }

  /**
   * Execute the schedule until every bucket is run or skipped.
   */
  async run(): Promise<SchedulerSummary> {
    const total = this.runTimes.length;
    const plan = this.plan();
    let now = this.clock();

    if (now.getTime() > this.options.endTime.getTime()) {
      this.logger.warn('All scheduled runs are in the past. Nothing to do.');
      this.logger.info(`Schedule ended at: ${formatScheduleTime(this.options.endTime)}`);
      return { successful: 0, failed: 0, skipped: 0, total, nothingToDo: true };
    }

    let current = findCurrentBucket(this.runTimes, now);
    let successful = 0;
    let failed = 0;
    let skipped = current;

    if (current > 0) {
      this.logger.info(`Starting from run ${current + 1} (in current time bucket)`);
    }

    while (current < total) {
      const run = plan[current];
      if (!run) {
        break;
      }
      const label = `Run ${current + 1}/${total}`;

      now = this.clock();
      if (now.getTime() < run.scheduledAt.getTime()) {
        const waitSeconds = (run.scheduledAt.getTime() - now.getTime()) / 1000;
        this.logger.info(
          `Waiting ${formatDuration(waitSeconds)} until run ${current + 1} at ${formatScheduleTime(run.scheduledAt)}`
        );
        await this.waitUntil(run.scheduledAt);
      } else {
        this.logger.info(`Scheduled time ${formatScheduleTime(run.scheduledAt)} has passed, starting immediately`);
      }

      const runStart = this.clock();
      this.logger.info('-'.repeat(40));
      this.logger.info(`${label} starting`);
      this.logger.info(`Processing batches ${run.startBatch} to ${run.endBatch}`);

      const ok = await this.executeRun(run);
      const duration = formatDuration((this.clock().getTime() - runStart.getTime()) / 1000);
      if (ok) {
        successful++;
        this.logger.info(`Run ${current + 1} completed successfully in ${duration}`);
      } else {
        failed++;
        this.logger.warn(`Run ${current + 1} failed after ${duration}`);
      }

      current++;

      now = this.clock();
      while (current < total) {
        const next = plan[current];
        if (!next || now.getTime() < next.scheduledAt.getTime()) {
          break;
        }
        this.logger.warn(
          `Skipping run ${current + 1} (scheduled for ${formatScheduleTime(next.scheduledAt)}) - time has passed`
        );
        skipped++;
        current++;
      }
    }

    return { successful, failed, skipped, total, nothingToDo: false };
  }

  /**
   * Run one bucket's batches. Errors other than an abort count as a failed
   * run.
   */
  private async executeRun(run: ScheduledRun): Promise<boolean> {
    try {
      return await this.runBatches(run.startBatch, this.options.batchCount, this.options.force === true);
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      this.logger.error(`Run ${run.index + 1} raised an error: ${errorMessage(error)}`);
      return false;
    }
  }

  private async waitUntil(target: Date): Promise<void> {
    for (;;) {
      throwIfAborted(this.signal);
      const remaining = target.getTime() - this.clock().getTime();
      if (remaining <= 0) {
        return;
      }
      await this.sleep(Math.min(remaining, MAX_WAIT_CHUNK_MS), this.signal);
    }
  }
}
