/**
 * Scheduler Module
 *
 * @module scheduler
 */

export {
  SCHEDULE_TIME_FORMAT,
  calculateRunTimes,
  findCurrentBucket,
  formatDuration,
  formatScheduleTime,
  parseScheduleTime,
} from './schedule.js';
export {
  MAX_WAIT_CHUNK_MS,
  Scheduler,
  type RunBatchesFn,
  type ScheduleOptions,
  type ScheduledRun,
  type SchedulerDeps,
  type SchedulerSummary,
} from './scheduler.js';
