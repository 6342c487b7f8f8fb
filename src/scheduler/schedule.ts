/**
 * Schedule Math
 *
 * Trigger times for scheduled batch runs and the mapping from wall-clock
 * time to the bucket a run belongs to.
 *
 * @module scheduler/schedule
 */

import { addMilliseconds, format, isValid, parse } from 'date-fns';
import { ConfigurationError } from '../errors.js';

/** Format accepted for --start-time and --end-time */
export const SCHEDULE_TIME_FORMAT = 'yyyy-MM-dd HH:mm';

const MS_PER_HOUR = 3_600_000;

/**
 * Parse a local time in `YYYY-MM-DD HH:MM` form.
 *
 * @throws ConfigurationError when the value does not match the format
 */
export function parseScheduleTime(value: string): Date {
  const parsed = parse(value.trim(), SCHEDULE_TIME_FORMAT, new Date());
  if (!isValid(parsed)) {
    throw new ConfigurationError(
      `Error parsing time: "${value}". Expected format: 'YYYY-MM-DD HH:MM'`
    );
  }
  return parsed;
}

export function formatScheduleTime(date: Date): string {
  return format(date, SCHEDULE_TIME_FORMAT);
}

/**
 * Trigger times from `start` every `intervalHours` up to and including `end`.
 *
 * Each time is computed from `start` directly, so fractional intervals do
 * not accumulate rounding error.
 *
 * @example
 * calculateRunTimes(nine, noon, 1).map(formatScheduleTime);
 * // ['2026-03-01 09:00', '2026-03-01 10:00', '2026-03-01 11:00', '2026-03-01 12:00']
 */
export function calculateRunTimes(start: Date, end: Date, intervalHours: number): Date[] {
  if (!Number.isFinite(intervalHours) || intervalHours <= 0) {
    throw new ConfigurationError(`Interval must be a positive number of hours (got ${intervalHours})`);
  }

  const intervalMs = intervalHours * MS_PER_HOUR;
  const runTimes: Date[] = [];
  for (let i = 0; ; i++) {
    const current = addMilliseconds(start, Math.round(i * intervalMs));
    if (current.getTime() > end.getTime()) {
      break;
    }
    runTimes.push(current);
  }
  return runTimes;
}

/**
 * Index of the bucket `now` falls in: 0 before the first trigger, otherwise
 * the latest trigger at or before `now`.
 */
export function findCurrentBucket(runTimes: readonly Date[], now: Date): number {
  for (let i = runTimes.length - 1; i >= 0; i--) {
    const trigger = runTimes[i];
    if (trigger && now.getTime() >= trigger.getTime()) {
      return i;
    }
  }
  return 0;
}

/**
 * Human-readable duration.
 *
 * @example
 * formatDuration(42); // '42 seconds'
 * formatDuration(90); // '1.5 minutes'
 * formatDuration(5400); // '1.50 hours'
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds.toFixed(0)} seconds`;
  }
  if (seconds < 3600) {
    return `${(seconds / 60).toFixed(1)} minutes`;
  }
  return `${(seconds / 3600).toFixed(2)} hours`;
}
