/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  createSpinner,
  formatElapsed,
  formatProgress,
  trackProgress,
  type SpinnerOptions,
  type ProgressCallback,
} from './progress.js';

// Batch and schedule summaries
export {
  formatBatchSummary,
  formatSchedulerSummary,
  logSummary,
  resumeCommand,
  type ResumeOptions,
  type SummaryLine,
} from './summary.js';
