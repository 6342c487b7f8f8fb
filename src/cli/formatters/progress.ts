/**
 * Progress Formatters
 *
 * CLI progress display utilities:
 * - Spinner for long-running stages
 * - Item counters fed by the stages' onProgress callbacks
 *
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Output stream, stdout by default */
  stream?: NodeJS.WriteStream;
  /** Force the spinner on or off regardless of TTY detection */
  enabled?: boolean;
}

/**
 * Receives `(done, total)` from a stage.
 */
export type ProgressCallback = (done: number, total: number) => void;

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Enriching words...');
 * spinner.start();
 *
 * try {
 *   await runEnrichmentStage(config, services, { onProgress: trackProgress(spinner, 'Enriching') });
 *   spinner.succeed('Enrichment complete');
 * } catch (err) {
 *   spinner.fail('Enrichment failed');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    const stream = options.stream ?? process.stdout;

    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: options.enabled ?? stream.isTTY === true,
      stream,
    });
  }

  /**
   * Start the spinner.
   */
  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  /**
   * Update spinner text.
   */
  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatElapsed(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  /**
   * Current text, without the elapsed-time suffix.
   */
  get text(): string {
    return this.spinner.text;
  }
}

// ============================================================================
// Progress Tracking
// ============================================================================

/**
 * Format an item counter with a percentage.
 *
 * @example
 * formatProgress('Enriching', 12, 80); // 'Enriching 12/80 (15%)'
 */
export function formatProgress(label: string, done: number, total: number): string {
  const percentage = total > 0 ? Math.min(100, Math.floor((done / total) * 100)) : 100;
  return `${label} ${done}/${total} (${percentage}%)`;
}

/**
 * Callback that writes stage progress into a spinner's text.
 */
export function trackProgress(spinner: ProgressSpinner, label: string): ProgressCallback {
  return (done, total) => {
    spinner.update(formatProgress(label, done, total));
  };
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to a short human-readable string.
 *
 * @example
 * formatElapsed(450); // '450ms'
 * formatElapsed(12_300); // '12.3s'
 * formatElapsed(125_000); // '2m 5s'
 */
export function formatElapsed(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a spinner for a single operation.
 */
export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
