/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, data-dir)
 * - Consistent error handling and exit codes
 * - Output utilities (info, warn, error)
 * - Loggers for pipeline components, optionally teed into a log file
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { createPipelineConfig, type PipelineConfig, type PipelineConfigOverrides } from '../config/index.js';
import { isAbortError, isPipelineError } from '../errors.js';
import { ConsoleLogger, FileLogger, TeeLogger, type Logger } from '../logging/logger.js';
import { getDataDir } from '../storage/paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Override default data directory */
  dataDir?: string;
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** A batch, run or step failed */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** Interrupted by the user */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error that escaped a command handler.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (isAbortError(error)) {
    return EXIT_CODES.CANCELLED;
  }
  if (isPipelineError(error) && error.kind === 'configuration') {
    return EXIT_CODES.USAGE_ERROR;
  }
  return EXIT_CODES.ERROR;
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * All command handlers receive a BaseCommand instance to access consistent
 * output, configuration and logging.
 *
 * @example
 * ```typescript
 * async function handleSelect(base: BaseCommand): Promise<ExitCode> {
 *   const config = base.loadConfig();
 *   const words = await runSelectionStage(config, base.createLogger());
 *   base.success(`Selected ${words.length} words`);
 *   return EXIT_CODES.SUCCESS;
 * }
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  /** Resolved data directory path */
  readonly dataDir: string;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;
    this.dataDir = getDataDir(options.dataDir);

    // Configure chalk based on color preference
    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Configuration & Logging
  // ==========================================================================

  /**
   * Build the pipeline configuration rooted at the data directory.
   *
   * @throws ConfigurationError on invalid environment or overrides
   */
  loadConfig(overrides: Omit<PipelineConfigOverrides, 'dataDir'> = {}): PipelineConfig {
    return createPipelineConfig({ ...overrides, dataDir: this.dataDir });
  }

  /**
   * Logger for pipeline components. With a log file, every message is also
   * appended there, debug included.
   *
   * @param logFile - Log file path
   * @param name - Logger name written into each log line
   * @param consoleQuiet - Hide info on the console even without --quiet
   */
  createLogger(logFile?: string, name = 'lexibatch', consoleQuiet = false): Logger {
    const terminal = new ConsoleLogger({
      verbose: this.isVerbose(),
      quiet: this.isQuiet() || consoleQuiet,
      color: this.useColor,
    });
    return logFile ? new TeeLogger(terminal, new FileLogger(logFile, name)) : terminal;
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Print an error message. With --verbose the stack follows.
   */
  printError(message: string, error?: unknown): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error instanceof Error && this.options.verbose) {
      console.error(chalk.dim(error.stack ?? error.message));
    }
  }

  /**
   * Print an error message and exit.
   *
   * @param errorOrCode - Error object or exit code
   */
  error(message: string, errorOrCode?: unknown): never {
    this.printError(message, errorOrCode);
    if (typeof errorOrCode === 'number' && isExitCode(errorOrCode)) {
      process.exit(errorOrCode);
    }
    process.exit(errorOrCode === undefined ? EXIT_CODES.ERROR : exitCodeFor(errorOrCode));
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Log a failure message with red X.
   */
  fail(message: string): void {
    console.log(chalk.red(`${this.useColor ? '✘' : '[FAIL]'} ${message}`));
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print a section header.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      console.log(chalk.dim('='.repeat(title.length)));
    }
  }

  /**
   * Print a key-value pair.
   */
  keyValue(key: string, value: string | number): void {
    if (!this.options.quiet) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  hasColor(): boolean {
    return this.useColor;
  }

  /**
   * Exit with specific code.
   */
  exitWith(code: ExitCode): never {
    process.exit(code);
  }
}

function isExitCode(value: number): value is ExitCode {
  return Object.values(EXIT_CODES).some((code) => code === value);
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a BaseCommand from global options.
 */
export function createBaseCommand(options: GlobalOptions): BaseCommand {
  return new BaseCommand(options);
}

export interface CommandLike {
  opts(): Record<string, unknown>;
  parent: CommandLike | null;
}

/**
 * Get the base command stored on the root program by the preAction hook.
 * Walks up from a subcommand; falls back to defaults (useful in tests).
 */
export function getBaseCommand(cmd: CommandLike): BaseCommand {
  let current: CommandLike | null = cmd;
  while (current) {
    const base = current.opts()['_baseCommand'];
    if (base instanceof BaseCommand) {
      return base;
    }
    current = current.parent;
  }
  return new BaseCommand({});
}
