/**
 * Logging
 *
 * Components receive a Logger at construction time instead of reaching for
 * a process-wide instance. The CLI composes a console logger (chalk output,
 * honouring --verbose/--quiet/--no-color) with a per-run log file.
 *
 * @module logging/logger
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import chalk from 'chalk';

/**
 * Log levels for output control.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logging capability injected into pipeline components.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export interface ConsoleLoggerOptions {
  /** Show debug messages */
  verbose?: boolean;
  /** Hide info and debug messages */
  quiet?: boolean;
  /** Colored output (default: true when stdout is a TTY) */
  color?: boolean;
}

/**
 * Terminal logger.
 *
 * Warnings and errors are always shown; info is hidden in quiet mode and
 * debug only appears in verbose mode.
 */
export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;
  private readonly quiet: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose === true;
    this.quiet = options.quiet === true;

    const useColor = options.color ?? process.stdout.isTTY === true;
    if (!useColor) {
      chalk.level = 0;
    }
  }

  debug(message: string): void {
    if (this.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    if (!this.quiet) {
      console.log(message);
    }
  }

  warn(message: string): void {
    console.warn(chalk.yellow(message));
  }

  error(message: string): void {
    console.error(chalk.red(message));
  }
}

/**
 * Format one log file line.
 *
 * @example
 * formatLogLine(new Date(2026, 1, 10, 17, 0, 5), 'warn', 'batch', 'Step 2 failed');
 * // '2026-02-10 17:00:05 | WARN     | batch | Step 2 failed'
 */
export function formatLogLine(timestamp: Date, level: LogLevel, name: string, message: string): string {
  const pad = (value: number) => value.toString().padStart(2, '0');
  const date = `${timestamp.getFullYear()}-${pad(timestamp.getMonth() + 1)}-${pad(timestamp.getDate())}`;
  const time = `${pad(timestamp.getHours())}:${pad(timestamp.getMinutes())}:${pad(timestamp.getSeconds())}`;
  return `${date} ${time} | ${level.toUpperCase().padEnd(8)} | ${name} | ${message}`;
}

/**
 * Appends every message, debug included, to a log file.
 *
 * Writes are synchronous so the file is complete up to the last line even
 * when the process is interrupted.
 */
export class FileLogger implements Logger {
  constructor(
    readonly filePath: string,
    private readonly name: string,
    private readonly clock: () => Date = () => new Date()
  ) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  private write(level: LogLevel, message: string): void {
    fs.appendFileSync(this.filePath, formatLogLine(this.clock(), level, this.name, message) + '\n', 'utf-8');
  }
}

/**
 * Fans each message out to several loggers.
 */
export class TeeLogger implements Logger {
  private readonly targets: Logger[];

  constructor(...targets: Logger[]) {
    this.targets = targets;
  }

  debug(message: string): void {
    for (const target of this.targets) target.debug(message);
  }

  info(message: string): void {
    for (const target of this.targets) target.info(message);
  }

  warn(message: string): void {
    for (const target of this.targets) target.warn(message);
  }

  error(message: string): void {
    for (const target of this.targets) target.error(message);
  }
}
