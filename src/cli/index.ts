#!/usr/bin/env node
/**
 * lexibatch CLI
 *
 * Main entry point for the lexibatch CLI tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   lexibatch --help
 *   lexibatch select
 *   lexibatch batch 20 --count 10
 *   lexibatch run --word-range 0-100 --resume
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name('lexibatch')
    .description('Resumable batch pipeline that enriches vocabulary words and generates example sentences')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override the data directory (default: $LEXIBATCH_DATA_DIR or cwd)');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts: GlobalOptions = thisCommand.opts();
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  // Usage errors exit with USAGE_ERROR; must precede registerCommands
  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version' || err.code === 'commander.help') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  registerCommands(program);

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command. Command handlers
 * set `process.exitCode`; commander exits on its own for usage errors.
 */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program.parseAsync([...argv]);
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(EXIT_CODES.ERROR);
  });
}
