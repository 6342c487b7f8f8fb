/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - batch: Process vocabulary batches from a start index
 * - schedule: Run blocks of batches at fixed times
 * - run: Run pipeline steps directly
 * - select: Filter the word selection sheet (step 1)
 * - checkpoint: Inspect or reset stage checkpoints
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerBatchCommand } from './batch.js';
import { registerCheckpointCommands } from './checkpoint.js';
import { registerRunCommand } from './run.js';
import { registerScheduleCommand } from './schedule.js';
import { registerSelectCommand } from './select.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerBatchCommand(program);
  registerScheduleCommand(program);
  registerRunCommand(program);
  registerSelectCommand(program);
  registerCheckpointCommands(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'batch [startBatch]', description: 'Process vocabulary batches, stopping at the first failure' },
    { name: 'schedule', description: 'Run blocks of batches at fixed times' },
    { name: 'run', description: 'Run pipeline steps (selection, enrichment, generation)' },
    { name: 'select', description: 'Filter word_selection.csv into the selected words list' },
    { name: 'checkpoint status [stage]', description: 'Show checkpoint progress' },
    { name: 'checkpoint reset [stage]', description: 'Delete checkpoint progress' },
  ];
}
