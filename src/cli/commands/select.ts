/**
 * Select Command
 *
 * Step 1: keeps the rows of word_selection.csv marked for inclusion and
 * writes them, sorted by frequency, to data/selected_words.csv.
 *
 * @module cli/commands/select
 */

import { Command } from 'commander';
import { runSelectionStage } from '../../stages/selection.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { executeCommand } from '../runtime.js';

/**
 * Register the select command.
 */
export function registerSelectCommand(program: Command): void {
  program
    .command('select')
    .description('Filter word_selection.csv into the selected words list (step 1)')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await executeCommand(base, () => handleSelect(base));
    });
}

/**
 * Handle the select command.
 */
export async function handleSelect(base: BaseCommand): Promise<ExitCode> {
  const config = base.loadConfig();
  const words = await runSelectionStage(config, base.createLogger());

  if (words.length === 0) {
    base.warn(`No rows marked for inclusion in ${config.paths.wordSelectionCsv}`);
  } else {
    base.success(`Selected ${words.length} words`);
  }
  return EXIT_CODES.SUCCESS;
}

export default registerSelectCommand;
