/**
 * Checkpoint Commands
 *
 * Inspect or clear the per-stage progress files that let an interrupted
 * stage resume:
 * - checkpoint status [stage]
 * - checkpoint reset [stage]
 *
 * @module cli/commands/checkpoint
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigurationError } from '../../errors.js';
import { CheckpointStore, type CheckpointSummary } from '../../pipeline/checkpoint.js';
import { fileExists } from '../../storage/atomic.js';
import { CHECKPOINT_STAGES, getCheckpointPath, type CheckpointStage } from '../../storage/paths.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { executeCommand } from '../runtime.js';

// ============================================================================
// Types
// ============================================================================

export interface StageCheckpointStatus extends CheckpointSummary {
  stage: CheckpointStage;
  /** Whether the progress file exists */
  exists: boolean;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Stages a command acts on: the named one, or all of them.
 *
 * @throws ConfigurationError for an unknown stage name
 */
export function resolveStages(stage: string | undefined): CheckpointStage[] {
  if (stage === undefined) {
    return [...CHECKPOINT_STAGES];
  }
  const match = CHECKPOINT_STAGES.find((candidate) => candidate === stage);
  if (!match) {
    throw new ConfigurationError(`Unknown stage: ${stage}. Use one of: ${CHECKPOINT_STAGES.join(', ')}`);
  }
  return [match];
}

/**
 * Read the checkpoint summary of each stage.
 */
export async function getCheckpointStatus(
  base: BaseCommand,
  stages: readonly CheckpointStage[]
): Promise<StageCheckpointStatus[]> {
  const { paths } = base.loadConfig();
  const statuses: StageCheckpointStatus[] = [];
  for (const stage of stages) {
    const filePath = getCheckpointPath(paths, stage);
    const exists = await fileExists(filePath);
    const summary = await new CheckpointStore(filePath).summary();
    statuses.push({ stage, exists, ...summary });
  }
  return statuses;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the checkpoint command group.
 */
export function registerCheckpointCommands(program: Command): void {
  const checkpoint = program.command('checkpoint').description('Inspect or reset stage checkpoints');

  checkpoint
    .command('status [stage]')
    .description(`Show checkpoint progress (${CHECKPOINT_STAGES.join(' | ')})`)
    .action(async (stage: string | undefined, _options: Record<string, unknown>, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await executeCommand(base, () => handleStatus(stage, base));
    });

  checkpoint
    .command('reset [stage]')
    .description('Delete checkpoint progress so the stage starts over')
    .action(async (stage: string | undefined, _options: Record<string, unknown>, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await executeCommand(base, () => handleReset(stage, base));
    });
}

// ============================================================================
// Handlers
// ============================================================================

export async function handleStatus(stage: string | undefined, base: BaseCommand): Promise<ExitCode> {
  const statuses = await getCheckpointStatus(base, resolveStages(stage));

  base.section('Checkpoints');
  for (const status of statuses) {
    base.blank();
    base.info(chalk.bold(status.stage));
    if (!status.exists) {
      base.info(chalk.dim('  No checkpoint'));
      continue;
    }
    base.keyValue('  File', status.filePath);
    base.keyValue('  Processed', status.processedCount);
    base.keyValue('  Failed', status.failedCount);
    base.keyValue('  Last index', status.lastIndex);
  }
  return EXIT_CODES.SUCCESS;
}

export async function handleReset(stage: string | undefined, base: BaseCommand): Promise<ExitCode> {
  const { paths } = base.loadConfig();
  for (const name of resolveStages(stage)) {
    await new CheckpointStore(getCheckpointPath(paths, name)).reset();
    base.success(`Reset ${name} checkpoint`);
  }
  return EXIT_CODES.SUCCESS;
}

export default registerCheckpointCommands;
