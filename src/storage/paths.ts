/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the storage layer.
 *
 * Directory Structure:
 * ```
 * <data dir>/                                     # LEXIBATCH_DATA_DIR or cwd
 * ├── word_selection.csv                          # Raw word list with include flags
 * ├── prompts/example_generation.txt              # Generation prompt template
 * ├── data/                                       # Shared working location
 * │   ├── selected_words.csv                      # Step 1 output
 * │   ├── enriched_words.json                     # Step 2 output
 * │   └── final_output_YYYYMMDD_HHmmss.json       # Step 3 output (pre-salvage)
 * ├── checkpoints/
 * │   ├── enrichment_progress.json
 * │   └── generation_progress.json
 * ├── final_data/
 * │   └── <label>/final_output_*.json             # e.g. 101-200/
 * └── logs/
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';
import { format } from 'date-fns';

/** Prefix shared by every generation output artifact */
export const OUTPUT_FILE_PREFIX = 'final_output_';

/** Pipeline stages that keep a checkpoint */
export type CheckpointStage = 'enrichment' | 'generation';

export const CHECKPOINT_STAGES: readonly CheckpointStage[] = ['enrichment', 'generation'];

/**
 * Every location the pipeline reads or writes.
 */
export interface PipelinePaths {
  rootDir: string;
  wordSelectionCsv: string;
  dataDir: string;
  selectedWordsCsv: string;
  enrichedWordsJson: string;
  checkpointsDir: string;
  finalDataDir: string;
  /** Artifacts found in the working folder before a partition starts */
  staleOutputDir: string;
  logsDir: string;
  promptTemplate: string;
}

/**
 * Validates a partition label or file name segment to prevent path traversal.
 *
 * @throws {Error} If the value contains path traversal characters
 */
function validateSegment(value: string, name: string): void {
  if (value.includes('..') || value.includes('/') || value.includes('\\')) {
    throw new Error(`${name} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Gets the root data directory for the pipeline.
 *
 * Uses `LEXIBATCH_DATA_DIR` if set (expanding a leading `~`), otherwise the
 * current working directory.
 *
 * @example
 * ```typescript
 * process.env.LEXIBATCH_DATA_DIR = '~/vocab';
 * getDataDir(); // '/Users/username/vocab'
 * ```
 */
export function getDataDir(envDir: string | undefined = process.env.LEXIBATCH_DATA_DIR): string {
  if (envDir) {
    if (envDir.startsWith('~')) {
      return path.join(os.homedir(), envDir.slice(1));
    }
    return path.resolve(envDir);
  }

  return process.cwd();
}

/**
 * Resolve the full directory layout below a root directory.
 */
export function resolvePaths(rootDir: string): PipelinePaths {
  const root = path.resolve(rootDir);
  const dataDir = path.join(root, 'data');

  return {
    rootDir: root,
    wordSelectionCsv: path.join(root, 'word_selection.csv'),
    dataDir,
    selectedWordsCsv: path.join(dataDir, 'selected_words.csv'),
    enrichedWordsJson: path.join(dataDir, 'enriched_words.json'),
    checkpointsDir: path.join(root, 'checkpoints'),
    finalDataDir: path.join(root, 'final_data'),
    staleOutputDir: path.join(dataDir, 'stale_outputs'),
    logsDir: path.join(root, 'logs'),
    promptTemplate: path.join(root, 'prompts', 'example_generation.txt'),
  };
}

/**
 * Gets the checkpoint file for a pipeline stage.
 *
 * @example
 * ```typescript
 * getCheckpointPath(paths, 'generation');
 * // '<root>/checkpoints/generation_progress.json'
 * ```
 */
export function getCheckpointPath(paths: PipelinePaths, stage: CheckpointStage): string {
  return path.join(paths.checkpointsDir, `${stage}_progress.json`);
}

/**
 * Gets the destination folder for one partition.
 *
 * @param label - Partition label such as "101-200"
 */
export function getPartitionDir(paths: PipelinePaths, label: string): string {
  if (!label || label.trim() === '') {
    throw new Error('partition label is required');
  }
  validateSegment(label, 'partition label');

  return path.join(paths.finalDataDir, label);
}

/**
 * Format the timestamp suffix used by output artifacts and log files.
 *
 * @example
 * ```typescript
 * formatTimestampSuffix(new Date(2026, 0, 31, 14, 30, 22)); // '20260131_143022'
 * ```
 */
export function formatTimestampSuffix(date: Date): string {
  return format(date, 'yyyyMMdd_HHmmss');
}

/**
 * Gets a timestamped output artifact path in the working data folder.
 */
export function getOutputArtifactPath(paths: PipelinePaths, timestamp: Date = new Date()): string {
  return path.join(paths.dataDir, `${OUTPUT_FILE_PREFIX}${formatTimestampSuffix(timestamp)}.json`);
}

/**
 * Whether a file name looks like an output artifact.
 */
export function isOutputArtifactName(fileName: string): boolean {
  return fileName.startsWith(OUTPUT_FILE_PREFIX) && fileName.endsWith('.json');
}

/**
 * Gets a log file path.
 *
 * @param prefix - Log name prefix such as "batch_from_20"
 */
export function getLogFilePath(paths: PipelinePaths, prefix: string, timestamp: Date = new Date()): string {
  validateSegment(prefix, 'log prefix');
  return path.join(paths.logsDir, `${prefix}_${formatTimestampSuffix(timestamp)}.log`);
}
