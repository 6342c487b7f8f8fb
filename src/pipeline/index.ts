/**
 * Pipeline Infrastructure
 *
 * Checkpointing, partition math, output validation, per-partition retries
 * and the batch loop.
 *
 * @module pipeline
 */

// Checkpoint store
export { CheckpointStore, type CheckpointStoreOptions, type CheckpointSummary } from './checkpoint.js';

// Partition math
export {
  batchInfo,
  countItemsInPartition,
  frequencyPartition,
  rowPartition,
  rowRangeForFrequencyRange,
  rowRangeForPartition,
  totalBatches,
  totalBatchesFor,
  type Partition,
  type RowRange,
} from './partition.js';

// Output validation
export {
  countArtifactEntries,
  findArtifacts,
  hasValidOutput,
  isValidArtifact,
  type ArtifactCheck,
} from './output-validator.js';

// Partition execution
export {
  StageRunner,
  createInProcessStages,
  type PartitionOutcome,
  type PartitionResult,
  type PartitionStages,
  type PartitionState,
  type StageRunnerCallbacks,
  type StageRunnerOptions,
  type StageServices,
} from './stage-runner.js';

// Batch loop
export {
  BatchOrchestrator,
  type BatchOrchestratorOptions,
  type BatchRunOptions,
  type BatchRunSummary,
} from './orchestrator.js';

// Cancellable sleep
export { createAbortError, sleep, throwIfAborted, type SleepFn } from './sleep.js';
