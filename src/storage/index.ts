/**
 * Storage Layer
 *
 * File layout under the data directory, atomic JSON writes and the
 * advisory lock that guards checkpoint files.
 *
 * @module storage
 */

// Path resolution
export {
  CHECKPOINT_STAGES,
  OUTPUT_FILE_PREFIX,
  formatTimestampSuffix,
  getCheckpointPath,
  getDataDir,
  getLogFilePath,
  getOutputArtifactPath,
  getPartitionDir,
  isOutputArtifactName,
  resolvePaths,
  type CheckpointStage,
  type PipelinePaths,
} from './paths.js';

// Atomic file operations
export { InvalidJsonError, atomicWriteJson, fileExists, listFiles, moveFile, readJson } from './atomic.js';

// Advisory locking
export { FileLock, LockTimeoutError, lockPathFor, type FileLockOptions, type LockInfo } from './lock.js';
