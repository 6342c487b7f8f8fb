/**
 * Checkpoint Store
 *
 * Durable, key-indexed progress record for one pipeline stage. The record is
 * loaded once and cached; every mutation is written to disk before its
 * promise resolves, so an interrupted run loses at most the mutation in
 * flight.
 *
 * File access is guarded by an advisory lock on a sibling `.lock` file held
 * only for the duration of a single load or save. Saves issued by the same
 * process are serialized.
 *
 * @module pipeline/checkpoint
 */

import * as fs from 'node:fs/promises';
import {
  CheckpointRecordSchema,
  createEmptyCheckpoint,
  type CheckpointRecord,
} from '../schemas/checkpoint.js';
import { atomicWriteJson, fileExists, readJson } from '../storage/atomic.js';
import { FileLock, lockPathFor, type FileLockOptions } from '../storage/lock.js';
import { CorruptCheckpointError, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface CheckpointStoreOptions {
  logger?: Logger;
  /**
   * Lock options for cross-process sharing. Pass `false` only when the file
   * is guaranteed to be used by a single process.
   */
  lock?: FileLockOptions | false;
}

/**
 * Read-only view of a checkpoint for status reporting.
 */
export interface CheckpointSummary {
  filePath: string;
  processedCount: number;
  failedCount: number;
  lastIndex: number;
}

// ============================================================================
// Store
// ============================================================================

/**
 * Progress record for one stage.
 *
 * @example
 * ```typescript
 * const store = new CheckpointStore(getCheckpointPath(paths, 'generation'));
 * if (!(await store.isProcessed('serendipity'))) {
 *   await generate('serendipity');
 *   await store.markProcessed('serendipity', 42);
 * }
 * ```
 */
export class CheckpointStore {
  private record: CheckpointRecord | null = null;
  private loading: Promise<CheckpointRecord> | null = null;
  private processedSet = new Set<string>();
  private failedSet = new Set<string>();
  private writes: Promise<void> = Promise.resolve();
  private readonly lock: FileLock | null;
  private readonly logger: Logger;

  constructor(
    readonly filePath: string,
    options: CheckpointStoreOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.lock =
      options.lock === false
        ? null
        : new FileLock(lockPathFor(filePath), { logger: this.logger, ...options.lock });
  }

  /**
   * Load the record from disk, or start an empty one if no file exists.
   * Subsequent calls return the cached record.
   *
   * @throws CorruptCheckpointError if the file is unreadable or invalid
   */
  async load(): Promise<CheckpointRecord> {
    if (this.record) {
      return this.record;
    }
    if (!this.loading) {
      this.loading = this.guarded('load', () => this.readFromDisk()).then(
        (record) => {
          this.adopt(record);
          return record;
        },
        (error: unknown) => {
          this.loading = null;
          throw error;
        }
      );
    }
    return this.loading;
  }

  /**
   * Persist the cached record. No-op if nothing has been loaded.
   */
  async save(): Promise<void> {
    if (!this.record) {
      return;
    }
    await this.enqueueWrite();
  }

  /**
   * Mark a key as completed and advance the cursor.
   *
   * Adding a key that is already present leaves `processed` unchanged.
   */
  async markProcessed(key: string, index: number): Promise<void> {
    const record = await this.load();
    if (!this.processedSet.has(key)) {
      this.processedSet.add(key);
      record.processed.push(key);
    }
    record.lastIndex = Math.max(record.lastIndex, index);
    await this.enqueueWrite();
  }

  /**
   * Mark a key as failed.
   */
  async markFailed(key: string): Promise<void> {
    const record = await this.load();
    if (!this.failedSet.has(key)) {
      this.failedSet.add(key);
      record.failed.push(key);
    }
    await this.enqueueWrite();
  }

  /**
   * Clear the failed list so those keys are retried.
   */
  async clearFailed(): Promise<void> {
    const record = await this.load();
    record.failed = [];
    this.failedSet.clear();
    await this.enqueueWrite();
  }

  async isProcessed(key: string): Promise<boolean> {
    await this.load();
    return this.processedSet.has(key);
  }

  /**
   * Position-based resume cursor: indices from the number of processed keys
   * up to `totalCount`. Only meaningful when items are always processed in
   * the same order; see unprocessedKeys() for the content-based variant.
   */
  async unprocessedIndices(totalCount: number): Promise<number[]> {
    const record = await this.load();
    const indices: number[] = [];
    for (let i = record.processed.length; i < totalCount; i++) {
      indices.push(i);
    }
    return indices;
  }

  /**
   * Keys from `keys` not yet processed, in their given order.
   */
  async unprocessedKeys(keys: readonly string[]): Promise<string[]> {
    await this.load();
    return keys.filter((key) => !this.processedSet.has(key));
  }

  async failedKeys(): Promise<string[]> {
    const record = await this.load();
    return [...record.failed];
  }

  async processedCount(): Promise<number> {
    const record = await this.load();
    return record.processed.length;
  }

  async failedCount(): Promise<number> {
    const record = await this.load();
    return record.failed.length;
  }

  async summary(): Promise<CheckpointSummary> {
    const record = await this.load();
    return {
      filePath: this.filePath,
      processedCount: record.processed.length,
      failedCount: record.failed.length,
      lastIndex: record.lastIndex,
    };
  }

  /**
   * Discard in-memory state and delete the backing file.
   */
  async reset(): Promise<void> {
    await this.writes;
    this.adopt(createEmptyCheckpoint());
    this.loading = null;
    await this.guarded('reset', () => fs.rm(this.filePath, { force: true }));
    this.logger.debug(`Checkpoint reset: ${this.filePath}`);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private adopt(record: CheckpointRecord): void {
    this.record = record;
    this.processedSet = new Set(record.processed);
    this.failedSet = new Set(record.failed);
  }

  private async readFromDisk(): Promise<CheckpointRecord> {
    if (!(await fileExists(this.filePath))) {
      return createEmptyCheckpoint();
    }

    let raw: unknown;
    try {
      raw = await readJson(this.filePath);
    } catch (error) {
      throw new CorruptCheckpointError(this.filePath, errorMessage(error), { cause: error });
    }

    const parsed = CheckpointRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new CorruptCheckpointError(this.filePath, detail);
    }

    // Collapse duplicates a hand-edited file may contain
    return {
      processed: [...new Set(parsed.data.processed)],
      failed: [...new Set(parsed.data.failed)],
      lastIndex: parsed.data.lastIndex,
    };
  }

  /**
   * Queue a save behind any save already in flight. The returned promise
   * carries this save's outcome; the queue itself keeps going after a failure.
   */
  private enqueueWrite(): Promise<void> {
    const write = this.writes.then(() =>
      this.guarded('save', async () => {
        if (this.record) {
          await atomicWriteJson(this.filePath, this.record);
        }
      })
    );
    this.writes = write.catch(() => undefined);
    return write;
  }

  private guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return this.lock ? this.lock.withLock(operation, fn) : fn();
  }
}
