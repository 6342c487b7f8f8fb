/**
 * Partition Calculator
 *
 * Pure arithmetic mapping a batch index to the slice of the vocabulary it
 * owns and to the folder label its output lands in.
 *
 * Two modes:
 * - frequency: batch i owns frequencies [i*size+1, (i+1)*size]; label "101-200"
 * - row: batch i owns rows [i*size, min((i+1)*size, total)); label "100-200"
 *
 * @module pipeline/partition
 */

import type { PartitionMode } from '../config/index.js';
import type { SelectedWord } from '../schemas/vocabulary.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One batch of the vocabulary. `rangeEnd` is exclusive in both modes.
 */
export interface Partition {
  index: number;
  mode: PartitionMode;
  rangeStart: number;
  rangeEnd: number;
  /** Folder name for the partition's output */
  label: string;
}

/**
 * Contiguous span of row indices, end exclusive.
 */
export interface RowRange {
  start: number;
  end: number;
}

// ============================================================================
// Batch Math
// ============================================================================

function assertBatchArgs(batchIndex: number, batchSize: number): void {
  if (!Number.isInteger(batchIndex) || batchIndex < 0) {
    throw new RangeError(`Batch index must be a non-negative integer (got ${batchIndex})`);
  }
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`Batch size must be a positive integer (got ${batchSize})`);
  }
}

/**
 * Frequency-mode partition for a batch index.
 *
 * @example
 * frequencyPartition(1, 100);
 * // { index: 1, mode: 'frequency', rangeStart: 101, rangeEnd: 201, label: '101-200' }
 */
export function frequencyPartition(batchIndex: number, batchSize: number): Partition {
  assertBatchArgs(batchIndex, batchSize);
  const minFrequency = batchIndex * batchSize + 1;
  const maxFrequency = (batchIndex + 1) * batchSize;

  return {
    index: batchIndex,
    mode: 'frequency',
    rangeStart: minFrequency,
    rangeEnd: maxFrequency + 1,
    label: `${minFrequency}-${maxFrequency}`,
  };
}

/**
 * Row-mode partition for a batch index, clamped to the item count when one
 * is given.
 *
 * @example
 * rowPartition(2, 100, 250);
 * // { index: 2, mode: 'row', rangeStart: 200, rangeEnd: 250, label: '200-250' }
 */
export function rowPartition(batchIndex: number, batchSize: number, totalItems?: number): Partition {
  assertBatchArgs(batchIndex, batchSize);
  const start = batchIndex * batchSize;
  const unclamped = start + batchSize;
  const end = totalItems === undefined ? unclamped : Math.max(start, Math.min(unclamped, totalItems));

  return {
    index: batchIndex,
    mode: 'row',
    rangeStart: start,
    rangeEnd: end,
    label: `${start}-${end}`,
  };
}

/**
 * Partition for a batch index in the given mode.
 */
export function batchInfo(
  batchIndex: number,
  batchSize: number,
  mode: PartitionMode = 'frequency',
  totalItems?: number
): Partition {
  return mode === 'frequency'
    ? frequencyPartition(batchIndex, batchSize)
    : rowPartition(batchIndex, batchSize, totalItems);
}

/**
 * Number of batches needed to cover `total` items (row mode) or frequency
 * values (frequency mode).
 */
export function totalBatches(total: number, batchSize: number): number {
  if (total <= 0) {
    return 0;
  }
  return Math.ceil(total / batchSize);
}

// ============================================================================
// Vocabulary Mapping
// ============================================================================

/**
 * Row span covering every word whose frequency lies in [minFreq, maxFreq].
 *
 * The span runs from the first to one past the last matching row. When
 * frequencies are not sorted by row the span can include words outside the
 * frequency range; input is expected sorted by frequency.
 *
 * @returns The span, or null when no word matches
 */
export function rowRangeForFrequencyRange(
  items: readonly SelectedWord[],
  minFreq: number,
  maxFreq: number
): RowRange | null {
  let start = -1;
  let last = -1;

  items.forEach((item, index) => {
    if (item.frequency >= minFreq && item.frequency <= maxFreq) {
      if (start === -1) {
        start = index;
      }
      last = index;
    }
  });

  if (start === -1) {
    return null;
  }
  return { start, end: last + 1 };
}

/**
 * Row span a partition covers, or null when it owns no rows.
 */
export function rowRangeForPartition(items: readonly SelectedWord[], partition: Partition): RowRange | null {
  if (partition.mode === 'frequency') {
    return rowRangeForFrequencyRange(items, partition.rangeStart, partition.rangeEnd - 1);
  }

  const start = Math.min(partition.rangeStart, items.length);
  const end = Math.min(partition.rangeEnd, items.length);
  return end > start ? { start, end } : null;
}

/**
 * Number of words that belong to a partition.
 *
 * Frequency mode counts matching words, not the hull span.
 */
export function countItemsInPartition(items: readonly SelectedWord[], partition: Partition): number {
  if (partition.mode === 'frequency') {
    const maxFreq = partition.rangeEnd - 1;
    return items.filter((item) => item.frequency >= partition.rangeStart && item.frequency <= maxFreq).length;
  }

  const range = rowRangeForPartition(items, partition);
  return range ? range.end - range.start : 0;
}

/**
 * Total batches for a vocabulary in the given mode.
 */
export function totalBatchesFor(
  items: readonly SelectedWord[],
  mode: PartitionMode,
  batchSize: number,
  maxFrequency: number
): number {
  return mode === 'frequency' ? totalBatches(maxFrequency, batchSize) : totalBatches(items.length, batchSize);
}
