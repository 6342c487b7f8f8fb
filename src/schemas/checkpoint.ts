/**
 * Checkpoint Record Schema
 *
 * One document per pipeline stage recording which item keys completed.
 */

import { z } from 'zod';

export const CheckpointRecordSchema = z.object({
  /** Keys completed, in completion order */
  processed: z.array(z.string()).default([]),
  /** Keys that failed; may overlap `processed` after a later success */
  failed: z.array(z.string()).default([]),
  /** Highest index confirmed processed */
  lastIndex: z.number().int().min(0).default(0),
});

export type CheckpointRecord = z.infer<typeof CheckpointRecordSchema>;

/**
 * Create an empty checkpoint record.
 */
export function createEmptyCheckpoint(): CheckpointRecord {
  return { processed: [], failed: [], lastIndex: 0 };
}
