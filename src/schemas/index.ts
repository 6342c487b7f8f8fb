/**
 * Zod Schemas for All Data Types
 *
 * Central export point for all schema definitions used in the pipeline.
 */

// ============================================================================
// Vocabulary
// ============================================================================

export {
  WordSelectionRowSchema,
  SelectedWordSchema,
  EnrichedWordSchema,
  EnrichedWordListSchema,
  type WordSelectionRow,
  type SelectedWord,
  type EnrichedWord,
} from './vocabulary.js';

// ============================================================================
// Generated Entries
// ============================================================================

export {
  ExampleSentenceSchema,
  FinalEntrySchema,
  FinalOutputSchema,
  GenerationResponseSchema,
  type ExampleSentence,
  type FinalEntry,
  type GenerationPayload,
} from './entry.js';

// ============================================================================
// Checkpoints
// ============================================================================

export {
  CheckpointRecordSchema,
  createEmptyCheckpoint,
  type CheckpointRecord,
} from './checkpoint.js';
