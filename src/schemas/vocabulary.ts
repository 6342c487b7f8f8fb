/**
 * Vocabulary Schemas
 *
 * Input rows and the enriched word records passed from the enrichment stage
 * to the generation stage.
 */

import { z } from 'zod';

// ============================================================================
// Word Selection (input CSV)
// ============================================================================

/**
 * One row of word_selection.csv. Only rows flagged `include == "Y"` are kept.
 */
export const WordSelectionRowSchema = z.object({
  frequency: z.coerce.number().int().positive(),
  word: z.string().trim().default(''),
  include: z.string().trim().default(''),
});

export type WordSelectionRow = z.infer<typeof WordSelectionRowSchema>;

// ============================================================================
// Selected Word
// ============================================================================

/**
 * A word selected for processing. Row order of the selected-words file is
 * ascending frequency (lower frequency = more common word).
 */
export const SelectedWordSchema = z.object({
  frequency: z.coerce.number().int().positive(),
  word: z.string().trim().min(1),
});

export type SelectedWord = z.infer<typeof SelectedWordSchema>;

// ============================================================================
// Enriched Word
// ============================================================================

/**
 * A word enriched with phonetic and part-of-speech data.
 * Words the dictionary does not know keep `phonetic: null` and no parts of speech.
 */
export const EnrichedWordSchema = z.object({
  word: z.string().min(1),
  phonetic: z.string().nullable(),
  partsOfSpeech: z.array(z.string()),
});

export type EnrichedWord = z.infer<typeof EnrichedWordSchema>;

export const EnrichedWordListSchema = z.array(EnrichedWordSchema);
