/**
 * Generated Entry Schemas
 *
 * The generation service answers in snake_case JSON; GenerationResponseSchema
 * validates that wire shape and maps it onto the camelCase domain records.
 */

import { z } from 'zod';

// ============================================================================
// Example Sentence
// ============================================================================

export const ExampleSentenceSchema = z.object({
  sentence: z.string(),
  style: z.string(),
  translation: z.string(),
  translatedWord: z.string(),
  /** 1-4 for examples picked for display, absent for the rest */
  displayOrder: z.number().int().positive().optional(),
});

export type ExampleSentence = z.infer<typeof ExampleSentenceSchema>;

// ============================================================================
// Final Entry
// ============================================================================

/**
 * Complete vocabulary entry: enrichment data plus generated content.
 */
export const FinalEntrySchema = z.object({
  word: z.string().min(1),
  phonetic: z.string().nullable(),
  partsOfSpeech: z.array(z.string()),
  selectedPartOfSpeech: z.string(),
  definition: z.string(),
  examples: z.array(ExampleSentenceSchema),
});

export type FinalEntry = z.infer<typeof FinalEntrySchema>;

/**
 * Output artifact: a JSON array of final entries.
 */
export const FinalOutputSchema = z.array(FinalEntrySchema);

// ============================================================================
// Generation Payload
// ============================================================================

/**
 * Generated content for a single word.
 */
export interface GenerationPayload {
  selectedPartOfSpeech: string;
  definition: string;
  examples: ExampleSentence[];
}

const WireExampleSchema = z.object({
  sentence: z.string().default(''),
  style: z.string().default(''),
  translation: z.string().default(''),
  translated_word: z.string().default(''),
  display_order: z.number().int().positive().nullish(),
});

/**
 * Wire format returned by the generation service. Required top-level fields
 * are checked explicitly; missing example fields default to empty strings.
 */
export const GenerationResponseSchema = z
  .object({
    selected_pos: z.string({ required_error: "Response missing 'selected_pos' field" }),
    definition: z.string({ required_error: "Response missing 'definition' field" }),
    examples: z.array(WireExampleSchema, { required_error: "Response missing 'examples' field" }),
  })
  .transform(
    (data): GenerationPayload => ({
      selectedPartOfSpeech: data.selected_pos,
      definition: data.definition,
      examples: data.examples.map((example) => ({
        sentence: example.sentence,
        style: example.style,
        translation: example.translation,
        translatedWord: example.translated_word,
        ...(example.display_order != null ? { displayOrder: example.display_order } : {}),
      })),
    })
  );
