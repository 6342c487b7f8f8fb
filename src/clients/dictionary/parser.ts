/**
 * Dictionary Response Parser
 *
 * @module clients/dictionary/parser
 */

import { z } from 'zod';
import type { DictionaryEntry } from '../types.js';

const PhoneticSchema = z.object({
  text: z.string().nullish(),
});

const MeaningSchema = z.object({
  partOfSpeech: z.string().nullish(),
});

const ApiEntrySchema = z.object({
  phonetic: z.string().nullish(),
  phonetics: z.array(PhoneticSchema).nullish(),
  meanings: z.array(MeaningSchema).nullish(),
});

/**
 * Free Dictionary API response: one entry per etymology.
 */
export const DictionaryApiResponseSchema = z.array(ApiEntrySchema).min(1);

export type DictionaryApiResponse = z.infer<typeof DictionaryApiResponseSchema>;

/**
 * Reduce the API entries to a phonetic and the set of parts of speech.
 *
 * The phonetic comes from the first entry that has one, preferring its
 * `phonetic` field over the `phonetics` list.
 */
export function parseDictionaryResponse(entries: DictionaryApiResponse): DictionaryEntry {
  let phonetic: string | null = null;
  const partsOfSpeech = new Set<string>();

  for (const entry of entries) {
    if (!phonetic) {
      if (entry.phonetic) {
        phonetic = entry.phonetic;
      } else {
        phonetic = entry.phonetics?.find((p) => p.text)?.text ?? null;
      }
    }

    for (const meaning of entry.meanings ?? []) {
      if (meaning.partOfSpeech) {
        partsOfSpeech.add(meaning.partOfSpeech);
      }
    }
  }

  return {
    phonetic,
    partsOfSpeech: [...partsOfSpeech].sort(),
  };
}
