/**
 * Vocabulary Files
 *
 * Readers and writers for the word lists the stages exchange:
 * selected words (CSV with frequency,word or plain text, one word per line),
 * enriched words (JSON) and output artifacts (JSON).
 *
 * @module stages/vocabulary
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { SelectedWordSchema, EnrichedWordListSchema, type EnrichedWord, type SelectedWord } from '../schemas/vocabulary.js';
import { FinalOutputSchema, type FinalEntry } from '../schemas/entry.js';
import { atomicWriteJson, fileExists, readJson } from '../storage/atomic.js';

/**
 * Raised when a vocabulary file has rows that fail validation.
 */
export class VocabularyFormatError extends Error {
  constructor(
    public readonly filePath: string,
    detail: string
  ) {
    super(`Invalid vocabulary file ${filePath}: ${detail}`);
    this.name = 'VocabularyFormatError';
  }
}

// ============================================================================
// Selected Words
// ============================================================================

/**
 * Parse selected-words CSV content (header: frequency,word).
 */
export function parseSelectedWordsCsv(content: string, filePath = '<input>'): SelectedWord[] {
  const records: unknown[] = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });

  return records.map((record, index) => {
    const result = SelectedWordSchema.safeParse(record);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new VocabularyFormatError(
        filePath,
        `row ${index + 2}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid row'}`
      );
    }
    return result.data;
  });
}

/**
 * Parse a plain word list. Frequency is the 1-based line position among
 * non-empty lines.
 */
export function parseWordList(content: string): SelectedWord[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((word, index) => ({ frequency: index + 1, word }));
}

/**
 * Load the vocabulary from a `.csv` or `.txt` file.
 */
export async function loadSelectedWords(filePath: string): Promise<SelectedWord[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return path.extname(filePath).toLowerCase() === '.txt'
    ? parseWordList(content)
    : parseSelectedWordsCsv(content, filePath);
}

/**
 * Write selected words as CSV with a frequency,word header.
 */
export async function saveSelectedWords(filePath: string, words: readonly SelectedWord[]): Promise<void> {
  const content = stringify(
    words.map((w) => ({ frequency: w.frequency, word: w.word })),
    { header: true, columns: ['frequency', 'word'] }
  );
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf-8');
}

// ============================================================================
// Enriched Words
// ============================================================================

/**
 * Load previously enriched words; empty when the file does not exist.
 */
export async function loadEnrichedWords(filePath: string): Promise<EnrichedWord[]> {
  if (!(await fileExists(filePath))) {
    return [];
  }
  const result = EnrichedWordListSchema.safeParse(await readJson(filePath));
  if (!result.success) {
    throw new VocabularyFormatError(filePath, result.error.issues[0]?.message ?? 'invalid enriched words');
  }
  return result.data;
}

export async function saveEnrichedWords(filePath: string, words: readonly EnrichedWord[]): Promise<void> {
  await atomicWriteJson(filePath, words);
}

// ============================================================================
// Output Artifacts
// ============================================================================

/**
 * Load a generation output artifact; empty when the file does not exist.
 */
export async function loadFinalOutput(filePath: string): Promise<FinalEntry[]> {
  if (!(await fileExists(filePath))) {
    return [];
  }
  const result = FinalOutputSchema.safeParse(await readJson(filePath));
  if (!result.success) {
    throw new VocabularyFormatError(filePath, result.error.issues[0]?.message ?? 'invalid output');
  }
  return result.data;
}

export async function saveFinalOutput(filePath: string, entries: readonly FinalEntry[]): Promise<void> {
  await atomicWriteJson(filePath, entries);
}
