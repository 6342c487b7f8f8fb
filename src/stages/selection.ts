/**
 * Step 1: Word Selection
 *
 * Keeps the rows of word_selection.csv flagged `include == "Y"` that carry a
 * word, sorts them by frequency and writes the selected-words CSV every later
 * step reads.
 *
 * @module stages/selection
 */

import * as fs from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { WordSelectionRowSchema, type SelectedWord } from '../schemas/vocabulary.js';
import type { PipelineConfig } from '../config/index.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { saveSelectedWords, VocabularyFormatError } from './vocabulary.js';

/**
 * Filter and sort word-selection rows.
 *
 * Sorting is stable, so words sharing a frequency keep their input order.
 */
export function selectWords(content: string, filePath = '<input>'): SelectedWord[] {
  const records: unknown[] = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });

  const selected: SelectedWord[] = [];
  records.forEach((record, index) => {
    const result = WordSelectionRowSchema.safeParse(record);
    if (!result.success) {
      throw new VocabularyFormatError(filePath, `row ${index + 2}: ${result.error.issues[0]?.message ?? 'invalid row'}`);
    }
    const row = result.data;
    if (row.include === 'Y' && row.word.length > 0) {
      selected.push({ frequency: row.frequency, word: row.word });
    }
  });

  return selected.sort((a, b) => a.frequency - b.frequency);
}

/**
 * Run step 1 against the configured paths.
 */
export async function runSelectionStage(config: PipelineConfig, logger: Logger = silentLogger): Promise<SelectedWord[]> {
  const { wordSelectionCsv, selectedWordsCsv } = config.paths;
  logger.info('Step 1: Filtering selected words...');

  const words = selectWords(await fs.readFile(wordSelectionCsv, 'utf-8'), wordSelectionCsv);
  await saveSelectedWords(selectedWordsCsv, words);

  logger.info(`  Selected ${words.length} words for processing`);
  logger.info(`  Output saved to: ${selectedWordsCsv}`);
  return words;
}
