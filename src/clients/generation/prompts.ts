/**
 * Generation Prompt
 *
 * The prompt lives in `prompts/example_generation.txt` under the data
 * directory so it can be tuned without a rebuild. `{word}` and `{pos}` are
 * the only placeholders.
 *
 * @module clients/generation/prompts
 */

import * as fs from 'node:fs/promises';

/** Shown in place of parts of speech when the dictionary had none */
export const UNKNOWN_POS = 'unknown';

/**
 * Render the parts-of-speech placeholder value.
 *
 * @example
 * formatPartsOfSpeech(['noun', 'verb']); // 'noun, verb'
 * formatPartsOfSpeech([]); // 'unknown'
 */
export function formatPartsOfSpeech(partsOfSpeech: readonly string[]): string {
  return partsOfSpeech.length > 0 ? partsOfSpeech.join(', ') : UNKNOWN_POS;
}

/**
 * Substitute `{word}` and `{pos}` in the template. Every occurrence is
 * replaced; other braces are left alone.
 */
export function renderPrompt(template: string, word: string, partsOfSpeech: readonly string[]): string {
  const pos = formatPartsOfSpeech(partsOfSpeech);
  return template.replace(/\{(word|pos)\}/g, (_match, key: string) => (key === 'word' ? word : pos));
}

/**
 * Load the prompt template.
 *
 * @throws Error if the file does not exist or is empty
 */
export async function loadPromptTemplate(filePath: string): Promise<string> {
  let template: string;
  try {
    template = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Prompt template not found: ${filePath}`, { cause: error });
    }
    throw error;
  }

  if (template.trim().length === 0) {
    throw new Error(`Prompt template is empty: ${filePath}`);
  }
  return template;
}
