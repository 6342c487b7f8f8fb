/**
 * Generation Client Module
 *
 * @module clients/generation
 */

export {
  OpenAIGenerationClient,
  createOpenAICompletion,
  type CompletionFn,
  type CompletionRequest,
  type OpenAIGenerationClientOptions,
} from './client.js';
export { extractJson, parseGenerationResponse, type GenerationParseResult } from './parser.js';
export { formatPartsOfSpeech, loadPromptTemplate, renderPrompt, UNKNOWN_POS } from './prompts.js';
