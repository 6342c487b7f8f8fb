/**
 * External Service Contracts
 *
 * Interfaces the enrichment and generation stages depend on, plus the
 * errors their implementations raise.
 *
 * @module clients/types
 */

import { MalformedResponseError, TransientExternalError } from '../errors.js';
import type { GenerationPayload } from '../schemas/entry.js';

// ============================================================================
// Dictionary
// ============================================================================

/**
 * What the dictionary knows about a word.
 */
export interface DictionaryEntry {
  phonetic: string | null;
  /** Sorted, unique */
  partsOfSpeech: string[];
}

export interface DictionaryService {
  /**
   * @throws WordNotFoundError when the dictionary has no entry
   * @throws DictionaryLookupError on any other failure
   */
  lookup(word: string, signal?: AbortSignal): Promise<DictionaryEntry>;
}

/**
 * The dictionary answered 404 for the word.
 */
export class WordNotFoundError extends Error {
  constructor(public readonly word: string) {
    super(`Word not found: ${word}`);
    this.name = 'WordNotFoundError';
  }
}

/**
 * Dictionary request failed (timeout, HTTP error or unexpected payload).
 */
export class DictionaryLookupError extends TransientExternalError {}

// ============================================================================
// Generation
// ============================================================================

export interface GenerationService {
  /**
   * Generate definition and example sentences for one word.
   *
   * @throws GenerationError
   */
  generate(
    word: string,
    partsOfSpeech: readonly string[],
    promptTemplate: string,
    signal?: AbortSignal
  ): Promise<GenerationPayload>;
}

/**
 * The generation request did not finish within the configured timeout.
 */
export class GenerationTimeoutError extends TransientExternalError {
  constructor(
    public readonly timeoutMs: number,
    options: { cause?: unknown } = {}
  ) {
    super(`Generation timed out after ${timeoutMs}ms`, { statusCode: 408, isRetryable: true, cause: options.cause });
  }
}

/**
 * The generation service returned an error or an empty answer.
 */
export class GenerationServiceError extends TransientExternalError {}

export type GenerationResponseReason = 'parse_error' | 'schema_error';

/**
 * The generation service answered with content that is not a usable entry.
 */
export class GenerationResponseError extends MalformedResponseError {
  constructor(
    message: string,
    public readonly reason: GenerationResponseReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type GenerationError = GenerationTimeoutError | GenerationServiceError | GenerationResponseError;

/**
 * Check if an error is one the generation stage counts toward its
 * consecutive-failure threshold.
 */
export function isGenerationError(error: unknown): error is GenerationError {
  return (
    error instanceof GenerationTimeoutError ||
    error instanceof GenerationServiceError ||
    error instanceof GenerationResponseError
  );
}
