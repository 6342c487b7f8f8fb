/**
 * Free Dictionary API Client
 *
 * Looks up pronunciation and parts of speech for a word. Timeouts and HTTP
 * errors are retried with exponential backoff; a 404 is final.
 *
 * @module clients/dictionary/client
 */

import {
  DEFAULT_DICTIONARY_API_URL,
  DEFAULT_DICTIONARY_MAX_ATTEMPTS,
  DEFAULT_DICTIONARY_TIMEOUT_MS,
} from '../../config/defaults.js';
import { silentLogger, type Logger } from '../../logging/logger.js';
import { createAbortError, type SleepFn } from '../../pipeline/sleep.js';
import { withRetry } from '../retry.js';
import {
  DictionaryLookupError,
  WordNotFoundError,
  type DictionaryEntry,
  type DictionaryService,
} from '../types.js';
import { DictionaryApiResponseSchema, parseDictionaryResponse } from './parser.js';

// ============================================================================
// Types
// ============================================================================

export interface FreeDictionaryClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  /** First backoff delay (default: 1000) */
  baseDelayMs?: number;
  /** Backoff ceiling (default: 10000) */
  maxDelayMs?: number;
  sleep?: SleepFn;
  logger?: Logger;
}

const DEFAULTS = {
  baseDelayMs: 1000,
  maxDelayMs: 10_000,
} as const;

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * FreeDictionaryClient implements DictionaryService over HTTP.
 *
 * @example
 * ```typescript
 * const dictionary = new FreeDictionaryClient({ baseUrl: config.enrichment.dictionaryApiUrl });
 * const { phonetic, partsOfSpeech } = await dictionary.lookup('serendipity');
 * ```
 */
export class FreeDictionaryClient implements DictionaryService {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly sleep?: SleepFn;
  private readonly logger: Logger;

  constructor(options: FreeDictionaryClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_DICTIONARY_API_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DICTIONARY_TIMEOUT_MS;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_DICTIONARY_MAX_ATTEMPTS;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    this.sleep = options.sleep;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Look up a word.
   *
   * @throws WordNotFoundError on 404
   * @throws DictionaryLookupError when every attempt failed or the payload is unusable
   */
  async lookup(word: string, signal?: AbortSignal): Promise<DictionaryEntry> {
    return withRetry(() => this.lookupOnce(word, signal), {
      maxAttempts: this.maxAttempts,
      baseDelayMs: this.baseDelayMs,
      maxDelayMs: this.maxDelayMs,
      shouldRetry: (error) => error instanceof DictionaryLookupError && error.isRetryable,
      onRetry: (error, attempt, delayMs) => {
        this.logger.debug(
          `Dictionary lookup for "${word}" failed (attempt ${attempt}/${this.maxAttempts}), ` +
            `retrying in ${delayMs}ms: ${error instanceof Error ? error.message : String(error)}`
        );
      },
      sleep: this.sleep,
      signal,
    });
  }

  private async lookupOnce(word: string, signal?: AbortSignal): Promise<DictionaryEntry> {
    const url = `${this.baseUrl}/${encodeURIComponent(word)}`;
    const response = await this.fetchWithTimeout(url, signal);

    if (response.status === 404) {
      throw new WordNotFoundError(word);
    }

    if (!response.ok) {
      throw new DictionaryLookupError(`Dictionary API error for "${word}": HTTP ${response.status}`, {
        statusCode: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new DictionaryLookupError(`Unexpected response format for: ${word}`, {
        statusCode: response.status,
        isRetryable: false,
        cause: error,
      });
    }

    const parsed = DictionaryApiResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DictionaryLookupError(`Unexpected response format for: ${word}`, {
        statusCode: response.status,
        isRetryable: false,
      });
    }

    return parseDictionaryResponse(parsed.data);
  }

  /**
   * Execute fetch with timeout using AbortController. An abort of the
   * caller's signal surfaces as an AbortError, never as a lookup failure.
   */
  private async fetchWithTimeout(url: string, signal?: AbortSignal): Promise<Response> {
    if (signal?.aborted) {
      throw createAbortError();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      return await fetch(url, { signal: controller.signal });
    } catch (error) {
      if (signal?.aborted) {
        throw createAbortError();
      }
      if (timedOut) {
        throw new DictionaryLookupError(`Request timed out after ${this.timeoutMs}ms`, {
          statusCode: 408,
          cause: error,
        });
      }
      throw new DictionaryLookupError(
        `Dictionary request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
