/**
 * OpenAI Generation Client
 *
 * Generates definitions and example sentences through OpenAI chat
 * completions in JSON mode. Timeouts are retried with backoff; every other
 * failure is reported to the caller immediately so the generation stage can
 * count it toward its consecutive-failure threshold.
 *
 * @module clients/generation/client
 */

import OpenAI from 'openai';
import {
  DEFAULT_GENERATION_MAX_ATTEMPTS,
  DEFAULT_GENERATION_MODEL,
  DEFAULT_GENERATION_TIMEOUT_MS,
} from '../../config/defaults.js';
import { ConfigurationError } from '../../errors.js';
import { silentLogger, type Logger } from '../../logging/logger.js';
import { createAbortError, type SleepFn } from '../../pipeline/sleep.js';
import type { GenerationPayload } from '../../schemas/entry.js';
import { withRetry } from '../retry.js';
import {
  GenerationResponseError,
  GenerationServiceError,
  GenerationTimeoutError,
  type GenerationService,
} from '../types.js';
import { parseGenerationResponse } from './parser.js';
import { renderPrompt } from './prompts.js';

// ============================================================================
// Types
// ============================================================================

export interface CompletionRequest {
  model: string;
  prompt: string;
}

/**
 * Sends one prompt and resolves with the raw message content.
 */
export type CompletionFn = (request: CompletionRequest, signal: AbortSignal) => Promise<string | null>;

export interface OpenAIGenerationClientOptions {
  /** Required unless `complete` is supplied */
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  /** Attempts per word when the request times out */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Replaces the OpenAI call, mainly for tests */
  complete?: CompletionFn;
  sleep?: SleepFn;
  logger?: Logger;
}

const DEFAULTS = {
  temperature: 0.7,
  baseDelayMs: 5000,
  maxDelayMs: 60_000,
} as const;

/** HTTP statuses worth another request */
const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

/**
 * Build a CompletionFn backed by the OpenAI SDK.
 *
 * SDK-level retries are disabled; retry policy belongs to the caller.
 */
export function createOpenAICompletion(apiKey: string): CompletionFn {
  const client = new OpenAI({ apiKey, maxRetries: 0 });

  return async ({ model, prompt }, signal) => {
    const response = await client.chat.completions.create(
      {
        model,
        messages: [{ role: 'user', content: prompt }],
        temperature: DEFAULTS.temperature,
        response_format: { type: 'json_object' },
      },
      { signal }
    );
    return response.choices[0]?.message?.content ?? null;
  };
}

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * OpenAIGenerationClient implements GenerationService.
 *
 * @example
 * ```typescript
 * const generator = new OpenAIGenerationClient({ apiKey: requireApiKey(config) });
 * const payload = await generator.generate('ephemeral', ['adjective'], template);
 * ```
 */
export class OpenAIGenerationClient implements GenerationService {
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly complete: CompletionFn;
  private readonly sleep?: SleepFn;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError if neither an API key nor a completion function is given
   */
  constructor(options: OpenAIGenerationClientOptions = {}) {
    if (options.complete) {
      this.complete = options.complete;
    } else if (options.apiKey) {
      this.complete = createOpenAICompletion(options.apiKey);
    } else {
      throw new ConfigurationError(
        'Missing required API key: OPENAI_API_KEY. Please set it in your .env file.'
      );
    }

    this.model = options.model ?? DEFAULT_GENERATION_MODEL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_GENERATION_MAX_ATTEMPTS;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    this.sleep = options.sleep;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Generate content for one word.
   *
   * @throws GenerationTimeoutError when every attempt timed out
   * @throws GenerationServiceError when the service failed or answered empty
   * @throws GenerationResponseError when the answer is not a valid entry
   */
  async generate(
    word: string,
    partsOfSpeech: readonly string[],
    promptTemplate: string,
    signal?: AbortSignal
  ): Promise<GenerationPayload> {
    const prompt = renderPrompt(promptTemplate, word, partsOfSpeech);

    const content = await withRetry(() => this.requestWithTimeout(prompt, signal), {
      maxAttempts: this.maxAttempts,
      baseDelayMs: this.baseDelayMs,
      maxDelayMs: this.maxDelayMs,
      shouldRetry: (error) => error instanceof GenerationTimeoutError,
      onRetry: (_error, attempt, delayMs) => {
        this.logger.warn(
          `Generation for "${word}" timed out (attempt ${attempt}/${this.maxAttempts}), retrying in ${delayMs}ms`
        );
      },
      sleep: this.sleep,
      signal,
    });

    const result = parseGenerationResponse(content);
    switch (result.status) {
      case 'ok':
        return result.payload;
      case 'parse_error':
        throw new GenerationResponseError(result.message, 'parse_error');
      case 'schema_error':
        throw new GenerationResponseError(result.message, 'schema_error');
    }
  }

  private async requestWithTimeout(prompt: string, signal?: AbortSignal): Promise<string> {
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

    let content: string | null;
    try {
      content = await this.complete({ model: this.model, prompt }, controller.signal);
    } catch (error) {
      if (signal?.aborted) {
        throw createAbortError();
      }
      if (timedOut || error instanceof OpenAI.APIConnectionTimeoutError) {
        throw new GenerationTimeoutError(this.timeoutMs, { cause: error });
      }
      if (error instanceof OpenAI.APIError) {
        throw new GenerationServiceError(error.message, {
          statusCode: error.status,
          isRetryable: error.status !== undefined && RETRYABLE_STATUSES.has(error.status),
          cause: error,
        });
      }
      throw new GenerationServiceError(error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    }

    if (!content || content.trim().length === 0) {
      throw new GenerationServiceError('Empty response from generation service');
    }
    return content;
  }
}
