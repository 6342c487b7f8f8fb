/**
 * Generation Client Tests
 *
 * Tests for response parsing, prompt rendering and the OpenAI client.
 * The client is driven through an injected completion function; no network
 * calls are made.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, jest } from '@jest/globals';
import OpenAI from 'openai';
import { OpenAIGenerationClient, type CompletionFn } from './client.js';
import { extractJson, parseGenerationResponse } from './parser.js';
import { formatPartsOfSpeech, loadPromptTemplate, renderPrompt } from './prompts.js';
import {
  GenerationResponseError,
  GenerationServiceError,
  GenerationTimeoutError,
  isGenerationError,
} from '../types.js';
import { ConfigurationError } from '../../errors.js';
import type { SleepFn } from '../../pipeline/sleep.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const validResponse = {
  selected_pos: 'noun',
  definition: 'A small domesticated feline.',
  examples: [
    {
      sentence: 'The cat slept in the sun.',
      style: 'Warm',
      translation: 'El gato durmió al sol.',
      translated_word: 'gato',
      display_order: 1,
    },
    {
      sentence: 'A cat is a mammal.',
      style: 'Definitional',
      translation: 'Un gato es un mamífero.',
      translated_word: 'gato',
      display_order: null,
    },
  ],
};

// ============================================================================
// Parser
// ============================================================================

describe('extractJson', () => {
  it('should parse bare JSON', () => {
    expect(extractJson('{"a": 1}')).toEqual({ ok: true, value: { a: 1 } });
  });

  it('should parse a fenced block', () => {
    expect(extractJson('Here you go:\n```json\n{"a": 2}\n```\nEnjoy')).toEqual({ ok: true, value: { a: 2 } });
  });

  it('should parse an object surrounded by prose', () => {
    expect(extractJson('Sure! {"a": {"b": 3}} Hope that helps.')).toEqual({ ok: true, value: { a: { b: 3 } } });
  });

  it('should fail when there is no JSON object', () => {
    expect(extractJson('no json here')).toEqual({ ok: false });
  });
});

describe('parseGenerationResponse', () => {
  it('should map the wire format onto a payload', () => {
    const result = parseGenerationResponse(JSON.stringify(validResponse));

    expect(result).toEqual({
      status: 'ok',
      payload: {
        selectedPartOfSpeech: 'noun',
        definition: 'A small domesticated feline.',
        examples: [
          {
            sentence: 'The cat slept in the sun.',
            style: 'Warm',
            translation: 'El gato durmió al sol.',
            translatedWord: 'gato',
            displayOrder: 1,
          },
          {
            sentence: 'A cat is a mammal.',
            style: 'Definitional',
            translation: 'Un gato es un mamífero.',
            translatedWord: 'gato',
          },
        ],
      },
    });
  });

  it('should default missing example fields to empty strings', () => {
    const result = parseGenerationResponse('{"selected_pos":"verb","definition":"d","examples":[{}]}');

    expect(result.status === 'ok' && result.payload.examples).toEqual([
      { sentence: '', style: '', translation: '', translatedWord: '' },
    ]);
  });

  it('should report a missing required field', () => {
    const result = parseGenerationResponse('{"selected_pos":"noun","examples":[]}');

    expect(result).toEqual({
      status: 'schema_error',
      message: "Response missing 'definition' field",
      issues: ["definition: Response missing 'definition' field"],
    });
  });

  it('should reject a JSON value that is not an object', () => {
    expect(parseGenerationResponse('"just a string"')).toEqual({
      status: 'schema_error',
      message: 'Response is not a JSON object',
      issues: ['expected object'],
    });
  });

  it('should quote a truncated excerpt of unparseable content', () => {
    const content = 'x'.repeat(250);
    const result = parseGenerationResponse(content);

    expect(result).toEqual({
      status: 'parse_error',
      message: `Could not extract JSON from response: ${'x'.repeat(200)}...`,
    });
  });
});

// ============================================================================
// Prompts
// ============================================================================

describe('prompts', () => {
  it('should join parts of speech or fall back to unknown', () => {
    expect(formatPartsOfSpeech(['noun', 'verb'])).toBe('noun, verb');
    expect(formatPartsOfSpeech([])).toBe('unknown');
  });

  it('should replace every placeholder and leave other braces alone', () => {
    expect(renderPrompt('{word} ({pos}): use {word} in {"json": true}', 'run', ['verb'])).toBe(
      'run (verb): use run in {"json": true}'
    );
  });

  it('should load a template and reject a missing or empty one', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'prompt-test-'));
    try {
      const filePath = path.join(dir, 'example_generation.txt');
      await expect(loadPromptTemplate(filePath)).rejects.toThrow(`Prompt template not found: ${filePath}`);

      await fs.writeFile(filePath, '  \n');
      await expect(loadPromptTemplate(filePath)).rejects.toThrow(`Prompt template is empty: ${filePath}`);

      await fs.writeFile(filePath, 'Define {word}');
      await expect(loadPromptTemplate(filePath)).resolves.toBe('Define {word}');
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

// ============================================================================
// Client
// ============================================================================

describe('OpenAIGenerationClient', () => {
  function createClient(complete: CompletionFn, sleep = jest.fn<SleepFn>().mockResolvedValue(undefined)) {
    return new OpenAIGenerationClient({ complete, model: 'test-model', timeoutMs: 20, maxAttempts: 3, sleep });
  }

  it('should require an API key or a completion function', () => {
    expect(() => new OpenAIGenerationClient()).toThrow(ConfigurationError);
  });

  it('should accept an API key', () => {
    expect(() => new OpenAIGenerationClient({ apiKey: 'test-secret' })).not.toThrow();
  });

  it('should send the rendered prompt and return the payload', async () => {
    const complete = jest.fn<CompletionFn>().mockResolvedValue(JSON.stringify(validResponse));

    const payload = await createClient(complete).generate('cat', ['noun', 'verb'], 'Word: {word}. POS: {pos}.');

    expect(complete.mock.calls[0]?.[0]).toEqual({ model: 'test-model', prompt: 'Word: cat. POS: noun, verb.' });
    expect(payload.definition).toBe('A small domesticated feline.');
  });

  it('should retry timeouts and fail after the last attempt', async () => {
    const sleep = jest.fn<SleepFn>().mockResolvedValue(undefined);
    const complete = jest.fn<CompletionFn>().mockImplementation(
      (_request, signal) =>
        new Promise<string | null>((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    const error = await createClient(complete, sleep)
      .generate('cat', [], '{word}')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationTimeoutError);
    expect(complete).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([5000, 10_000]);
  });

  it('should recover when a retry succeeds', async () => {
    const complete = jest
      .fn<CompletionFn>()
      .mockRejectedValueOnce(new OpenAI.APIConnectionTimeoutError())
      .mockResolvedValue(JSON.stringify(validResponse));

    const payload = await createClient(complete).generate('cat', [], '{word}');

    expect(payload.selectedPartOfSpeech).toBe('noun');
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it('should not retry service errors', async () => {
    const complete = jest
      .fn<CompletionFn>()
      .mockRejectedValue(new OpenAI.APIError(503, undefined, 'Service unavailable', undefined));

    const error = await createClient(complete)
      .generate('cat', [], '{word}')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationServiceError);
    expect(error).toHaveProperty('statusCode', 503);
    expect(error).toHaveProperty('isRetryable', true);
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('should wrap unknown failures as service errors', async () => {
    const complete = jest.fn<CompletionFn>().mockRejectedValue(new Error('socket hang up'));

    const error = await createClient(complete)
      .generate('cat', [], '{word}')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationServiceError);
    expect(error).toHaveProperty('message', 'socket hang up');
  });

  it('should treat an empty answer as a service error', async () => {
    const complete = jest.fn<CompletionFn>().mockResolvedValue('   ');

    await expect(createClient(complete).generate('cat', [], '{word}')).rejects.toThrow(
      'Empty response from generation service'
    );
  });

  it('should raise a response error for unusable content', async () => {
    const complete = jest.fn<CompletionFn>().mockResolvedValue('I cannot help with that.');

    const error = await createClient(complete)
      .generate('cat', [], '{word}')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationResponseError);
    expect(error).toHaveProperty('reason', 'parse_error');
    expect(isGenerationError(error)).toBe(true);
  });

  it('should surface a caller abort as an AbortError', async () => {
    const controller = new AbortController();
    const complete = jest.fn<CompletionFn>().mockImplementation(async () => {
      controller.abort();
      throw new Error('aborted');
    });

    const error = await createClient(complete)
      .generate('cat', [], '{word}', controller.signal)
      .catch((e: unknown) => e);

    expect(error).toHaveProperty('name', 'AbortError');
    expect(isGenerationError(error)).toBe(false);
  });
});
