import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import {
  createFinalEntry,
  generateEntries,
  runGenerationStage,
  validateEntry,
  type GenerationContext,
} from './generation.js';
import { saveEnrichedWords, saveFinalOutput } from './vocabulary.js';
import { GenerationServiceError, GenerationTimeoutError, type GenerationService } from '../clients/types.js';
import { createPipelineConfig, EXAMPLE_STYLES, type PipelineConfig } from '../config/index.js';
import { SystemicFailureError } from '../errors.js';
import { CheckpointStore } from '../pipeline/checkpoint.js';
import type { FinalEntry, GenerationPayload } from '../schemas/entry.js';
import type { EnrichedWord } from '../schemas/vocabulary.js';

type Generate = GenerationService['generate'];

function payload(word: string): GenerationPayload {
  return {
    selectedPartOfSpeech: 'noun',
    definition: `meaning of ${word}`,
    examples: EXAMPLE_STYLES.map((style, i) => ({
      sentence: `${style} sentence with ${word}.`,
      style,
      translation: `frase con ${word}.`,
      translatedWord: word,
      ...(i < 4 ? { displayOrder: i + 1 } : {}),
    })),
  };
}

function enriched(word: string): EnrichedWord {
  return { word, phonetic: `/${word}/`, partsOfSpeech: ['noun'] };
}

function words(count: number): EnrichedWord[] {
  return Array.from({ length: count }, (_, i) => enriched(`word${i}`));
}

async function readEntries(filePath: string): Promise<FinalEntry[]> {
  const parsed: FinalEntry[] = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  return parsed;
}

describe('stages/generation', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'generation-test-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('createFinalEntry', () => {
    it('should merge enrichment data with generated content', () => {
      const entry = createFinalEntry(enriched('cat'), payload('cat'));

      expect(entry.word).toBe('cat');
      expect(entry.phonetic).toBe('/cat/');
      expect(entry.partsOfSpeech).toEqual(['noun']);
      expect(entry.definition).toBe('meaning of cat');
      expect(entry.examples).toHaveLength(9);
    });
  });

  describe('validateEntry', () => {
    it('should accept a complete entry', () => {
      expect(validateEntry(createFinalEntry(enriched('cat'), payload('cat')), EXAMPLE_STYLES)).toEqual([]);
    });

    it('should flag a wrong example count', () => {
      const entry = createFinalEntry(enriched('cat'), { ...payload('cat'), examples: [] });

      expect(validateEntry(entry, EXAMPLE_STYLES)).toEqual(['Expected 9 examples, got 0']);
    });

    it('should flag a translated word missing from its translation and em dashes', () => {
      const entry = createFinalEntry(enriched('cat'), {
        selectedPartOfSpeech: 'noun',
        definition: 'a pet',
        examples: [
          { sentence: 'The cat sleeps.', style: 'Warm', translation: 'El gato duerme.', translatedWord: 'felino' },
          { sentence: 'A cat — quiet.', style: 'Poetic', translation: 'Un gato.', translatedWord: 'gato' },
        ],
      });

      expect(validateEntry(entry, ['Warm', 'Poetic'])).toEqual([
        "Example 1: translated word 'felino' not in translation",
        'Example 2: contains em dash',
      ]);
    });
  });

  describe('generateEntries', () => {
    let outputPath: string;

    function createContext(generate: Generate): GenerationContext {
      return {
        generator: { generate },
        checkpoint: new CheckpointStore(path.join(testDir, 'checkpoints', 'generation_progress.json')),
        promptTemplate: 'Define {word} ({pos})',
        outputPath,
        saveEvery: 10,
        consecutiveFailureThreshold: 2,
        exampleStyles: EXAMPLE_STYLES,
        logger: { debug: () => undefined, info: () => undefined, warn: () => undefined, error: () => undefined },
      };
    }

    beforeEach(() => {
      outputPath = path.join(testDir, 'data', 'final_output_20260301_090000.json');
    });

    it('should stop after two consecutive failures and keep only the last periodic save', async () => {
      const generate = jest.fn<Generate>().mockImplementation(async (word) => {
        if (word === 'word10' || word === 'word11') {
          throw new GenerationServiceError('HTTP 500');
        }
        return payload(word);
      });
      const context = createContext(generate);
      const entries = new Map<string, FinalEntry>();

      const run = generateEntries(words(15), entries, context);

      await expect(run).rejects.toBeInstanceOf(SystemicFailureError);
      await expect(run).rejects.toThrow('Stopping after 2 consecutive generation errors');
      expect(generate).toHaveBeenCalledTimes(12);
      expect(await readEntries(outputPath)).toHaveLength(10);
      expect(await context.checkpoint.failedKeys()).toEqual(['word10', 'word11']);
      expect(await context.checkpoint.processedCount()).toBe(10);
    });

    it('should leave successes after the last periodic save out of the file when stopping', async () => {
      const generate = jest.fn<Generate>().mockImplementation(async (word) => {
        if (word === 'word12' || word === 'word13') {
          throw new GenerationServiceError('HTTP 500');
        }
        return payload(word);
      });
      const context = createContext(generate);
      const entries = new Map<string, FinalEntry>();

      await expect(generateEntries(words(15), entries, context)).rejects.toBeInstanceOf(SystemicFailureError);

      expect((await readEntries(outputPath)).map((e) => e.word)).toEqual(
        Array.from({ length: 10 }, (_, i) => `word${i}`)
      );
      expect([...entries.keys()]).toContain('word11');
      expect(await context.checkpoint.processedCount()).toBe(12);
    });

    it('should reset the failure streak after a success', async () => {
      const generate = jest.fn<Generate>().mockImplementation(async (word) => {
        if (word === 'word0' || word === 'word2') {
          throw new GenerationTimeoutError(1000);
        }
        return payload(word);
      });
      const entries = new Map<string, FinalEntry>();

      const outcome = await generateEntries(words(4), entries, createContext(generate));

      expect(outcome).toEqual({ generated: 2, failed: 2, warnings: [] });
      expect((await readEntries(outputPath)).map((e) => e.word)).toEqual(['word1', 'word3']);
    });

    it('should fail immediately on errors that are not generation failures', async () => {
      const generate = jest.fn<Generate>().mockRejectedValue(new TypeError('bug'));

      await expect(generateEntries(words(3), new Map(), createContext(generate))).rejects.toThrow('bug');
      expect(generate).toHaveBeenCalledTimes(1);
    });

    it('should pass the prompt template and parts of speech to the generator', async () => {
      const generate = jest.fn<Generate>().mockImplementation(async (word) => payload(word));

      await generateEntries([enriched('cat')], new Map(), createContext(generate));

      expect(generate.mock.calls[0]?.slice(0, 3)).toEqual(['cat', ['noun'], 'Define {word} ({pos})']);
    });

    it('should collect validation warnings without rejecting entries', async () => {
      const generate = jest
        .fn<Generate>()
        .mockImplementation(async (word) => ({ ...payload(word), examples: payload(word).examples.slice(0, 8) }));

      const outcome = await generateEntries([enriched('cat')], new Map(), createContext(generate));

      expect(outcome.generated).toBe(1);
      expect(outcome.warnings).toEqual([{ word: 'cat', messages: ['Expected 9 examples, got 8'] }]);
    });
  });

  describe('runGenerationStage', () => {
    let config: PipelineConfig;
    const clock = () => new Date(2026, 2, 1, 9, 0, 0);

    beforeEach(async () => {
      config = createPipelineConfig({ dataDir: testDir }, { NODE_ENV: 'test' });
      await fs.mkdir(path.dirname(config.paths.promptTemplate), { recursive: true });
      await fs.writeFile(config.paths.promptTemplate, 'Word: {word}\nPOS: {pos}\n');
    });

    it('should write a timestamped artifact in the working data folder', async () => {
      await saveEnrichedWords(config.paths.enrichedWordsJson, [enriched('cat'), enriched('dog')]);
      const generator = { generate: jest.fn<Generate>().mockImplementation(async (word) => payload(word)) };

      const result = await runGenerationStage(config, { generator, clock });

      expect(result.outputPath).toBe(path.join(testDir, 'data', 'final_output_20260301_090000.json'));
      expect(result.generated).toBe(2);
      expect((await readEntries(result.outputPath)).map((e) => e.word)).toEqual(['cat', 'dog']);
    });

    it('should continue the latest artifact when resuming', async () => {
      await saveEnrichedWords(config.paths.enrichedWordsJson, [enriched('ant'), enriched('bee'), enriched('cow')]);
      const existing = path.join(testDir, 'data', 'final_output_20260228_120000.json');
      await saveFinalOutput(existing, [createFinalEntry(enriched('ant'), payload('ant'))]);
      const checkpoint = new CheckpointStore(path.join(testDir, 'checkpoints', 'generation_progress.json'));
      await checkpoint.markProcessed('ant', 0);
      const generator = { generate: jest.fn<Generate>().mockImplementation(async (word) => payload(word)) };

      const result = await runGenerationStage(config, { generator, clock }, { resume: true });

      expect(result.outputPath).toBe(existing);
      expect(generator.generate.mock.calls.map((call) => call[0])).toEqual(['bee', 'cow']);
      expect((await readEntries(existing)).map((e) => e.word)).toEqual(['ant', 'bee', 'cow']);
    });

    it('should return without generating when everything is done', async () => {
      await saveEnrichedWords(config.paths.enrichedWordsJson, [enriched('ant')]);
      const existing = path.join(testDir, 'data', 'final_output_20260228_120000.json');
      await saveFinalOutput(existing, [createFinalEntry(enriched('ant'), payload('ant'))]);
      await new CheckpointStore(path.join(testDir, 'checkpoints', 'generation_progress.json')).markProcessed('ant', 0);
      const generator = { generate: jest.fn<Generate>() };

      const result = await runGenerationStage(config, { generator, clock }, { resume: true });

      expect(generator.generate).not.toHaveBeenCalled();
      expect(result.entries).toHaveLength(1);
      expect(result.generated).toBe(0);
    });

    it('should limit a dry run', async () => {
      config = createPipelineConfig({ dataDir: testDir, dryRunLimit: 1 }, { NODE_ENV: 'test' });
      await saveEnrichedWords(config.paths.enrichedWordsJson, [enriched('ant'), enriched('bee')]);
      const generator = { generate: jest.fn<Generate>().mockImplementation(async (word) => payload(word)) };

      const result = await runGenerationStage(config, { generator, clock }, { dryRun: true });

      expect(result.entries.map((e) => e.word)).toEqual(['ant']);
    });

    it('should fail when the prompt template is missing', async () => {
      await fs.rm(config.paths.promptTemplate);
      const generator = { generate: jest.fn<Generate>() };

      await expect(runGenerationStage(config, { generator, clock })).rejects.toThrow(
        `Prompt template not found: ${config.paths.promptTemplate}`
      );
    });
  });
});
