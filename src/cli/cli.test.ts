/**
 * CLI Smoke Tests
 *
 * Basic tests to verify the CLI framework is set up correctly.
 * Tests cover:
 * - Program creation and configuration
 * - Command registration
 * - Base command functionality
 * - Option parsing helpers
 * - Formatter utilities
 *
 * @module cli/cli.test
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { createProgram } from './index.js';
import { BaseCommand, EXIT_CODES, createBaseCommand, exitCodeFor, getBaseCommand } from './base-command.js';
import { VERSION } from './version.js';
import { createSpinner, formatElapsed, formatProgress, trackProgress } from './formatters/progress.js';
import { formatBatchSummary, formatSchedulerSummary, logSummary, resumeCommand } from './formatters/summary.js';
import { getCommandHelp } from './commands/index.js';
import { batchOverrides, parsePartitionMode } from './commands/batch.js';
import { resolveStages } from './commands/checkpoint.js';
import { parseStepRange } from './commands/run.js';
import { parseIntegerOption, parsePositiveNumberOption, parseWordRange } from './runtime.js';
import { ConfigurationError, TransientExternalError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { BatchRunSummary } from '../pipeline/orchestrator.js';
import { frequencyPartition, rowPartition } from '../pipeline/partition.js';

// ============================================================================
// Program Tests
// ============================================================================

describe('CLI Program', () => {
  it('should create a program with correct name and version', () => {
    const program = createProgram();

    expect(program.name()).toBe('lexibatch');
    expect(program.version()).toBe(VERSION);
  });

  it('should have global options configured', () => {
    const optionNames = createProgram().options.map((o) => o.long);

    expect(optionNames).toEqual(
      expect.arrayContaining(['--verbose', '--quiet', '--no-color', '--data-dir', '--version'])
    );
  });

  it('should have subcommands registered', () => {
    const commandNames = createProgram().commands.map((c) => c.name());

    expect(commandNames).toEqual(['batch', 'schedule', 'run', 'select', 'checkpoint']);
  });

  it('should have checkpoint subcommands', () => {
    const checkpointCmd = createProgram().commands.find((c) => c.name() === 'checkpoint');

    expect(checkpointCmd?.commands.map((c) => c.name())).toEqual(['status', 'reset']);
  });

  it('should mark the schedule options as required', () => {
    const scheduleCmd = createProgram().commands.find((c) => c.name() === 'schedule');
    const required = scheduleCmd?.options.filter((o) => o.mandatory).map((o) => o.long);

    expect(required).toEqual(['--start-time', '--end-time', '--interval', '--start-batch', '--batch-count']);
  });
});

// ============================================================================
// BaseCommand Tests
// ============================================================================

describe('BaseCommand', () => {
  let consoleSpy: {
    log: jest.SpiedFunction<typeof console.log>;
    warn: jest.SpiedFunction<typeof console.warn>;
    error: jest.SpiedFunction<typeof console.error>;
  };

  beforeEach(() => {
    consoleSpy = {
      log: jest.spyOn(console, 'log').mockImplementation(() => undefined),
      warn: jest.spyOn(console, 'warn').mockImplementation(() => undefined),
      error: jest.spyOn(console, 'error').mockImplementation(() => undefined),
    };
  });

  afterEach(() => {
    consoleSpy.log.mockRestore();
    consoleSpy.warn.mockRestore();
    consoleSpy.error.mockRestore();
  });

  it('should create with default options', () => {
    const cmd = new BaseCommand({});

    expect(cmd.isVerbose()).toBe(false);
    expect(cmd.isQuiet()).toBe(false);
  });

  it('should hide debug messages when not verbose', () => {
    const cmd = new BaseCommand({});

    cmd.debug('test message');
    expect(consoleSpy.log).not.toHaveBeenCalled();
  });

  it('should respect quiet option', () => {
    const cmd = new BaseCommand({ quiet: true });

    cmd.info('test message');
    cmd.success('done');
    expect(consoleSpy.log).not.toHaveBeenCalled();
  });

  it('should log info messages when not quiet', () => {
    const cmd = new BaseCommand({ color: false });

    cmd.info('test message');
    expect(consoleSpy.log).toHaveBeenCalledWith('test message');
  });

  it('should always log warnings and errors', () => {
    const cmd = new BaseCommand({ quiet: true, color: false });

    cmd.warn('careful');
    cmd.printError('broken');
    expect(consoleSpy.warn).toHaveBeenCalledWith('Warning: careful');
    expect(consoleSpy.error).toHaveBeenCalledWith('Error: broken');
  });

  it('should mark success without color', () => {
    const cmd = new BaseCommand({ color: false });

    cmd.success('Selected 3 words');
    expect(consoleSpy.log).toHaveBeenCalledWith('[OK] Selected 3 words');
  });

  it('should root the configuration at the data directory', () => {
    const cmd = new BaseCommand({ dataDir: '/srv/vocab' });

    const config = cmd.loadConfig({ batch: { batchSize: 50 } });
    expect(config.paths.rootDir).toBe('/srv/vocab');
    expect(config.batch.batchSize).toBe(50);
  });

  it('should create with factory function', () => {
    const cmd = createBaseCommand({ verbose: true });

    expect(cmd).toBeInstanceOf(BaseCommand);
    expect(cmd.isVerbose()).toBe(true);
  });

  it('should find the base command on a parent command', () => {
    const stored = new BaseCommand({ verbose: true });
    const root = { opts: () => ({ _baseCommand: stored }), parent: null };
    const child = { opts: () => ({}), parent: root };

    expect(getBaseCommand(child)).toBe(stored);
  });

  it('should create default base command if not found', () => {
    const base = getBaseCommand({ opts: () => ({}), parent: null });

    expect(base).toBeInstanceOf(BaseCommand);
    expect(base.isVerbose()).toBe(false);
  });
});

// ============================================================================
// Exit Codes Tests
// ============================================================================

describe('Exit Codes', () => {
  it('should define standard exit codes', () => {
    expect(EXIT_CODES).toEqual({ SUCCESS: 0, ERROR: 1, USAGE_ERROR: 2, CANCELLED: 130 });
  });

  it('should map errors to exit codes', () => {
    const abort = Object.assign(new Error('The operation was aborted'), { name: 'AbortError' });

    expect(exitCodeFor(abort)).toBe(EXIT_CODES.CANCELLED);
    expect(exitCodeFor(new ConfigurationError('bad option'))).toBe(EXIT_CODES.USAGE_ERROR);
    expect(exitCodeFor(new TransientExternalError('HTTP 503'))).toBe(EXIT_CODES.ERROR);
    expect(exitCodeFor('boom')).toBe(EXIT_CODES.ERROR);
  });
});

// ============================================================================
// Option Parsing Tests
// ============================================================================

describe('Option Parsing', () => {
  describe('parseIntegerOption', () => {
    it('should parse integers at or above the minimum', () => {
      expect(parseIntegerOption('20', 'Start batch')).toBe(20);
      expect(parseIntegerOption(' 3 ', 'Count', 1)).toBe(3);
    });

    it('should reject anything else', () => {
      expect(() => parseIntegerOption('0', 'Count', 1)).toThrow(
        new ConfigurationError('Count must be an integer >= 1 (got "0")')
      );
      expect(() => parseIntegerOption('2.5', 'Count')).toThrow(ConfigurationError);
      expect(() => parseIntegerOption('', 'Count')).toThrow(ConfigurationError);
      expect(() => parseIntegerOption('ten', 'Count')).toThrow(ConfigurationError);
    });
  });

  describe('parsePositiveNumberOption', () => {
    it('should accept decimals', () => {
      expect(parsePositiveNumberOption('1.5', 'Interval')).toBe(1.5);
    });

    it('should reject zero', () => {
      expect(() => parsePositiveNumberOption('0', 'Interval')).toThrow(
        'Interval must be a positive number (got "0")'
      );
    });
  });

  describe('parseWordRange', () => {
    it('should parse start and end', () => {
      expect(parseWordRange('200-300')).toEqual({ start: 200, end: 300 });
    });

    it('should reject malformed or reversed ranges', () => {
      expect(() => parseWordRange('200')).toThrow('Invalid range format: 200. Use format: start-end');
      expect(() => parseWordRange('1-2-3')).toThrow('Invalid range format');
      expect(() => parseWordRange('300-200')).toThrow('Invalid range: 300-200. End must not be before start');
    });
  });

  describe('parseStepRange', () => {
    it('should default to enrichment through generation', () => {
      expect(parseStepRange({})).toEqual({ startStep: 2, endStep: 3 });
    });

    it('should accept an explicit window', () => {
      expect(parseStepRange({ startStep: '1', endStep: '2' })).toEqual({ startStep: 1, endStep: 2 });
    });

    it('should reject out-of-range and reversed steps', () => {
      expect(() => parseStepRange({ endStep: '4' })).toThrow('End step must be between 1 and 3 (got 4)');
      expect(() => parseStepRange({ startStep: '3', endStep: '2' })).toThrow(
        'End step (2) must not be before start step (3)'
      );
    });
  });

  describe('batch options', () => {
    it('should parse the partition mode', () => {
      expect(parsePartitionMode('row')).toBe('row');
      expect(() => parsePartitionMode('alpha')).toThrow('Invalid mode: alpha. Use "frequency" or "row"');
    });

    it('should only carry the options that were set', () => {
      expect(batchOverrides({})).toEqual({});
      expect(batchOverrides({ mode: 'row', batchSize: '25' })).toEqual({ mode: 'row', batchSize: 25 });
    });
  });

  describe('resolveStages', () => {
    it('should default to every stage', () => {
      expect(resolveStages(undefined)).toEqual(['enrichment', 'generation']);
    });

    it('should reject an unknown stage', () => {
      expect(() => resolveStages('selection')).toThrow(
        'Unknown stage: selection. Use one of: enrichment, generation'
      );
    });
  });
});

// ============================================================================
// Progress Formatter Tests
// ============================================================================

describe('Progress Formatters', () => {
  describe('formatElapsed', () => {
    it('should format milliseconds, seconds and minutes', () => {
      expect(formatElapsed(450)).toBe('450ms');
      expect(formatElapsed(12_300)).toBe('12.3s');
      expect(formatElapsed(125_000)).toBe('2m 5s');
    });
  });

  describe('formatProgress', () => {
    it('should show a floored percentage', () => {
      expect(formatProgress('Enriching', 12, 80)).toBe('Enriching 12/80 (15%)');
    });

    it('should treat an empty stage as complete', () => {
      expect(formatProgress('Enriching', 0, 0)).toBe('Enriching 0/0 (100%)');
    });
  });

  describe('ProgressSpinner', () => {
    it('should support method chaining', () => {
      const spinner = createSpinner('Loading...', { enabled: false });

      expect(spinner.start()).toBe(spinner);
      expect(spinner.update('Updated')).toBe(spinner);
      expect(spinner.succeed('Done')).toBe(spinner);
    });

    it('should write stage progress into the spinner text', () => {
      const spinner = createSpinner('Generating...', { enabled: false });

      trackProgress(spinner, 'Generating')(3, 4);
      expect(spinner.text).toBe('Generating 3/4 (75%)');
    });
  });
});

// ============================================================================
// Summary Formatter Tests
// ============================================================================

describe('Summary Formatters', () => {
  function batchSummary(overrides: Partial<BatchRunSummary> = {}): BatchRunSummary {
    return {
      startBatch: 0,
      endBatch: 4,
      totalBatches: 4,
      processed: 3,
      skipped: 1,
      failed: [],
      stoppedEarly: false,
      results: [],
      ...overrides,
    };
  }

  it('should summarize a clean batch run', () => {
    expect(formatBatchSummary(batchSummary(), 3).map((line) => line.text)).toEqual([
      '='.repeat(60),
      'BATCH PROCESSING COMPLETE',
      '='.repeat(60),
      'Processed: 3 batches',
      'Skipped (empty): 1 batches',
      'Failed: 0 batches',
      'All batches completed successfully!',
      '-'.repeat(40),
      'Verification:',
      '  Output folders created: 3',
    ]);
  });

  it('should list failed batches with a resume command', () => {
    const failed = frequencyPartition(2, 100);
    const lines = formatBatchSummary(batchSummary({ failed: [failed], stoppedEarly: true, processed: 2 }), 2);

    expect(lines[1]?.text).toBe('BATCH PROCESSING STOPPED (due to failure)');
    expect(lines.slice(6, 10)).toEqual([
      { level: 'warn', text: 'Failed batches:' },
      { level: 'warn', text: '  - Batch 2: 201-300' },
      { level: 'info', text: 'To resume, run:' },
      { level: 'info', text: '  lexibatch batch 2' },
    ]);
    expect(resumeCommand(2)).toBe('lexibatch batch 2');
  });

  it('should repeat the partition settings of a row run in the resume command', () => {
    const failed = rowPartition(3, 50, 400);
    const lines = formatBatchSummary(batchSummary({ failed: [failed], stoppedEarly: true }), 3, {
      mode: 'row',
      batchSize: 50,
    });

    expect(lines.slice(7, 10).map((line) => line.text)).toEqual([
      '  - Batch 3: 150-200',
      'To resume, run:',
      '  lexibatch batch 3 --mode row --batch-size 50',
    ]);
  });

  it('should add the data directory and force to the resume command', () => {
    expect(resumeCommand(4, { mode: 'frequency', batchSize: 100, dataDir: '/srv/vocab', force: true })).toBe(
      'lexibatch --data-dir /srv/vocab batch 4 --force'
    );
    expect(resumeCommand(0, { dataDir: '/srv/my vocab' })).toBe("lexibatch --data-dir '/srv/my vocab' batch 0");
  });

  it('should summarize a schedule', () => {
    const lines = formatSchedulerSummary({ successful: 2, failed: 1, skipped: 1, total: 4, nothingToDo: false });

    expect(lines.map((line) => line.text).slice(3)).toEqual([
      'Successful runs: 2',
      'Failed runs: 1',
      'Skipped runs: 1',
      'Total scheduled: 4',
      'Some runs failed. Check the batch output above for details.',
    ]);
    expect(lines[lines.length - 1]?.level).toBe('warn');
  });

  it('should print nothing when the schedule had nothing to do', () => {
    expect(formatSchedulerSummary({ successful: 0, failed: 0, skipped: 0, total: 3, nothingToDo: true })).toEqual(
      []
    );
  });

  it('should route lines to their logger levels', () => {
    const logger: Logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };

    logSummary(logger, [
      { level: 'info', text: 'one' },
      { level: 'warn', text: 'two' },
    ]);

    expect(logger.info).toHaveBeenCalledWith('one');
    expect(logger.warn).toHaveBeenCalledWith('two');
  });
});

// ============================================================================
// Command Help Tests
// ============================================================================

describe('Command Help', () => {
  it('should return command help entries', () => {
    expect(getCommandHelp().map((entry) => entry.name)).toEqual([
      'batch [startBatch]',
      'schedule',
      'run',
      'select',
      'checkpoint status [stage]',
      'checkpoint reset [stage]',
    ]);
  });

  it('should have descriptions for all commands', () => {
    for (const entry of getCommandHelp()) {
      expect(entry.description.length).toBeGreaterThan(0);
    }
  });
});
