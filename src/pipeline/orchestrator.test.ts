import { describe, it, expect, jest } from '@jest/globals';
import { BatchOrchestrator } from './orchestrator.js';
import type { Partition } from './partition.js';
import type { PartitionResult, StageRunner } from './stage-runner.js';
import type { SleepFn } from './sleep.js';
import { createPipelineConfig, type PipelineConfig } from '../config/index.js';
import type { Logger } from '../logging/logger.js';
import type { SelectedWord } from '../schemas/vocabulary.js';

type RunPartition = StageRunner['runPartition'];

function vocabulary(...frequencies: number[]): SelectedWord[] {
  return frequencies.map((frequency) => ({ frequency, word: `word${frequency}` }));
}

function succeed(partition: Partition): PartitionResult {
  return { partition, state: 'success', outcome: 'generated', itemCount: 1, attempts: 1, moved: [] };
}

function fail(partition: Partition): PartitionResult {
  return { partition, state: 'failed', outcome: 'exhausted', itemCount: 1, attempts: 3, moved: [] };
}

function makeConfig(batchPauseMs = 0): PipelineConfig {
  return createPipelineConfig(
    { dataDir: '/tmp/lexibatch-unused', batch: { batchSize: 10, maxFrequency: 100, batchPauseMs } },
    { NODE_ENV: 'test' }
  );
}

describe('BatchOrchestrator', () => {
  // One word in batches 0, 1, 3 and 4; batch 2 (21-30) is empty
  const words = vocabulary(5, 15, 35, 45);

  it('should count batches from the max frequency in frequency mode', () => {
    const runner = { runPartition: jest.fn<RunPartition>() };
    const orchestrator = new BatchOrchestrator(makeConfig(), words, runner);

    expect(orchestrator.totalBatches()).toBe(10);
    expect(orchestrator.partitionFor(2).label).toBe('21-30');
  });

  it('should process non-empty batches and skip empty ones', async () => {
    const runner = { runPartition: jest.fn<RunPartition>().mockImplementation(async (p) => succeed(p)) };
    const orchestrator = new BatchOrchestrator(makeConfig(), words, runner);

    const summary = await orchestrator.runFrom(0);

    expect(runner.runPartition.mock.calls.map((call) => call[0].label)).toEqual(['1-10', '11-20', '31-40', '41-50']);
    expect(summary.processed).toBe(4);
    expect(summary.skipped).toBe(6);
    expect(summary.failed).toEqual([]);
    expect(summary.stoppedEarly).toBe(false);
    expect(summary.endBatch).toBe(10);
  });

  it('should stop at the first failed batch', async () => {
    const runner = {
      runPartition: jest.fn<RunPartition>().mockImplementation(async (p) => (p.index === 1 ? fail(p) : succeed(p))),
    };
    const orchestrator = new BatchOrchestrator(makeConfig(), words, runner);

    const summary = await orchestrator.runFrom(0);

    expect(runner.runPartition).toHaveBeenCalledTimes(2);
    expect(summary.processed).toBe(1);
    expect(summary.failed.map((p) => p.index)).toEqual([1]);
    expect(summary.stoppedEarly).toBe(true);
  });

  it('should name the resume command for the failed batch', async () => {
    const runner = {
      runPartition: jest.fn<RunPartition>().mockImplementation(async (p) => (p.index === 3 ? fail(p) : succeed(p))),
    };
    const error = jest.fn<Logger['error']>();
    const logger: Logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error };
    const orchestrator = new BatchOrchestrator(makeConfig(), words, runner, {
      logger,
      resumeCommand: (batchIndex) => `lexibatch batch ${batchIndex} --batch-size 10`,
    });

    await orchestrator.runFrom(0);

    expect(error).toHaveBeenCalledWith('To resume from this batch, run: lexibatch batch 3 --batch-size 10');
  });

  it('should visit count batch indices, empty ones included', async () => {
    const runner = { runPartition: jest.fn<RunPartition>().mockImplementation(async (p) => succeed(p)) };
    const orchestrator = new BatchOrchestrator(makeConfig(), words, runner);

    const summary = await orchestrator.runFrom(1, { count: 3 });

    expect(runner.runPartition.mock.calls.map((call) => call[0].index)).toEqual([1, 3]);
    expect(summary).toEqual(
      expect.objectContaining({ startBatch: 1, endBatch: 4, processed: 2, skipped: 1 })
    );
  });

  it('should clamp count to the total', async () => {
    const runner = { runPartition: jest.fn<RunPartition>().mockImplementation(async (p) => succeed(p)) };
    const orchestrator = new BatchOrchestrator(makeConfig(), words, runner);

    const summary = await orchestrator.runFrom(8, { count: 50 });

    expect(summary.endBatch).toBe(10);
    expect(runner.runPartition).not.toHaveBeenCalled();
  });

  it('should pass force through to the runner', async () => {
    const runner = { runPartition: jest.fn<RunPartition>().mockImplementation(async (p) => succeed(p)) };
    const orchestrator = new BatchOrchestrator(makeConfig(), words, runner);

    await orchestrator.runFrom(0, { count: 1, force: true });

    expect(runner.runPartition.mock.calls[0]?.[1]).toBe(true);
  });

  it('should pause between batches but not after the last', async () => {
    const sleep = jest.fn<SleepFn>().mockResolvedValue(undefined);
    const runner = { runPartition: jest.fn<RunPartition>().mockImplementation(async (p) => succeed(p)) };
    const orchestrator = new BatchOrchestrator(makeConfig(2000), words, runner, { sleep });

    await orchestrator.runFrom(0, { count: 2 });

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep.mock.calls[0]?.[0]).toBe(2000);
  });

  it('should report each result to the callback', async () => {
    const onBatchComplete = jest.fn<(result: PartitionResult) => void>();
    const runner = { runPartition: jest.fn<RunPartition>().mockImplementation(async (p) => succeed(p)) };
    const orchestrator = new BatchOrchestrator(makeConfig(), words, runner, { onBatchComplete });

    await orchestrator.runFrom(0, { count: 2 });

    expect(onBatchComplete).toHaveBeenCalledTimes(2);
  });

  it('should stop when the signal fires', async () => {
    const controller = new AbortController();
    const runner = {
      runPartition: jest.fn<RunPartition>().mockImplementation(async (p) => {
        controller.abort();
        return succeed(p);
      }),
    };
    const orchestrator = new BatchOrchestrator(makeConfig(), words, runner, { signal: controller.signal });

    await expect(orchestrator.runFrom(0)).rejects.toThrow('aborted');
    expect(runner.runPartition).toHaveBeenCalledTimes(1);
  });

  it('should use the row count in row mode', () => {
    const config = createPipelineConfig(
      { dataDir: '/tmp/lexibatch-unused', batch: { mode: 'row', batchSize: 3 } },
      { NODE_ENV: 'test' }
    );
    const orchestrator = new BatchOrchestrator(config, words, { runPartition: jest.fn<RunPartition>() });

    expect(orchestrator.totalBatches()).toBe(2);
    expect(orchestrator.partitionFor(1).label).toBe('3-4');
  });
});
