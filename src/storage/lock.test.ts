import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { FileLock, LockTimeoutError, lockPathFor } from './lock.js';

describe('storage/lock', () => {
  let tempDir: string;
  let lockPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lock-test-'));
    lockPath = path.join(tempDir, 'checkpoints', 'generation_progress.lock');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('derives the lock file from the data file', () => {
    expect(lockPathFor('/data/checkpoints/generation_progress.json')).toBe(
      '/data/checkpoints/generation_progress.lock'
    );
  });

  it('holds the lock for the duration of withLock and releases it', async () => {
    const lock = new FileLock(lockPath);

    const holder = await lock.withLock('save', async () => lock.holder());

    expect(holder).toEqual(expect.objectContaining({ pid: process.pid, operation: 'save' }));
    expect(await lock.holder()).toBeNull();
  });

  it('releases the lock when the function throws', async () => {
    const lock = new FileLock(lockPath);

    await expect(
      lock.withLock('save', async () => {
        throw new Error('write failed');
      })
    ).rejects.toThrow('write failed');

    await expect(fs.stat(lockPath)).rejects.toThrow();
  });

  it('serializes two holders', async () => {
    const first = new FileLock(lockPath, { retryIntervalMs: 5 });
    const second = new FileLock(lockPath, { retryIntervalMs: 5 });
    const events: string[] = [];

    await Promise.all([
      first.withLock('a', async () => {
        events.push('a:start');
        await new Promise((resolve) => setTimeout(resolve, 30));
        events.push('a:end');
      }),
      second.withLock('b', async () => {
        events.push('b:start');
        events.push('b:end');
      }),
    ]);

    // Either may win the race, but the critical sections never interleave
    expect([
      ['a:start', 'a:end', 'b:start', 'b:end'],
      ['b:start', 'b:end', 'a:start', 'a:end'],
    ]).toContainEqual(events);
  });

  it('times out while another holder keeps the lock', async () => {
    const held = new FileLock(lockPath);
    await held.acquire('long job');

    const waiting = new FileLock(lockPath, { maxRetries: 3, retryIntervalMs: 1 });
    await expect(waiting.acquire('save')).rejects.toBeInstanceOf(LockTimeoutError);

    await held.release();
  });

  it('takes over a stale lock', async () => {
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, JSON.stringify({ pid: 1, acquiredAt: '2020-01-01T00:00:00Z', operation: 'old' }));
    const past = new Date(Date.now() - 60_000);
    await fs.utimes(lockPath, past, past);

    const lock = new FileLock(lockPath, { staleAfterMs: 1000, maxRetries: 2, retryIntervalMs: 1 });
    await lock.acquire('save');

    expect(await lock.holder()).toEqual(expect.objectContaining({ pid: process.pid, operation: 'save' }));
    await lock.release();
  });
});
