/**
 * Unit tests for PathLockTable
 */

import { describe, it, expect, afterAll } from 'vitest';
import { PathLockTable } from '../../../src/services/path-lock.js';
import { createTempDir, createTestLogger, removeTempDir } from '../../helpers/cache-test-helper.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('PathLockTable', () => {
  const root = createTempDir();
  const locks = new PathLockTable(createTestLogger(root));

  afterAll(() => {
    removeTempDir(root);
  });

  it('should run holders of the same path one after another', async () => {
    const events: string[] = [];

    await Promise.all([
      locks.withLock('/cache/a.jsonl', async () => {
        events.push('first:start');
        await delay(20);
        events.push('first:end');
      }),
      locks.withLock('/cache/a.jsonl', async () => {
        events.push('second:start');
        events.push('second:end');
      })
    ]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('should treat equivalent paths as the same lock', async () => {
    const events: string[] = [];

    await Promise.all([
      locks.withLock('/cache/x/../b.jsonl', async () => {
        await delay(20);
        events.push('first');
      }),
      locks.withLock('/cache/b.jsonl', async () => {
        events.push('second');
      })
    ]);

    expect(events).toEqual(['first', 'second']);
  });

  it('should let different paths proceed independently', async () => {
    const events: string[] = [];

    await Promise.all([
      locks.withLock('/cache/c.jsonl', async () => {
        await delay(20);
        events.push('slow');
      }),
      locks.withLock('/cache/d.jsonl', async () => {
        events.push('fast');
      })
    ]);

    expect(events).toEqual(['fast', 'slow']);
  });

  it('should release the lock when the holder fails', async () => {
    await expect(
      locks.withLock('/cache/e.jsonl', async () => {
        throw new Error('disk full');
      })
    ).rejects.toThrow('disk full');

    expect(await locks.withLock('/cache/e.jsonl', async () => 'next')).toBe('next');
    expect(locks.size()).toBe(0);
  });
});
