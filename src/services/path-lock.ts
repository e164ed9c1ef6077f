/**
 * Per-Path Write Serialization
 *
 * Cache files are written by whole-file replacement, and two writers racing
 * on the same partition would leave the outcome undefined. This module keeps
 * a lock table keyed by canonical path; each entry is the tail of a promise
 * chain, so writes to the same path run one after another while writes to
 * different paths proceed independently.
 *
 * ## Usage Example
 *
 * ```typescript
 * const locks = new PathLockTable();
 *
 * await locks.withLock(destPath, async () => {
 *   await writeRecordFileAtomic(destPath, records);
 * });
 * ```
 */

import { resolve } from 'path';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';

/**
 * Lock table keyed by resolved file path
 */
export class PathLockTable {
  private tails = new Map<string, Promise<void>>();

  constructor(private logger: Logger = defaultLogger) {}

  /**
   * Run `fn` once every earlier holder of `path` has finished.
   * The lock is released on completion or failure.
   */
  async withLock<T>(path: string, fn: () => Promise<T>): Promise<T> {
    const key = resolve(path);
    const previous = this.tails.get(key);

    let release: () => void = () => undefined;
    const held = new Promise<void>((done) => {
      release = done;
    });
    const tail = previous ? previous.then(() => held) : held;
    this.tails.set(key, tail);

    if (previous) {
      this.logger.debug('Waiting for path lock', { path: key });
      await previous;
    }

    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Number of paths with a queued or running holder
   */
  size(): number {
    return this.tails.size;
  }
}
