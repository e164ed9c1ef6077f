/**
 * Unit tests for LocalCacheManager
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readdirSync, readFileSync, writeFileSync, mkdirSync, utimesSync } from 'fs';
import { dirname, join } from 'path';
import { LocalCacheManager } from '../../../../src/services/cache/LocalCacheManager.js';
import { CacheWriteError } from '../../../../src/lib/errors/CacheErrors.js';
import {
  createTempDir,
  createTestLogger,
  makePaper,
  makePapers,
  removeTempDir,
  toParquet,
  writeJsonLines
} from '../../../helpers/cache-test-helper.js';

describe('LocalCacheManager', () => {
  let root: string;
  let dataDir: string;
  let cache: LocalCacheManager;

  const key = { subject: 'cs.AI', year: '2024', month: '03' };

  beforeEach(() => {
    root = createTempDir();
    dataDir = join(root, 'data');
    cache = new LocalCacheManager(dataDir, { logger: createTestLogger(root) });
  });

  afterEach(() => {
    removeTempDir(root);
  });

  describe('store', () => {
    it('should make a partition cached with its exact count', async () => {
      const source = join(root, 'incoming.jsonl');
      writeJsonLines(source, makePapers('2403', 4));

      expect(cache.isCached(key)).toBe(false);

      const stored = await cache.store(key, source);

      expect(stored.isOk()).toBe(true);
      expect(stored._unsafeUnwrap()).toBe(join(dataDir, '2024', '03', 'cs_AI.jsonl'));
      expect(cache.isCached(key)).toBe(true);
      expect(await cache.getCachedCount(key)).toBe(4);
    });

    it('should store a Parquet download as JSON Lines', async () => {
      const source = join(root, '00000000.parquet');
      writeFileSync(source, toParquet([makePaper('2403.00001'), makePaper('2403.00002', { title: 'Graph Networks' })]));

      const stored = await cache.store(key, source);

      expect(stored.isOk()).toBe(true);
      expect(await cache.getCachedCount(key)).toBe(2);
      expect(await cache.loadPartition(key)).toEqual([
        makePaper('2403.00001'),
        makePaper('2403.00002', { title: 'Graph Networks' })
      ]);
      expect(readFileSync(cache.getLocalPath(key), 'utf8').startsWith('{"arxiv_id":"2403.00001"')).toBe(true);
    });

    it('should leave an existing partition untouched when the source is invalid', async () => {
      writeJsonLines(cache.getLocalPath(key), makePapers('2403', 2));
      const before = readFileSync(cache.getLocalPath(key), 'utf8');

      const source = join(root, 'broken.jsonl');
      writeFileSync(source, '{"arxiv_id": "2403.00001"}\n{"arxiv_id": ', 'utf8');

      const stored = await cache.store(key, source);

      expect(stored.isErr()).toBe(true);
      expect(readFileSync(cache.getLocalPath(key), 'utf8')).toBe(before);
    });

    it('should reject records without an identifier', async () => {
      const source = join(root, 'no-id.jsonl');
      writeJsonLines(source, [{ title: 'untitled' }]);

      const stored = await cache.store(key, source);

      expect(stored.isErr()).toBe(true);
      expect(cache.isCached(key)).toBe(false);
    });

    it('should report a destination that cannot be written', async () => {
      const source = join(root, 'incoming.jsonl');
      writeJsonLines(source, makePapers('2403', 2));
      mkdirSync(dataDir, { recursive: true });
      writeFileSync(join(dataDir, '2024'), 'not a directory', 'utf8');

      const stored = await cache.store(key, source);

      expect(stored._unsafeUnwrapErr()).toBeInstanceOf(CacheWriteError);
      expect(cache.isCached(key)).toBe(false);
      expect(readFileSync(join(root, 'logs', 'general.jsonl'), 'utf8')).toContain('"message":"Cache write failed"');
    });

    it('should not leave temporary files behind', async () => {
      const source = join(root, 'incoming.jsonl');
      writeJsonLines(source, makePapers('2403', 1));

      await cache.store(key, source);

      expect(readdirSync(dirname(cache.getLocalPath(key)))).toEqual(['cs_AI.jsonl']);
    });
  });

  describe('counts', () => {
    it('should count zero for an absent partition', async () => {
      expect(await cache.getCachedCount(key)).toBe(0);
    });

    it('should count zero for a corrupt partition and log it', async () => {
      const path = cache.getLocalPath(key);
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, 'not json at all\n', 'utf8');

      expect(cache.isCached(key)).toBe(true);
      expect(await cache.getCachedCount(key)).toBe(0);
      expect(existsSync(join(root, 'logs', 'cache-corruption.jsonl'))).toBe(true);
    });

    it('should report a month aggregate that cannot be written', async () => {
      writeFileSync(dataDir, 'not a directory', 'utf8');

      const written = await cache.writeMonthAggregate('2024', '03', makePapers('2403', 1));

      expect(written._unsafeUnwrapErr()).toBeInstanceOf(CacheWriteError);
    });

    it('should report modification times only for cached partitions', async () => {
      expect(await cache.getModifiedTime(key)).toBeNull();

      writeJsonLines(cache.getLocalPath(key), makePapers('2403', 1));
      const at = new Date(2024, 2, 1);
      utimesSync(cache.getLocalPath(key), at, at);

      expect(await cache.getModifiedTime(key)).toBe(at.getTime());
    });

    it('should count a month aggregate', async () => {
      await cache.writeMonthAggregate('2024', '03', makePapers('2403', 3));

      expect(cache.isMonthCached('2024', '03')).toBe(true);
      expect(await cache.getMonthCount('2024', '03')).toBe(3);
    });
  });

  describe('loading', () => {
    it('should concatenate cached partitions and skip missing ones', async () => {
      writeJsonLines(cache.getLocalPath(key), makePapers('a', 2));
      writeJsonLines(cache.getLocalPath({ ...key, subject: 'cs.LG' }), makePapers('b', 3));

      const records = await cache.loadPartitions([
        key,
        { ...key, subject: 'cs.LG' },
        { ...key, subject: 'math.AG' }
      ]);

      expect(records.map((r) => r.arxiv_id)).toEqual(['a.00001', 'a.00002', 'b.00001', 'b.00002', 'b.00003']);
    });

    it('should keep columns it does not know about', async () => {
      writeJsonLines(cache.getLocalPath(key), [{ arxiv_id: 'x', authors: 'A. Author' }]);

      const [record] = await cache.loadPartition(key);

      expect(record.authors).toBe('A. Author');
    });
  });

  describe('listings and summary', () => {
    beforeEach(async () => {
      writeJsonLines(cache.getLocalPath(key), makePapers('a', 2));
      writeJsonLines(cache.getLocalPath({ ...key, subject: 'cs.LG' }), makePapers('b', 3));
      writeJsonLines(cache.getLocalPath({ subject: 'cs.AI', year: '2023', month: '12' }), makePapers('c', 1));
      await cache.writeMonthAggregate('2022', '05', makePapers('d', 4));
    });

    it('should list cached subjects for a month', async () => {
      expect(await cache.listCachedSubjects('2024', '03')).toEqual(['cs.AI', 'cs.LG']);
    });

    it('should list years from partitions and aggregates', async () => {
      expect(await cache.listCachedYears()).toEqual(['2022', '2023', '2024']);
    });

    it('should list months from partitions and aggregates', async () => {
      expect(await cache.listCachedMonths('2024')).toEqual(['03']);
      expect(await cache.listCachedMonths('2022')).toEqual(['05']);
    });

    it('should summarize papers per year and month', async () => {
      const summary = await cache.getCacheSummary();

      expect(summary.years['2024']).toEqual({ months: { '03': { subjects: 2, papers: 5 } }, total: 5 });
      expect(summary.years['2023'].total).toBe(1);
      expect(summary.totalPapers).toBe(6);
      expect(summary.totalFiles).toBe(3);
    });
  });
});
