/**
 * Unit tests for DownloadOrchestrator
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { LocalCacheManager } from '../../../../src/services/cache/LocalCacheManager.js';
import { RemoteCatalogClient } from '../../../../src/services/catalog/RemoteCatalogClient.js';
import { DownloadOrchestrator } from '../../../../src/services/download/DownloadOrchestrator.js';
import type { Logger } from '../../../../src/lib/logger.js';
import {
  createTempDir,
  createTestLogger,
  FakeHub,
  makePaper,
  makePapers,
  removeTempDir,
  writeJsonLines
} from '../../../helpers/cache-test-helper.js';

describe('DownloadOrchestrator', () => {
  let root: string;
  let logger: Logger;
  let hub: FakeHub;
  let catalog: RemoteCatalogClient;
  let cache: LocalCacheManager;

  // Mid-March 2024 is "now" unless a test says otherwise
  const clock = () => new Date(2024, 2, 15);

  const pastKey = { subject: 'cs.AI', year: '2024', month: '01' };
  const currentKey = { subject: 'cs.AI', year: '2024', month: '03' };

  function createOrchestrator(refetchCurrentMonth: boolean = true): DownloadOrchestrator {
    return new DownloadOrchestrator(catalog, cache, { clock, refetchCurrentMonth, logger });
  }

  beforeEach(() => {
    root = createTempDir();
    logger = createTestLogger(root);
    hub = new FakeHub();
    catalog = new RemoteCatalogClient(hub, { landingDir: join(root, 'landing'), logger });
    cache = new LocalCacheManager(join(root, 'data'), { logger });
  });

  afterEach(() => {
    catalog.shutdown();
    removeTempDir(root);
  });

  describe('downloadAndCache', () => {
    it('should fetch an uncached partition and store it', async () => {
      hub.addPartition(pastKey, makePapers('2401', 3));
      const orchestrator = createOrchestrator();

      const path = await orchestrator.downloadAndCache(pastKey);

      expect(path).toBe(cache.getLocalPath(pastKey));
      expect(await cache.getCachedCount(pastKey)).toBe(3);
    });

    it('should reuse a cached past partition without touching the hub', async () => {
      writeJsonLines(cache.getLocalPath(pastKey), makePapers('2401', 2));
      const orchestrator = createOrchestrator();

      const path = await orchestrator.downloadAndCache(pastKey);

      expect(path).toBe(cache.getLocalPath(pastKey));
      expect(hub.downloadFile).not.toHaveBeenCalled();
    });

    it('should re-fetch a cached partition when forced', async () => {
      writeJsonLines(cache.getLocalPath(pastKey), makePapers('old', 2));
      hub.addPartition(pastKey, makePapers('new', 5));
      const orchestrator = createOrchestrator();

      await orchestrator.downloadAndCache(pastKey, { force: true });

      expect(hub.downloadFile).toHaveBeenCalledTimes(1);
      expect(await cache.getCachedCount(pastKey)).toBe(5);
    });

    it('should always re-fetch the current month', async () => {
      writeJsonLines(cache.getLocalPath(currentKey), makePapers('early', 1));
      hub.addPartition(currentKey, makePapers('later', 4));
      const orchestrator = createOrchestrator();

      await orchestrator.downloadAndCache(currentKey);

      expect(hub.downloadFile).toHaveBeenCalledTimes(1);
      expect(await cache.getCachedCount(currentKey)).toBe(4);
    });

    it('should treat the current month like any other when the policy is off', async () => {
      writeJsonLines(cache.getLocalPath(currentKey), makePapers('early', 1));
      const orchestrator = createOrchestrator(false);

      await orchestrator.downloadAndCache(currentKey);

      expect(hub.downloadFile).not.toHaveBeenCalled();
    });

    it('should keep the existing cache when the fetch fails', async () => {
      writeJsonLines(cache.getLocalPath(currentKey), makePapers('early', 2));
      const before = readFileSync(cache.getLocalPath(currentKey), 'utf8');
      hub.fail('data/cs.AI/2024/03/00000000.parquet');
      const orchestrator = createOrchestrator();

      const path = await orchestrator.downloadAndCache(currentKey);

      expect(path).toBeNull();
      expect(readFileSync(cache.getLocalPath(currentKey), 'utf8')).toBe(before);
    });

    it('should return null when the cache cannot be written', async () => {
      hub.addPartition(currentKey, makePapers('2403', 2));
      mkdirSync(join(root, 'data'), { recursive: true });
      writeFileSync(join(root, 'data', '2024'), 'not a directory', 'utf8');
      const onProgress = vi.fn();
      const orchestrator = createOrchestrator();

      const path = await orchestrator.downloadAndCache(currentKey, { onProgress });

      expect(path).toBeNull();
      expect(onProgress).not.toHaveBeenCalledWith(1, 1, 'Downloaded cs.AI/2024-03');
    });

    it('should return null when the partition does not exist upstream', async () => {
      const orchestrator = createOrchestrator();

      expect(await orchestrator.downloadAndCache(pastKey)).toBeNull();
      expect(cache.isCached(pastKey)).toBe(false);
    });

    it('should report progress', async () => {
      hub.addPartition(pastKey, makePapers('2401', 1));
      const onProgress = vi.fn();
      const orchestrator = createOrchestrator();

      await orchestrator.downloadAndCache(pastKey, { onProgress });

      expect(onProgress).toHaveBeenLastCalledWith(1, 1, 'Downloaded cs.AI/2024-01');
    });
  });

  describe('downloadMonth', () => {
    it('should combine subjects and drop duplicate papers', async () => {
      hub.addPartition({ subject: 'cs.AI', year: '2024', month: '01' }, [makePaper('1'), makePaper('2')]);
      hub.addPartition({ subject: 'cs.LG', year: '2024', month: '01' }, [makePaper('2'), makePaper('3')]);
      const orchestrator = createOrchestrator();

      const result = await orchestrator.downloadMonth('2024', '01');

      expect(result).toMatchObject({ papers: 3, fromCache: false, succeeded: ['cs.AI', 'cs.LG'], failed: [] });
      expect(await cache.getMonthCount('2024', '01')).toBe(3);
    });

    it('should skip subjects that fail and keep the rest', async () => {
      hub.addPartition({ subject: 'cs.AI', year: '2024', month: '01' }, [makePaper('1')]);
      hub.addPartition({ subject: 'cs.LG', year: '2024', month: '02' }, [makePaper('9')]);
      const orchestrator = createOrchestrator();

      const result = await orchestrator.downloadMonth('2024', '01');

      expect(result?.succeeded).toEqual(['cs.AI']);
      expect(result?.failed).toEqual(['cs.LG']);
      expect(result?.papers).toBe(1);
    });

    it('should return null when every subject fails', async () => {
      hub.addPartition({ subject: 'cs.AI', year: '2024', month: '02' }, [makePaper('1')]);
      const orchestrator = createOrchestrator();

      expect(await orchestrator.downloadMonth('2024', '01')).toBeNull();
      expect(cache.isMonthCached('2024', '01')).toBe(false);
    });

    it('should return null when the month aggregate cannot be written', async () => {
      hub.addPartition({ subject: 'cs.AI', year: '2024', month: '01' }, [makePaper('1')]);
      writeFileSync(join(root, 'data'), 'not a directory', 'utf8');
      const orchestrator = createOrchestrator();

      expect(await orchestrator.downloadMonth('2024', '01')).toBeNull();
    });

    it('should reuse a cached month aggregate', async () => {
      await cache.writeMonthAggregate('2024', '01', makePapers('m', 7));
      const orchestrator = createOrchestrator();

      const result = await orchestrator.downloadMonth('2024', '01');

      expect(result).toMatchObject({ papers: 7, fromCache: true });
      expect(hub.listTree).not.toHaveBeenCalled();
    });

    it('should restrict to the given subjects', async () => {
      hub.addPartition({ subject: 'cs.AI', year: '2024', month: '01' }, [makePaper('1')]);
      hub.addPartition({ subject: 'cs.LG', year: '2024', month: '01' }, [makePaper('2')]);
      const orchestrator = createOrchestrator();

      const result = await orchestrator.downloadMonth('2024', '01', { subjects: ['cs.LG'] });

      expect(result?.succeeded).toEqual(['cs.LG']);
      expect(result?.papers).toBe(1);
    });
  });

  describe('ensureSelection', () => {
    it('should fetch only what is missing and report failures', async () => {
      writeJsonLines(cache.getLocalPath(pastKey), makePapers('a', 1));
      hub.addPartition({ subject: 'cs.AI', year: '2024', month: '02' }, makePapers('b', 1));
      const orchestrator = createOrchestrator();

      const result = await orchestrator.ensureSelection({
        categories: ['cs.AI', 'cs.LG'],
        yearMonths: [{ year: '2024', month: '01' }, { year: '2024', month: '02' }]
      });

      expect(result.alreadyCached).toBe(1);
      expect(result.downloaded).toBe(1);
      expect(result.failed).toEqual([
        { subject: 'cs.LG', year: '2024', month: '01' },
        { subject: 'cs.LG', year: '2024', month: '02' }
      ]);
    });
  });
});
