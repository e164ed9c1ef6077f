/**
 * Unit tests for ProjectionCache
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { rmSync, statSync, utimesSync, writeFileSync } from 'fs';
import { join } from 'path';
import { LocalCacheManager } from '../../../../src/services/cache/LocalCacheManager.js';
import { EmbeddingPartitionStore } from '../../../../src/services/derived/EmbeddingPartitionStore.js';
import { ProjectionCache } from '../../../../src/services/derived/ProjectionCache.js';
import type { Projector } from '../../../../src/services/projection/Projector.js';
import { CacheWriteError, SelectionRejectedError } from '../../../../src/lib/errors/CacheErrors.js';
import { selectionFingerprint, type Selection } from '../../../../src/models/Selection.js';
import {
  createTempDir,
  createTestLogger,
  makePaper,
  makePapers,
  removeTempDir,
  writeJsonLines
} from '../../../helpers/cache-test-helper.js';

function createFakeProjector() {
  return {
    nNeighbors: 2,
    project: vi.fn(async (vectors: number[][]) =>
      vectors.map((vector, i): [number, number] => [i, vector[0]])
    )
  } satisfies Projector;
}

describe('ProjectionCache', () => {
  let root: string;
  let cache: LocalCacheManager;
  let embeddings: EmbeddingPartitionStore;
  let projector: ReturnType<typeof createFakeProjector>;
  let projections: ProjectionCache;

  const selection: Selection = {
    categories: ['cs.AI', 'cs.LG'],
    yearMonths: [{ year: '2024', month: '01' }]
  };
  const aiKey = { subject: 'cs.AI', year: '2024', month: '01' };
  const lgKey = { subject: 'cs.LG', year: '2024', month: '01' };

  async function embedAll(): Promise<void> {
    await embeddings.embedPartition(aiKey);
    await embeddings.embedPartition(lgKey);
  }

  beforeEach(() => {
    root = createTempDir();
    const logger = createTestLogger(root);
    cache = new LocalCacheManager(join(root, 'data'), { logger });
    embeddings = new EmbeddingPartitionStore(
      join(root, 'embeddings'),
      cache,
      { modelId: 'test-model', embed: async (texts: string[]) => texts.map((t) => [t.length]) },
      { logger }
    );
    projector = createFakeProjector();
    projections = new ProjectionCache(join(root, 'projections'), embeddings, projector, { logger });

    writeJsonLines(cache.getLocalPath(aiKey), [makePaper('1'), makePaper('2')]);
    writeJsonLines(cache.getLocalPath(lgKey), [makePaper('2'), makePaper('3')]);
  });

  afterEach(() => {
    removeTempDir(root);
  });

  describe('isProjectionCached', () => {
    it('should be false before anything is saved', async () => {
      await embedAll();

      expect(await projections.isProjectionCached(selection)).toBe(false);
    });

    it('should be true right after saving', async () => {
      await embedAll();
      await projections.saveProjection([], selection);

      expect(await projections.isProjectionCached(selection)).toBe(true);
    });

    it('should hold for the same selection in another order', async () => {
      await embedAll();
      await projections.saveProjection([], selection);

      expect(
        await projections.isProjectionCached({ categories: ['cs.LG', 'cs.AI'], yearMonths: selection.yearMonths })
      ).toBe(true);
    });

    it('should become false when a partition is touched after the entry', async () => {
      await embedAll();
      const path = (await projections.saveProjection([], selection))._unsafeUnwrap();
      const entryTime = statSync(path).mtime;
      const later = new Date(entryTime.getTime() + 10000);

      utimesSync(embeddings.getEmbeddingPath(lgKey), later, later);

      expect(await projections.isProjectionCached(selection)).toBe(false);
    });

    it('should become false when a partition disappears', async () => {
      await embedAll();
      await projections.saveProjection([], selection);

      rmSync(embeddings.getEmbeddingPath(aiKey));

      expect(await projections.isProjectionCached(selection)).toBe(false);
    });
  });

  describe('combinePartitions', () => {
    it('should concatenate partitions and keep the first row per paper', async () => {
      await embedAll();

      const rows = await projections.combinePartitions(selection);

      expect(rows.map((row) => row.arxiv_id)).toEqual(['1', '2', '3']);
    });
  });

  describe('projectSelection', () => {
    it('should project, save, and then serve from the cache', async () => {
      await embedAll();

      const first = await projections.projectSelection(selection);
      const second = await projections.projectSelection(selection);

      expect(first._unsafeUnwrap().fromCache).toBe(false);
      expect(first._unsafeUnwrap().fingerprint).toBe(selectionFingerprint(selection));
      expect(second._unsafeUnwrap().fromCache).toBe(true);
      expect(second._unsafeUnwrap().rows).toEqual(first._unsafeUnwrap().rows);
      expect(projector.project).toHaveBeenCalledTimes(1);
    });

    it('should place each paper at its projected coordinates without the vector', async () => {
      await embedAll();

      const result = await projections.projectSelection(selection);
      const rows = result._unsafeUnwrap().rows;

      expect(rows).toHaveLength(3);
      expect(rows[2]).toMatchObject({ arxiv_id: '3', year_month: '2024-01', x: 2 });
      expect(rows[2]).not.toHaveProperty('embedding');
    });

    it('should recompute after a partition changes', async () => {
      await embedAll();
      const first = await projections.projectSelection(selection);
      const path = projections.getProjectionPath(selection);
      const later = new Date(statSync(path).mtime.getTime() + 10000);
      utimesSync(embeddings.getEmbeddingPath(aiKey), later, later);

      const second = await projections.projectSelection(selection);

      expect(first._unsafeUnwrap().fromCache).toBe(false);
      expect(second._unsafeUnwrap().fromCache).toBe(false);
      expect(projector.project).toHaveBeenCalledTimes(2);
    });

    it('should reject a selection with too few papers', async () => {
      writeJsonLines(cache.getLocalPath(lgKey), []);
      writeJsonLines(cache.getLocalPath(aiKey), [makePaper('1')]);
      await embedAll();

      const result = await projections.projectSelection(selection);

      expect(result.isErr()).toBe(true);
      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(SelectionRejectedError);
      expect(error.message).toBe('Selection has 1 embedded papers; projection needs at least 3');
      expect(projector.project).not.toHaveBeenCalled();
    });

    it('should report an entry that cannot be written', async () => {
      await embedAll();
      writeFileSync(join(root, 'projections'), 'not a directory', 'utf8');

      const result = await projections.projectSelection(selection);

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(CacheWriteError);
      expect(projector.project).toHaveBeenCalledTimes(1);
      expect(await projections.isProjectionCached(selection)).toBe(false);
    });

    it('should treat an unreadable entry as a miss', async () => {
      await embedAll();
      const path = (await projections.saveProjection([], selection))._unsafeUnwrap();
      writeFileSync(path, '{ not json', 'utf8');

      expect(await projections.loadProjection(selection)).toBeNull();
    });
  });
});

describe('ProjectionCache with many papers', () => {
  it('should project a larger selection', async () => {
    const root = createTempDir();
    try {
      const logger = createTestLogger(root);
      const cache = new LocalCacheManager(join(root, 'data'), { logger });
      const key = { subject: 'cs.AI', year: '2024', month: '02' };
      writeJsonLines(cache.getLocalPath(key), makePapers('2402', 25));
      const embeddings = new EmbeddingPartitionStore(
        join(root, 'embeddings'),
        cache,
        { modelId: 'test-model', embed: async (texts: string[]) => texts.map((_, i) => [i, i % 3]) },
        { logger }
      );
      const projections = new ProjectionCache(join(root, 'projections'), embeddings, createFakeProjector(), {
        logger
      });
      await embeddings.embedPartition(key);

      const result = await projections.projectSelection({ categories: ['cs.AI'], yearMonths: [{ year: '2024', month: '02' }] });

      expect(result._unsafeUnwrap().rows).toHaveLength(25);
    } finally {
      removeTempDir(root);
    }
  });
});
