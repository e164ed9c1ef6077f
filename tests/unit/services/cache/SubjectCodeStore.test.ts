/**
 * Unit tests for SubjectCodeStore
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { LocalCacheManager } from '../../../../src/services/cache/LocalCacheManager.js';
import { collectSubjectNames, SubjectCodeStore } from '../../../../src/services/cache/SubjectCodeStore.js';
import { RemoteCatalogClient } from '../../../../src/services/catalog/RemoteCatalogClient.js';
import {
  createTempDir,
  createTestLogger,
  FakeHub,
  makePaper,
  removeTempDir,
  writeJsonLines
} from '../../../helpers/cache-test-helper.js';

describe('SubjectCodeStore', () => {
  let root: string;
  let filePath: string;
  let hub: FakeHub;
  let catalog: RemoteCatalogClient;
  let cache: LocalCacheManager;
  let store: SubjectCodeStore;

  beforeEach(() => {
    root = createTempDir();
    filePath = join(root, 'cache', 'subject_codes.json');
    const logger = createTestLogger(root);
    hub = new FakeHub();
    hub.addPartition({ subject: 'cs.AI', year: '2024', month: '01' }, []);
    hub.addPartition({ subject: 'math.AG', year: '2024', month: '01' }, []);
    catalog = new RemoteCatalogClient(hub, { landingDir: join(root, 'landing'), logger });
    cache = new LocalCacheManager(join(root, 'data'), { logger });
    store = new SubjectCodeStore(filePath, catalog, cache, logger);
  });

  afterEach(() => {
    catalog.shutdown();
    removeTempDir(root);
  });

  it('should compute names from cached records and persist the map', async () => {
    writeJsonLines(cache.getLocalPath({ subject: 'cs.AI', year: '2024', month: '01' }), [
      makePaper('1', { subjects: 'Artificial Intelligence (cs.AI); Machine Learning (cs.LG)' })
    ]);

    const codes = await store.getSubjectCodes();

    expect(codes).toEqual({ 'cs.AI': 'Artificial Intelligence', 'math.AG': 'math.AG' });
    expect(JSON.parse(readFileSync(filePath, 'utf8'))).toEqual(codes);
  });

  it('should read the persisted map instead of the catalog', async () => {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, JSON.stringify({ 'q-fin.GN': 'General Finance' }), 'utf8');

    expect(await store.getSubjectCodes()).toEqual({ 'q-fin.GN': 'General Finance' });
    expect(hub.listTree).not.toHaveBeenCalled();
  });

  it('should recompute when the persisted map is unreadable', async () => {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, '{ broken', 'utf8');

    const codes = await store.getSubjectCodes();

    expect(Object.keys(codes)).toEqual(['cs.AI', 'math.AG']);
    expect(existsSync(join(root, 'logs', 'cache-corruption.jsonl'))).toBe(true);
  });

  it('should not persist an empty map', async () => {
    hub.fail('data');

    expect(await store.getSubjectCodes()).toEqual({});
    expect(existsSync(filePath)).toBe(false);
  });

  it('should keep serving the computed map when it cannot be persisted', async () => {
    writeFileSync(join(root, 'cache'), 'not a directory', 'utf8');

    const codes = await store.getSubjectCodes();
    hub.listTree.mockClear();

    expect(codes).toEqual({ 'cs.AI': 'cs.AI', 'math.AG': 'math.AG' });
    expect(await store.getSubjectCodes()).toEqual(codes);
    expect(hub.listTree).not.toHaveBeenCalled();
    expect(readFileSync(join(root, 'logs', 'general.jsonl'), 'utf8')).toContain('"message":"Cache write failed"');
  });

  it('should fall back to the code for unknown display names', async () => {
    expect(await store.getDisplayName('math.AG')).toBe('math.AG');
    expect(await store.getDisplayName('nope.XX')).toBe('nope.XX');
  });
});

describe('collectSubjectNames', () => {
  it('should keep the first name seen for a code', () => {
    const names = collectSubjectNames([
      makePaper('1', { primary_subject: 'Machine Learning (cs.LG)', subjects: null }),
      makePaper('2', { primary_subject: 'Learning (cs.LG)', subjects: null })
    ]);

    expect(names).toEqual({ 'cs.LG': 'Machine Learning' });
  });
});
