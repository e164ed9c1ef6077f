/**
 * Unit tests for RemoteCatalogClient
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { RemoteCatalogClient } from '../../../../src/services/catalog/RemoteCatalogClient.js';
import {
  createTempDir,
  createTestLogger,
  FakeHub,
  makePapers,
  removeTempDir
} from '../../../helpers/cache-test-helper.js';

describe('RemoteCatalogClient', () => {
  let root: string;
  let hub: FakeHub;
  let catalog: RemoteCatalogClient;

  beforeEach(() => {
    root = createTempDir();
    hub = new FakeHub();
    hub.addPartition({ subject: 'cs.AI', year: '2024', month: '01' }, makePapers('a', 2), 2000);
    hub.addPartition({ subject: 'cs.AI', year: '2024', month: '02' }, makePapers('b', 1));
    hub.addPartition({ subject: 'cs.AI', year: '2023', month: '12' }, makePapers('c', 1));
    hub.addPartition({ subject: 'cs.LG', year: '2024', month: '01' }, makePapers('d', 1));

    catalog = new RemoteCatalogClient(hub, {
      landingDir: join(root, 'landing'),
      logger: createTestLogger(root)
    });
  });

  afterEach(() => {
    catalog.shutdown();
    removeTempDir(root);
  });

  describe('listings', () => {
    it('should list subjects sorted', async () => {
      expect(await catalog.listSubjects()).toEqual(['cs.AI', 'cs.LG']);
    });

    it('should list years and months for a subject', async () => {
      expect(await catalog.listYearsForSubject('cs.AI')).toEqual(['2023', '2024']);
      expect(await catalog.listMonthsForSubjectYear('cs.AI', '2024')).toEqual(['01', '02']);
    });

    it('should derive available years and months from the first subject', async () => {
      expect(await catalog.listAvailableYears()).toEqual(['2023', '2024']);
      expect(await catalog.listAvailableMonths('2024')).toEqual(['01', '02']);
    });

    it('should memoize listings until the cache is cleared', async () => {
      await catalog.listSubjects();
      await catalog.listSubjects();

      expect(hub.listTree).toHaveBeenCalledTimes(1);

      catalog.clearCache();
      await catalog.listSubjects();

      expect(hub.listTree).toHaveBeenCalledTimes(2);
    });

    it('should not let callers alter memoized listings', async () => {
      (await catalog.listSubjects()).push('bogus.XX');
      (await catalog.listYearsForSubject('cs.AI')).length = 0;
      (await catalog.listMonthsForSubjectYear('cs.AI', '2024')).reverse();

      expect(await catalog.listSubjects()).toEqual(['cs.AI', 'cs.LG']);
      expect(await catalog.listYearsForSubject('cs.AI')).toEqual(['2023', '2024']);
      expect(await catalog.listMonthsForSubjectYear('cs.AI', '2024')).toEqual(['01', '02']);
    });

    it('should return an empty list for an unknown subject', async () => {
      expect(await catalog.listYearsForSubject('q-bio.XX')).toEqual([]);
    });

    it('should degrade a transient failure to an empty list without memoizing it', async () => {
      hub.fail('data');

      expect(await catalog.listSubjects()).toEqual([]);
      expect(existsSync(join(root, 'logs', 'remote-errors.jsonl'))).toBe(true);

      hub.recover('data');

      expect(await catalog.listSubjects()).toEqual(['cs.AI', 'cs.LG']);
    });
  });

  describe('getFileInfo', () => {
    it('should report the remote file size', async () => {
      const info = await catalog.getFileInfo({ subject: 'cs.AI', year: '2024', month: '01' });

      expect(info).toEqual({ sizeBytes: 2000, path: 'data/cs.AI/2024/01/00000000.parquet' });
    });

    it('should return null for an absent partition and remember that', async () => {
      const key = { subject: 'cs.AI', year: '2022', month: '01' };

      expect(await catalog.getFileInfo(key)).toBeNull();
      expect(await catalog.getFileInfo(key)).toBeNull();
      expect(hub.listTree).toHaveBeenCalledTimes(1);
    });
  });

  describe('downloadPartition', () => {
    it('should write the file into the landing area', async () => {
      const path = await catalog.downloadPartition({ subject: 'cs.LG', year: '2024', month: '01' });

      expect(path).toBe(join(root, 'landing', 'data', 'cs.LG', '2024', '01', '00000000.parquet'));
      expect(readFileSync(path ?? '', 'utf8')).toContain('"arxiv_id":"d.00001"');
    });

    it('should return null when the partition does not exist', async () => {
      expect(await catalog.downloadPartition({ subject: 'cs.LG', year: '1999', month: '01' })).toBeNull();
    });

    it('should return null when the hub fails', async () => {
      hub.fail('data/cs.AI/2024/01/00000000.parquet');

      expect(await catalog.downloadPartition({ subject: 'cs.AI', year: '2024', month: '01' })).toBeNull();
    });
  });
});
