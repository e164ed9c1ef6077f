import { logger as defaultLogger, type Logger } from '../../lib/logger.js';
import { readRecordFile } from '../../lib/record-io.js';
import {
  describePartition,
  isCurrentYearMonth,
  type PartitionKey
} from '../../models/PartitionKey.js';
import { dedupeByArxivId, PaperRecordSchema, type PaperRecord } from '../../models/PaperRecord.js';
import { expandSelection, type Selection } from '../../models/Selection.js';
import type { RemoteCatalogClient } from '../catalog/RemoteCatalogClient.js';
import type { LocalCacheManager } from '../cache/LocalCacheManager.js';
import type { ProgressCallback } from '../progress.js';

export interface DownloadOptions {
  /** Re-fetch even when the partition is cached */
  force?: boolean;
  onProgress?: ProgressCallback;
}

export interface MonthDownloadOptions extends DownloadOptions {
  /** Subjects to combine; defaults to the whole catalog */
  subjects?: string[];
}

export interface MonthDownloadResult {
  path: string;
  papers: number;
  fromCache: boolean;
  succeeded: string[];
  failed: string[];
}

export interface SelectionDownloadResult {
  downloaded: number;
  alreadyCached: number;
  failed: PartitionKey[];
}

export interface DownloadOrchestratorOptions {
  /** Treat the current calendar month as always stale */
  refetchCurrentMonth?: boolean;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * DownloadOrchestrator - decides when a partition must be fetched
 *
 * A cached partition is reused unless `force` is set or it belongs to the
 * current calendar month (upstream is still receiving papers for it). A
 * failed fetch leaves any earlier cache entry untouched.
 */
export class DownloadOrchestrator {
  private refetchCurrentMonth: boolean;
  private clock: () => Date;
  private logger: Logger;

  constructor(
    private catalog: RemoteCatalogClient,
    private cache: LocalCacheManager,
    options: DownloadOrchestratorOptions = {}
  ) {
    this.refetchCurrentMonth = options.refetchCurrentMonth ?? true;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * True when cached copies of this year/month must be re-fetched
   */
  isStaleByPolicy(year: string, month: string): boolean {
    return this.refetchCurrentMonth && isCurrentYearMonth(year, month, this.clock());
  }

  /**
   * Fetches one partition into the cache when needed.
   * Returns the cached path, or null when nothing could be fetched.
   */
  async downloadAndCache(key: PartitionKey, options: DownloadOptions = {}): Promise<string | null> {
    const label = describePartition(key);

    if (!options.force && this.cache.isCached(key) && !this.isStaleByPolicy(key.year, key.month)) {
      options.onProgress?.(1, 1, `Cached ${label}`);
      return this.cache.getLocalPath(key);
    }

    options.onProgress?.(0, 1, `Downloading ${label}`);
    const downloaded = await this.catalog.downloadPartition(key);
    if (downloaded === null) {
      return null;
    }

    const stored = await this.cache.store(key, downloaded);
    if (stored.isErr()) {
      return null;
    }

    options.onProgress?.(1, 1, `Downloaded ${label}`);
    return stored.value;
  }

  /**
   * Builds the combined file for a month from every subject partition.
   * Missing subjects are skipped; the month only fails when all of them fail.
   */
  async downloadMonth(
    year: string,
    month: string,
    options: MonthDownloadOptions = {}
  ): Promise<MonthDownloadResult | null> {
    const path = this.cache.getMonthPath(year, month);

    if (!options.force && this.cache.isMonthCached(year, month) && !this.isStaleByPolicy(year, month)) {
      const papers = await this.cache.getMonthCount(year, month);
      this.logger.info('Month already cached', { year, month, papers });
      return { path, papers, fromCache: true, succeeded: [], failed: [] };
    }

    const subjects = options.subjects ?? (await this.catalog.listSubjects());
    const succeeded: string[] = [];
    const failed: string[] = [];
    const collected: PaperRecord[] = [];

    for (let i = 0; i < subjects.length; i++) {
      const subject = subjects[i];
      options.onProgress?.(i, subjects.length, `Downloading ${subject} ${year}-${month}`);

      const downloaded = await this.catalog.downloadPartition({ subject, year, month });
      if (downloaded === null) {
        failed.push(subject);
        continue;
      }

      const records = await readRecordFile(downloaded, PaperRecordSchema);
      if (records.isErr()) {
        this.logger.logCacheCorruption(downloaded, records.error, { subject, year, month });
        failed.push(subject);
        continue;
      }

      collected.push(...records.value);
      succeeded.push(subject);
    }

    if (succeeded.length === 0) {
      this.logger.warn('No data found for month', { year, month, subjects: subjects.length });
      return null;
    }

    const combined = dedupeByArxivId(collected);
    const written = await this.cache.writeMonthAggregate(year, month, combined);
    if (written.isErr()) {
      return null;
    }
    options.onProgress?.(subjects.length, subjects.length, `Saved ${combined.length} papers for ${year}-${month}`);
    this.logger.info('Month downloaded', {
      year,
      month,
      papers: combined.length,
      succeeded: succeeded.length,
      failed: failed.length
    });

    return { path, papers: combined.length, fromCache: false, succeeded, failed };
  }

  /**
   * Makes sure every partition of a selection is cached
   */
  async ensureSelection(selection: Selection, options: DownloadOptions = {}): Promise<SelectionDownloadResult> {
    const keys = expandSelection(selection);
    const result: SelectionDownloadResult = { downloaded: 0, alreadyCached: 0, failed: [] };

    for (let i = 0; i < keys.length; i++) {
      const key = keys[i];
      options.onProgress?.(i, keys.length, `Preparing ${describePartition(key)}`);

      if (!options.force && this.cache.isCached(key) && !this.isStaleByPolicy(key.year, key.month)) {
        result.alreadyCached += 1;
        continue;
      }

      const path = await this.downloadAndCache(key, { force: options.force });
      if (path === null) {
        result.failed.push(key);
      } else {
        result.downloaded += 1;
      }
    }

    options.onProgress?.(keys.length, keys.length, 'Downloads complete');
    return result;
  }
}
