/**
 * Local Cache Manager
 *
 * Owns the persisted layout of downloaded partitions:
 *
 *   <dataDir>/<year>/<month>/<safe-subject>.jsonl   one partition
 *   <dataDir>/arxiv_<year>_<month>.jsonl            all subjects of a month
 *
 * Existence checks are pure path predicates; row counts are only read when
 * asked for. Unreadable files count as absent.
 */

import { existsSync, promises as fs } from 'fs';
import { join } from 'path';
import { describeError, logger as defaultLogger, type Logger } from '../../lib/logger.js';
import { readRecordFile, writeRecordFileAtomic } from '../../lib/record-io.js';
import { Result, ok, err, tryAsync } from '../../lib/result-types.js';
import { CacheCorruptionError, CacheWriteError } from '../../lib/errors/CacheErrors.js';
import {
  describePartition,
  monthAggregatePath,
  partitionPath,
  RECORD_EXTENSION,
  subjectFromSafe,
  type PartitionKey
} from '../../models/PartitionKey.js';
import { PaperRecordSchema, type PaperRecord } from '../../models/PaperRecord.js';
import { PathLockTable } from '../path-lock.js';

export interface MonthSummary {
  subjects: number;
  papers: number;
}

export interface YearSummary {
  months: Record<string, MonthSummary>;
  total: number;
}

export interface CacheSummary {
  years: Record<string, YearSummary>;
  totalPapers: number;
  totalFiles: number;
}

export interface LocalCacheOptions {
  logger?: Logger;
  locks?: PathLockTable;
}

const AGGREGATE_PATTERN = /^arxiv_(\d{4})_(\d{2})\.jsonl$/;
const YEAR_PATTERN = /^\d{4}$/;
const MONTH_PATTERN = /^\d{2}$/;

async function readDirNames(dir: string): Promise<Array<{ name: string; isDirectory: boolean }>> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() }));
  } catch {
    return [];
  }
}

export class LocalCacheManager {
  private logger: Logger;
  private locks: PathLockTable;

  constructor(private dataDir: string, options: LocalCacheOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.locks = options.locks ?? new PathLockTable(this.logger);
  }

  getDataDir(): string {
    return this.dataDir;
  }

  /**
   * Canonical path of a partition file
   */
  getLocalPath(key: PartitionKey): string {
    return partitionPath(this.dataDir, key);
  }

  /**
   * Canonical path of a month aggregate file
   */
  getMonthPath(year: string, month: string): string {
    return monthAggregatePath(this.dataDir, year, month);
  }

  isCached(key: PartitionKey): boolean {
    return existsSync(this.getLocalPath(key));
  }

  isMonthCached(year: string, month: string): boolean {
    return existsSync(this.getMonthPath(year, month));
  }

  /**
   * Paper count of a cached partition; 0 when absent or unreadable
   */
  async getCachedCount(key: PartitionKey): Promise<number> {
    return this.countFile(this.getLocalPath(key));
  }

  /**
   * Paper count of a month aggregate; 0 when absent or unreadable
   */
  async getMonthCount(year: string, month: string): Promise<number> {
    return this.countFile(this.getMonthPath(year, month));
  }

  /**
   * Validates `sourcePath` completely, then places it at the canonical path.
   * The destination is either untouched or fully written.
   */
  async store(
    key: PartitionKey,
    sourcePath: string
  ): Promise<Result<string, CacheCorruptionError | CacheWriteError>> {
    const records = await readRecordFile(sourcePath, PaperRecordSchema);
    if (records.isErr()) {
      this.logger.logCacheCorruption(sourcePath, records.error, { partition: describePartition(key) });
      return err(records.error);
    }

    const dest = this.getLocalPath(key);
    const written = await this.writeLocked(dest, records.value);
    if (written.isErr()) {
      return err(written.error);
    }
    this.logger.debug('Stored partition', {
      partition: describePartition(key),
      papers: records.value.length
    });
    return ok(dest);
  }

  /**
   * Replaces the aggregate file of a month
   */
  async writeMonthAggregate(
    year: string,
    month: string,
    records: readonly PaperRecord[]
  ): Promise<Result<string, CacheWriteError>> {
    return this.writeLocked(this.getMonthPath(year, month), records);
  }

  /**
   * Modification time (ms) of a cached partition, null when absent
   */
  async getModifiedTime(key: PartitionKey): Promise<number | null> {
    try {
      const stats = await fs.stat(this.getLocalPath(key));
      return stats.mtimeMs;
    } catch {
      return null;
    }
  }

  private async writeLocked(dest: string, records: readonly PaperRecord[]): Promise<Result<string, CacheWriteError>> {
    const written = await tryAsync(
      () => this.locks.withLock(dest, () => writeRecordFileAtomic(dest, records)),
      (error) => new CacheWriteError(dest, describeError(error).message)
    );
    if (written.isErr()) {
      this.logger.error('Cache write failed', { path: dest, reason: written.error.message });
      return err(written.error);
    }
    return ok(dest);
  }

  /**
   * Records of one cached partition; [] when absent or unreadable
   */
  async loadPartition(key: PartitionKey): Promise<PaperRecord[]> {
    const path = this.getLocalPath(key);
    if (!existsSync(path)) {
      return [];
    }
    const records = await readRecordFile(path, PaperRecordSchema);
    if (records.isErr()) {
      this.logger.logCacheCorruption(path, records.error);
      return [];
    }
    return records.value;
  }

  /**
   * Concatenated records of the cached keys among `keys`
   */
  async loadPartitions(keys: readonly PartitionKey[]): Promise<PaperRecord[]> {
    const all: PaperRecord[] = [];
    for (const key of keys) {
      if (this.isCached(key)) {
        all.push(...(await this.loadPartition(key)));
      }
    }
    return all;
  }

  /**
   * Subjects cached for a year/month, sorted
   */
  async listCachedSubjects(year: string, month: string): Promise<string[]> {
    const suffix = `.${RECORD_EXTENSION}`;
    const entries = await readDirNames(join(this.dataDir, year, month));
    return entries
      .filter((entry) => !entry.isDirectory && !entry.name.startsWith('.') && entry.name.endsWith(suffix))
      .map((entry) => subjectFromSafe(entry.name.slice(0, -suffix.length)))
      .sort();
  }

  /**
   * Years with any cached partition or month aggregate, sorted
   */
  async listCachedYears(): Promise<string[]> {
    const years = new Set<string>();
    for (const entry of await readDirNames(this.dataDir)) {
      if (entry.isDirectory && YEAR_PATTERN.test(entry.name)) {
        years.add(entry.name);
      }
      const aggregate = AGGREGATE_PATTERN.exec(entry.name);
      if (!entry.isDirectory && aggregate) {
        years.add(aggregate[1]);
      }
    }
    return [...years].sort();
  }

  /**
   * Months of a year with any cached partition or month aggregate, sorted
   */
  async listCachedMonths(year: string): Promise<string[]> {
    const months = new Set<string>();
    for (const entry of await readDirNames(join(this.dataDir, year))) {
      if (entry.isDirectory && MONTH_PATTERN.test(entry.name)) {
        months.add(entry.name);
      }
    }
    for (const entry of await readDirNames(this.dataDir)) {
      const aggregate = AGGREGATE_PATTERN.exec(entry.name);
      if (!entry.isDirectory && aggregate && aggregate[1] === year) {
        months.add(aggregate[2]);
      }
    }
    return [...months].sort();
  }

  /**
   * Papers and files per year/month across the whole cache.
   * Reads every cached file once; meant for operator views.
   */
  async getCacheSummary(): Promise<CacheSummary> {
    const summary: CacheSummary = { years: {}, totalPapers: 0, totalFiles: 0 };

    for (const year of await this.listCachedYears()) {
      const yearData: YearSummary = { months: {}, total: 0 };

      for (const month of await this.listCachedMonths(year)) {
        const subjects = await this.listCachedSubjects(year, month);
        let monthTotal = 0;

        for (const subject of subjects) {
          monthTotal += await this.getCachedCount({ subject, year, month });
          summary.totalFiles += 1;
        }

        yearData.months[month] = { subjects: subjects.length, papers: monthTotal };
        yearData.total += monthTotal;
      }

      summary.years[year] = yearData;
      summary.totalPapers += yearData.total;
    }

    return summary;
  }

  private async countFile(path: string): Promise<number> {
    if (!existsSync(path)) {
      return 0;
    }
    const records = await readRecordFile(path, PaperRecordSchema);
    if (records.isErr()) {
      this.logger.logCacheCorruption(path, records.error);
      return 0;
    }
    return records.value.length;
  }
}
