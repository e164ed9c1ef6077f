import { existsSync, promises as fs } from 'fs';
import { z } from 'zod';
import { describeError, logger as defaultLogger, type Logger } from '../../lib/logger.js';
import { writeJsonFileAtomic } from '../../lib/record-io.js';
import { tryAsync } from '../../lib/result-types.js';
import { parseSubjectLabels } from '../../models/PartitionKey.js';
import type { PaperRecord } from '../../models/PaperRecord.js';
import type { RemoteCatalogClient } from '../catalog/RemoteCatalogClient.js';
import type { LocalCacheManager } from './LocalCacheManager.js';

/**
 * Subject code -> display name
 */
export type SubjectCodeMap = Record<string, string>;

const SubjectCodeMapSchema = z.record(z.string(), z.string());

/**
 * Collects display names from the label columns of cached records
 */
export function collectSubjectNames(records: Iterable<PaperRecord>): SubjectCodeMap {
  const names = new Map<string, string>();
  for (const record of records) {
    for (const column of [record.primary_subject, record.subjects]) {
      if (!column) continue;
      for (const { code, name } of parseSubjectLabels(column)) {
        if (!names.has(code)) {
          names.set(code, name);
        }
      }
    }
  }
  return Object.fromEntries(names);
}

/**
 * SubjectCodeStore - persisted subject code map
 *
 * Computed once from the remote catalog and kept indefinitely; it is only
 * recomputed when the persisted file is missing or unreadable.
 */
export class SubjectCodeStore {
  private memo: SubjectCodeMap | null = null;
  private logger: Logger;

  constructor(
    private filePath: string,
    private catalog: RemoteCatalogClient,
    private cache: LocalCacheManager,
    logger?: Logger
  ) {
    this.logger = logger ?? defaultLogger;
  }

  async getSubjectCodes(): Promise<SubjectCodeMap> {
    if (this.memo) {
      return this.memo;
    }

    const persisted = await this.readPersisted();
    if (persisted) {
      this.memo = persisted;
      return persisted;
    }

    const computed = await this.compute();
    if (Object.keys(computed).length > 0) {
      const written = await tryAsync(
        () => writeJsonFileAtomic(this.filePath, computed),
        (error) => describeError(error).message
      );
      if (written.isErr()) {
        // Served from memory until the next process retries the write
        this.logger.error('Cache write failed', { path: this.filePath, reason: written.error });
      }
      this.logger.info('Subject codes computed', { count: Object.keys(computed).length });
      this.memo = computed;
    }
    return computed;
  }

  /**
   * Display name for a code, falling back to the code itself
   */
  async getDisplayName(code: string): Promise<string> {
    const codes = await this.getSubjectCodes();
    return codes[code] ?? code;
  }

  private async readPersisted(): Promise<SubjectCodeMap | null> {
    if (!existsSync(this.filePath)) {
      return null;
    }
    try {
      const parsed = SubjectCodeMapSchema.safeParse(JSON.parse(await fs.readFile(this.filePath, 'utf8')));
      if (parsed.success) {
        return parsed.data;
      }
      this.logger.logCacheCorruption(this.filePath, parsed.error.issues[0]?.message ?? 'invalid subject map');
    } catch (error) {
      this.logger.logCacheCorruption(this.filePath, error);
    }
    return null;
  }

  private async compute(): Promise<SubjectCodeMap> {
    const subjects = await this.catalog.listSubjects();
    const names = await this.namesFromCache();

    return Object.fromEntries(subjects.map((code) => [code, names.get(code) ?? code]));
  }

  private async namesFromCache(): Promise<Map<string, string>> {
    const names = new Map<string, string>();
    for (const year of await this.cache.listCachedYears()) {
      for (const month of await this.cache.listCachedMonths(year)) {
        for (const subject of await this.cache.listCachedSubjects(year, month)) {
          const found = collectSubjectNames(await this.cache.loadPartition({ subject, year, month }));
          for (const [code, name] of Object.entries(found)) {
            if (!names.has(code)) {
              names.set(code, name);
            }
          }
        }
      }
    }
    return names;
  }
}
