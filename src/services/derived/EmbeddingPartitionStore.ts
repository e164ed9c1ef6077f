/**
 * Embedding Partition Store
 *
 * Per-partition cache of embedding output, one JSON Lines file per
 * (model, subject, year, month). A partition file is written once, whole,
 * and its modification time is what projection entries are checked against.
 */

import { existsSync, promises as fs } from 'fs';
import { EMBEDDING_DEFAULTS } from '../../constants/calibration-constants.js';
import { describeError, logger as defaultLogger, type Logger } from '../../lib/logger.js';
import { readRecordFile, writeRecordFileAtomic } from '../../lib/record-io.js';
import { Result, ok, err, tryAsync } from '../../lib/result-types.js';
import { CacheWriteError, EmbeddingError, type CacheError } from '../../lib/errors/CacheErrors.js';
import { describePartition, embeddingPartitionPath, type PartitionKey } from '../../models/PartitionKey.js';
import {
  buildEmbeddingText,
  EmbeddedPaperSchema,
  type EmbeddedPaper
} from '../../models/PaperRecord.js';
import type { LocalCacheManager } from '../cache/LocalCacheManager.js';
import type { Embedder } from '../embedding/Embedder.js';
import { PathLockTable } from '../path-lock.js';
import type { ProgressCallback } from '../progress.js';

export interface EmbeddingStoreOptions {
  batchSize?: number;
  textBudget?: number;
  logger?: Logger;
  locks?: PathLockTable;
}

export interface EmbedPartitionOptions {
  /** Re-embed even when the partition file exists and is current */
  force?: boolean;
  onProgress?: ProgressCallback;
}

export class EmbeddingPartitionStore {
  private batchSize: number;
  private textBudget: number;
  private logger: Logger;
  private locks: PathLockTable;

  constructor(
    private embeddingsDir: string,
    private cache: LocalCacheManager,
    private embedder: Embedder,
    options: EmbeddingStoreOptions = {}
  ) {
    this.batchSize = options.batchSize ?? EMBEDDING_DEFAULTS.BATCH_SIZE;
    this.textBudget = options.textBudget ?? EMBEDDING_DEFAULTS.TEXT_BUDGET;
    this.logger = options.logger ?? defaultLogger;
    this.locks = options.locks ?? new PathLockTable(this.logger);
  }

  get modelId(): string {
    return this.embedder.modelId;
  }

  getEmbeddingPath(key: PartitionKey): string {
    return embeddingPartitionPath(this.embeddingsDir, this.embedder.modelId, key);
  }

  isCategoryMonthEmbedded(key: PartitionKey): boolean {
    return existsSync(this.getEmbeddingPath(key));
  }

  /**
   * Last-modified time in ms, or null when the partition file is missing
   */
  async getModifiedTime(key: PartitionKey): Promise<number | null> {
    try {
      const stats = await fs.stat(this.getEmbeddingPath(key));
      return stats.mtimeMs;
    } catch {
      return null;
    }
  }

  /**
   * An embedding partition is stale once its source partition is rewritten after it
   */
  private async isUpToDate(key: PartitionKey): Promise<boolean> {
    const embeddedAt = await this.getModifiedTime(key);
    if (embeddedAt === null) {
      return false;
    }
    const sourceAt = await this.cache.getModifiedTime(key);
    return sourceAt === null || sourceAt <= embeddedAt;
  }

  /**
   * Embeds the cached records of one partition and stores the result.
   * Returns the number of embedded papers; an uncached source partition
   * yields 0 and writes nothing.
   */
  async embedPartition(key: PartitionKey, options: EmbedPartitionOptions = {}): Promise<Result<number, CacheError>> {
    const label = describePartition(key);

    if (!options.force && (await this.isUpToDate(key))) {
      const count = await this.getEmbeddedCount(key);
      options.onProgress?.(count, count, `Embeddings cached for ${label}`);
      return ok(count);
    }

    if (!this.cache.isCached(key)) {
      this.logger.warn('No cached papers to embed', { partition: label });
      return ok(0);
    }

    const records = await this.cache.loadPartition(key);
    const texts = records.map((record) => buildEmbeddingText(record, this.textBudget));
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      options.onProgress?.(start, texts.length, `Embedding ${label}`);

      const embedded = await tryAsync(
        () => this.embedder.embed(batch),
        (error) => new EmbeddingError(label, describeError(error).message)
      );
      if (embedded.isErr()) {
        this.logger.error('Embedding batch failed', { partition: label, start, error: embedded.error.message });
        return err(embedded.error);
      }
      const batchVectors = embedded.value;

      if (batchVectors.length !== batch.length) {
        return err(new EmbeddingError(label, `expected ${batch.length} vectors, got ${batchVectors.length}`));
      }
      vectors.push(...batchVectors);
    }

    const yearMonth = `${key.year}-${key.month}`;
    const rows: EmbeddedPaper[] = records.map((record, i) => ({
      ...record,
      embedding: vectors[i],
      year_month: yearMonth
    }));

    const dest = this.getEmbeddingPath(key);
    const written = await tryAsync(
      () => this.locks.withLock(dest, () => writeRecordFileAtomic(dest, rows)),
      (error) => new CacheWriteError(dest, describeError(error).message)
    );
    if (written.isErr()) {
      this.logger.error('Cache write failed', { path: dest, reason: written.error.message });
      return err(written.error);
    }
    options.onProgress?.(rows.length, rows.length, `Embedded ${rows.length} papers for ${label}`);
    this.logger.info('Partition embedded', { partition: label, papers: rows.length, model: this.modelId });

    return ok(rows.length);
  }

  /**
   * Rows in an embedding partition; 0 when absent or unreadable
   */
  async getEmbeddedCount(key: PartitionKey): Promise<number> {
    return (await this.loadEmbeddedPartition(key)).length;
  }

  /**
   * Rows of an embedding partition; [] when absent or unreadable
   */
  async loadEmbeddedPartition(key: PartitionKey): Promise<EmbeddedPaper[]> {
    const path = this.getEmbeddingPath(key);
    if (!existsSync(path)) {
      return [];
    }
    const rows = await readRecordFile(path, EmbeddedPaperSchema);
    if (rows.isErr()) {
      this.logger.logCacheCorruption(path, rows.error, { partition: describePartition(key) });
      return [];
    }
    return rows.value;
  }
}
