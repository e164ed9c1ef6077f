/**
 * Topic Cache
 *
 * Topic extraction over the combined embeddings of a selection, kept as one
 * JSON document per (model, topic count, selection). An entry is reused only
 * while the selection still holds the same number of papers.
 */

import { createHash } from 'crypto';
import { existsSync, promises as fs } from 'fs';
import { z } from 'zod';
import { TOPIC_DEFAULTS } from '../../constants/calibration-constants.js';
import { describeError, logger as defaultLogger, type Logger } from '../../lib/logger.js';
import { writeJsonFileAtomic } from '../../lib/record-io.js';
import { Result, ok, err, tryAsync } from '../../lib/result-types.js';
import {
  CacheWriteError,
  InvalidRequestError,
  SelectionRejectedError,
  TopicError,
  type CacheError
} from '../../lib/errors/CacheErrors.js';
import { topicsPath } from '../../models/PartitionKey.js';
import { buildEmbeddingText } from '../../models/PaperRecord.js';
import { canonicalizeSelection, FINGERPRINT_LENGTH, type Selection } from '../../models/Selection.js';
import { PathLockTable } from '../path-lock.js';
import type { TopicModel, TopicModeler } from '../topics/TopicModeler.js';
import type { ProjectionCache } from './ProjectionCache.js';

const TopicFileSchema = z.object({
  cacheKey: z.string(),
  modelId: z.string(),
  createdAt: z.string(),
  nComponents: z.number().int(),
  paperCount: z.number().int(),
  selection: z.object({
    categories: z.array(z.string()),
    yearMonths: z.array(z.string())
  }),
  topics: z.array(
    z.object({
      id: z.number().int(),
      terms: z.array(z.object({ term: z.string(), weight: z.number() })),
      docCount: z.number().int()
    })
  ),
  assignments: z.array(
    z.object({
      arxivId: z.string(),
      weights: z.array(z.number()),
      dominant: z.number().int()
    })
  )
});

export type TopicFile = z.infer<typeof TopicFileSchema>;

export interface TopicOutcome extends TopicModel {
  nComponents: number;
  paperCount: number;
  cacheKey: string;
  fromCache: boolean;
}

export interface TopicStatus {
  available: boolean;
  paperCount: number;
  suggestedTopics: number;
}

export interface TopicCacheOptions {
  logger?: Logger;
  locks?: PathLockTable;
}

/**
 * Key over the topic count and the sorted months and categories
 */
export function topicCacheKey(nComponents: number, selection: Selection): string {
  const canonical = canonicalizeSelection(selection);
  return createHash('sha256')
    .update(JSON.stringify({ n: nComponents, ...canonical }))
    .digest('hex')
    .slice(0, FINGERPRINT_LENGTH);
}

/**
 * Roughly one topic per hundred papers, between 3 and 15
 */
export function suggestTopicCount(paperCount: number): number {
  return Math.min(Math.max(3, Math.floor(paperCount / 100)), 15);
}

export class TopicCache {
  private logger: Logger;
  private locks: PathLockTable;

  constructor(
    private topicsDir: string,
    private projections: ProjectionCache,
    private modeler: TopicModeler,
    private modelId: string,
    options: TopicCacheOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.locks = options.locks ?? new PathLockTable(this.logger);
  }

  getTopicsPath(nComponents: number, selection: Selection): string {
    return topicsPath(this.topicsDir, this.modelId, topicCacheKey(nComponents, selection));
  }

  async getStatus(selection: Selection): Promise<TopicStatus> {
    const paperCount = (await this.projections.combinePartitions(selection)).length;
    return { available: paperCount > 0, paperCount, suggestedTopics: suggestTopicCount(paperCount) };
  }

  async extractTopics(
    selection: Selection,
    nComponents: number = TOPIC_DEFAULTS.N_COMPONENTS
  ): Promise<Result<TopicOutcome, CacheError>> {
    if (!Number.isInteger(nComponents) || nComponents < 1) {
      return err(new InvalidRequestError('nComponents', 'must be a positive integer'));
    }

    const rows = await this.projections.combinePartitions(selection);
    const required = nComponents * TOPIC_DEFAULTS.PAPERS_PER_TOPIC;
    if (rows.length < required) {
      return err(
        new SelectionRejectedError(
          `Selection has ${rows.length} embedded papers; ${nComponents} topics need at least ${required}`,
          rows.length,
          required
        )
      );
    }

    const cacheKey = topicCacheKey(nComponents, selection);
    const path = this.getTopicsPath(nComponents, selection);
    const cached = await this.readEntry(path);
    if (cached && cached.paperCount === rows.length) {
      return ok({ ...this.toOutcome(cached), fromCache: true });
    }
    if (cached) {
      this.logger.debug('Topic cache stale: paper count changed', {
        cacheKey,
        cached: cached.paperCount,
        current: rows.length
      });
    }

    const model = await tryAsync(
      () =>
        this.modeler.extract(
          rows.map((row) => ({
            arxivId: row.arxiv_id,
            embedding: row.embedding,
            text: buildEmbeddingText(row, TOPIC_DEFAULTS.TEXT_BUDGET)
          })),
          nComponents
        ),
      (error) => new TopicError(cacheKey, describeError(error).message)
    );
    if (model.isErr()) {
      return err(model.error);
    }

    const file: TopicFile = {
      cacheKey,
      modelId: this.modelId,
      createdAt: new Date().toISOString(),
      nComponents,
      paperCount: rows.length,
      selection: canonicalizeSelection(selection),
      ...model.value
    };
    const written = await tryAsync(
      () => this.locks.withLock(path, () => writeJsonFileAtomic(path, file)),
      (error) => new CacheWriteError(path, describeError(error).message)
    );
    if (written.isErr()) {
      this.logger.error('Cache write failed', { path, reason: written.error.message });
      return err(written.error);
    }

    this.logger.info('Topics extracted', { cacheKey, topics: nComponents, papers: rows.length });
    return ok({ ...this.toOutcome(file), fromCache: false });
  }

  private toOutcome(file: TopicFile): Omit<TopicOutcome, 'fromCache'> {
    return {
      topics: file.topics,
      assignments: file.assignments,
      nComponents: file.nComponents,
      paperCount: file.paperCount,
      cacheKey: file.cacheKey
    };
  }

  private async readEntry(path: string): Promise<TopicFile | null> {
    if (!existsSync(path)) {
      return null;
    }
    try {
      const parsed = TopicFileSchema.safeParse(JSON.parse(await fs.readFile(path, 'utf8')));
      if (parsed.success) {
        return parsed.data;
      }
      this.logger.logCacheCorruption(path, parsed.error.issues[0]?.message ?? 'invalid topics file');
    } catch (error) {
      this.logger.logCacheCorruption(path, error);
    }
    return null;
  }
}
