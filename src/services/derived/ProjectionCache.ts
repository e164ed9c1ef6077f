/**
 * Projection Cache
 *
 * One JSON document per (model, selection fingerprint). An entry is only
 * trusted while every embedding partition of its selection exists and none
 * was modified after the entry was written; anything else is a cache miss.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { describeError, logger as defaultLogger, type Logger } from '../../lib/logger.js';
import { writeJsonFileAtomic } from '../../lib/record-io.js';
import { Result, ok, err, tryAsync } from '../../lib/result-types.js';
import {
  CacheWriteError,
  ProjectionError,
  SelectionRejectedError,
  type CacheError
} from '../../lib/errors/CacheErrors.js';
import { describePartition, projectionPath } from '../../models/PartitionKey.js';
import {
  dedupeByArxivId,
  ProjectedPaperSchema,
  type EmbeddedPaper,
  type ProjectedPaper
} from '../../models/PaperRecord.js';
import {
  canonicalizeSelection,
  expandSelection,
  selectionFingerprint,
  type Selection
} from '../../models/Selection.js';
import type { Projector } from '../projection/Projector.js';
import { PathLockTable } from '../path-lock.js';
import type { ProgressCallback } from '../progress.js';
import type { EmbeddingPartitionStore } from './EmbeddingPartitionStore.js';

const ProjectionFileSchema = z.object({
  fingerprint: z.string(),
  modelId: z.string(),
  createdAt: z.string(),
  selection: z.object({
    categories: z.array(z.string()),
    yearMonths: z.array(z.string())
  }),
  rows: z.array(ProjectedPaperSchema)
});

export type ProjectionFile = z.infer<typeof ProjectionFileSchema>;

export interface ProjectionCacheOptions {
  logger?: Logger;
  locks?: PathLockTable;
}

export interface ProjectSelectionOptions {
  onProgress?: ProgressCallback;
}

export interface ProjectionOutcome {
  rows: ProjectedPaper[];
  fingerprint: string;
  fromCache: boolean;
}

export class ProjectionCache {
  private logger: Logger;
  private locks: PathLockTable;

  constructor(
    private projectionsDir: string,
    private embeddings: EmbeddingPartitionStore,
    private projector: Projector,
    options: ProjectionCacheOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.locks = options.locks ?? new PathLockTable(this.logger);
  }

  getProjectionPath(selection: Selection): string {
    return projectionPath(this.projectionsDir, this.embeddings.modelId, selectionFingerprint(selection));
  }

  /**
   * True while the entry exists and no embedding partition it depends on is
   * missing or newer than the entry.
   */
  async isProjectionCached(selection: Selection): Promise<boolean> {
    const path = this.getProjectionPath(selection);
    let entryTime: number;
    try {
      entryTime = (await fs.stat(path)).mtimeMs;
    } catch {
      return false;
    }

    for (const key of expandSelection(selection)) {
      const partitionTime = await this.embeddings.getModifiedTime(key);
      if (partitionTime === null) {
        this.logger.debug('Projection stale: partition missing', { partition: describePartition(key) });
        return false;
      }
      if (partitionTime > entryTime) {
        this.logger.debug('Projection stale: partition updated', { partition: describePartition(key) });
        return false;
      }
    }
    return true;
  }

  /**
   * Cached rows, or null on a miss (absent, stale or unreadable)
   */
  async loadProjection(selection: Selection): Promise<ProjectedPaper[] | null> {
    if (!(await this.isProjectionCached(selection))) {
      return null;
    }

    const path = this.getProjectionPath(selection);
    try {
      const parsed = ProjectionFileSchema.safeParse(JSON.parse(await fs.readFile(path, 'utf8')));
      if (parsed.success) {
        return parsed.data.rows;
      }
      this.logger.logCacheCorruption(path, parsed.error.issues[0]?.message ?? 'invalid projection file');
    } catch (error) {
      this.logger.logCacheCorruption(path, error);
    }
    return null;
  }

  /**
   * Writes (or supersedes) the entry for a selection
   */
  async saveProjection(
    rows: readonly ProjectedPaper[],
    selection: Selection
  ): Promise<Result<string, CacheWriteError>> {
    const path = this.getProjectionPath(selection);
    const file: ProjectionFile = {
      fingerprint: selectionFingerprint(selection),
      modelId: this.embeddings.modelId,
      createdAt: new Date().toISOString(),
      selection: canonicalizeSelection(selection),
      rows: [...rows]
    };
    const written = await tryAsync(
      () => this.locks.withLock(path, () => writeJsonFileAtomic(path, file)),
      (error) => new CacheWriteError(path, describeError(error).message)
    );
    if (written.isErr()) {
      this.logger.error('Cache write failed', { path, reason: written.error.message });
      return err(written.error);
    }
    this.logger.info('Projection saved', { fingerprint: file.fingerprint, rows: rows.length });
    return ok(path);
  }

  /**
   * Embedded rows of every partition in the selection, first row per paper wins
   */
  async combinePartitions(selection: Selection): Promise<EmbeddedPaper[]> {
    const rows: EmbeddedPaper[] = [];
    for (const key of expandSelection(selection)) {
      rows.push(...(await this.embeddings.loadEmbeddedPartition(key)));
    }
    return dedupeByArxivId(rows);
  }

  /**
   * Cached projection when valid; otherwise combine, project and save
   */
  async projectSelection(
    selection: Selection,
    options: ProjectSelectionOptions = {}
  ): Promise<Result<ProjectionOutcome, CacheError>> {
    const fingerprint = selectionFingerprint(selection);

    const cached = await this.loadProjection(selection);
    if (cached) {
      options.onProgress?.(1, 1, 'Loaded cached projection');
      return ok({ rows: cached, fingerprint, fromCache: true });
    }

    const combined = await this.combinePartitions(selection);
    const required = this.projector.nNeighbors + 1;
    if (combined.length < required) {
      return err(
        new SelectionRejectedError(
          `Selection has ${combined.length} embedded papers; projection needs at least ${required}`,
          combined.length,
          required
        )
      );
    }

    options.onProgress?.(0, 1, `Projecting ${combined.length} papers`);
    const projected = await tryAsync(
      () => this.projector.project(combined.map((row) => row.embedding)),
      (error) => new ProjectionError(fingerprint, describeError(error).message)
    );
    if (projected.isErr()) {
      return err(projected.error);
    }
    const coordinates = projected.value;
    if (coordinates.length !== combined.length) {
      return err(new ProjectionError(fingerprint, `expected ${combined.length} points, got ${coordinates.length}`));
    }

    const rows: ProjectedPaper[] = combined.map(({ embedding: _embedding, ...paper }, i) => ({
      ...paper,
      x: coordinates[i][0],
      y: coordinates[i][1]
    }));

    const saved = await this.saveProjection(rows, selection);
    if (saved.isErr()) {
      return err(saved.error);
    }
    options.onProgress?.(1, 1, 'Projection complete');
    return ok({ rows, fingerprint, fromCache: false });
  }
}
