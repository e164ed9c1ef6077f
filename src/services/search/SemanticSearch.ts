/**
 * Semantic search over the embedded papers of a selection.
 * Hits carry their projected coordinates so they can be placed on the map.
 */

import { SEARCH_DEFAULTS } from '../../constants/calibration-constants.js';
import { describeError, logger as defaultLogger, type Logger } from '../../lib/logger.js';
import { Result, ok, err, tryAsync } from '../../lib/result-types.js';
import { cosineSimilarity, roundTo } from '../../lib/vector-math.js';
import { EmbeddingError, InvalidRequestError, type CacheError } from '../../lib/errors/CacheErrors.js';
import type { Selection } from '../../models/Selection.js';
import type { ProjectionCache } from '../derived/ProjectionCache.js';
import type { Embedder } from '../embedding/Embedder.js';

export interface SearchHit {
  arxivId: string;
  title: string | null;
  primarySubject: string | null;
  submissionDate: string | null;
  abstract: string | null;
  score: number;
  x: number;
  y: number;
}

export interface SemanticSearchOptions {
  queryPrefix?: string;
  logger?: Logger;
}

/**
 * Abstract cut to the preview length, marked with an ellipsis when cut
 */
export function previewAbstract(abstract: string | null | undefined): string | null {
  if (abstract === null || abstract === undefined) {
    return null;
  }
  const limit = SEARCH_DEFAULTS.ABSTRACT_PREVIEW;
  return abstract.length > limit ? `${abstract.slice(0, limit)}...` : abstract;
}

export class SemanticSearch {
  private queryPrefix: string;
  private logger: Logger;

  constructor(
    private projections: ProjectionCache,
    private embedder: Embedder,
    options: SemanticSearchOptions = {}
  ) {
    this.queryPrefix = options.queryPrefix ?? SEARCH_DEFAULTS.QUERY_PREFIX;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * The `k` papers closest to the query, best first
   */
  async search(selection: Selection, query: string, k: number = SEARCH_DEFAULTS.K): Promise<Result<SearchHit[], CacheError>> {
    const text = query.trim();
    if (text.length === 0) {
      return err(new InvalidRequestError('query', 'must not be empty'));
    }
    if (!Number.isInteger(k) || k < 1 || k > SEARCH_DEFAULTS.MAX_K) {
      return err(new InvalidRequestError('k', `must be an integer between 1 and ${SEARCH_DEFAULTS.MAX_K}`));
    }

    const projection = await this.projections.projectSelection(selection);
    if (projection.isErr()) {
      return err(projection.error);
    }
    const placed = new Map(projection.value.rows.map((row) => [row.arxiv_id, row]));
    const rows = await this.projections.combinePartitions(selection);

    const embedded = await tryAsync(
      () => this.embedder.embed([`${this.queryPrefix}${text}`]),
      (error) => new EmbeddingError('query', describeError(error).message)
    );
    if (embedded.isErr()) {
      return err(embedded.error);
    }
    const [vector] = embedded.value;
    if (!vector) {
      return err(new EmbeddingError('query', 'no vector returned'));
    }
    const mismatched = rows.find((row) => row.embedding.length !== vector.length);
    if (mismatched) {
      return err(
        new EmbeddingError('query', `expected ${mismatched.embedding.length} dimensions, got ${vector.length}`)
      );
    }

    const scored = rows.flatMap((row) => {
      const point = placed.get(row.arxiv_id);
      return point ? [{ row, point, score: cosineSimilarity(vector, row.embedding) }] : [];
    });
    scored.sort((a, b) => b.score - a.score || a.row.arxiv_id.localeCompare(b.row.arxiv_id));

    const hits = scored.slice(0, k).map(({ row, point, score }) => ({
      arxivId: row.arxiv_id,
      title: row.title ?? null,
      primarySubject: row.primary_subject ?? null,
      submissionDate: row.submission_date ?? null,
      abstract: previewAbstract(row.abstract),
      score: roundTo(score),
      x: roundTo(point.x),
      y: roundTo(point.y)
    }));

    this.logger.debug('Search complete', { query: text, candidates: scored.length, hits: hits.length });
    return ok(hits);
  }
}
