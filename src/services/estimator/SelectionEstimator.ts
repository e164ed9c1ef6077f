/**
 * Selection Estimator
 *
 * Answers "how much data would this selection involve" without fetching it.
 * Cached partitions give exact counts; everything else is estimated from the
 * remote file size with a calibrated bytes-per-paper ratio.
 */

import {
  EMBEDDING_THROUGHPUT,
  PROJECTION_COST_MODEL,
  SIZE_ESTIMATE_CONFIG
} from '../../constants/calibration-constants.js';
import { monthsForYear, type PartitionKey } from '../../models/PartitionKey.js';
import type { RemoteCatalogClient } from '../catalog/RemoteCatalogClient.js';
import type { LocalCacheManager } from '../cache/LocalCacheManager.js';

export interface PartitionCount {
  count: number;
  isExact: boolean;
}

export interface CategoryCounts {
  cached: number;
  estimated: number;
  total: number;
}

export interface MonthCounts {
  cached: number;
  estimated: number;
}

export interface SelectionCounts {
  totalCached: number;
  totalEstimated: number;
  total: number;
  byCategory: Record<string, CategoryCounts>;
  byMonth: Record<string, MonthCounts>;
  /** (category, month) pairs resolved from the local cache */
  cachedFiles: number;
  /** (category, month) pairs resolved by estimation */
  estimatedFiles: number;
}

export interface HardwareForecast {
  embeddingSeconds: number;
  totalSeconds: number;
  formatted: string;
}

export interface ProcessingTimeEstimate {
  papers: number;
  projectionSeconds: number;
  gpu: HardwareForecast;
  cpu: HardwareForecast;
}

export interface SelectionEstimate extends SelectionCounts {
  year: string;
  months: string[];
  timeEstimate: ProcessingTimeEstimate;
}

export interface SelectionEstimatorOptions {
  bytesPerPaper?: number;
  clock?: () => Date;
}

/**
 * Human-readable duration: `45s`, `3m 20s`, `2h 5m`
 */
export function formatDuration(seconds: number): string {
  const rounded = Math.max(0, Math.round(seconds));
  if (rounded < 60) {
    return `${rounded}s`;
  }
  if (rounded < 3600) {
    return `${Math.floor(rounded / 60)}m ${rounded % 60}s`;
  }
  return `${Math.floor(rounded / 3600)}h ${Math.floor((rounded % 3600) / 60)}m`;
}

/**
 * Projection cost k * n * (1 + eps * n), with k fixed by the anchor run
 */
export function projectionSeconds(paperCount: number): number {
  const { ANCHOR_PAPERS, ANCHOR_SECONDS, EPSILON } = PROJECTION_COST_MODEL;
  const k = ANCHOR_SECONDS / (ANCHOR_PAPERS * (1 + EPSILON * ANCHOR_PAPERS));
  return k * paperCount * (1 + EPSILON * paperCount);
}

/**
 * Embedding + projection forecast for a fast (GPU) and a slow (CPU) machine
 */
export function estimateProcessingTime(paperCount: number): ProcessingTimeEstimate {
  const papers = Math.max(0, paperCount);
  const projection = projectionSeconds(papers);

  const forecast = (papersPerSecond: number): HardwareForecast => {
    const embeddingSeconds = papers / papersPerSecond;
    const totalSeconds = embeddingSeconds + projection;
    return { embeddingSeconds, totalSeconds, formatted: formatDuration(totalSeconds) };
  };

  return {
    papers,
    projectionSeconds: projection,
    gpu: forecast(EMBEDDING_THROUGHPUT.GPU_PAPERS_PER_SECOND),
    cpu: forecast(EMBEDDING_THROUGHPUT.CPU_PAPERS_PER_SECOND)
  };
}

export class SelectionEstimator {
  private bytesPerPaper: number;
  private clock: () => Date;

  constructor(
    private cache: LocalCacheManager,
    private catalog: RemoteCatalogClient,
    options: SelectionEstimatorOptions = {}
  ) {
    this.bytesPerPaper = options.bytesPerPaper ?? SIZE_ESTIMATE_CONFIG.BYTES_PER_PAPER;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Exact count when cached, size-based estimate otherwise, 0 when neither
   */
  async getCount(key: PartitionKey): Promise<PartitionCount> {
    if (this.cache.isCached(key)) {
      return { count: await this.cache.getCachedCount(key), isExact: true };
    }

    const info = await this.catalog.getFileInfo(key);
    if (!info) {
      return { count: 0, isExact: false };
    }
    return { count: Math.floor(info.sizeBytes / this.bytesPerPaper), isExact: false };
  }

  /**
   * Aggregates every (category, month) pair. All totals are sums of
   * non-negative terms, so growing the selection never shrinks them.
   */
  async getCountsForSelection(categories: string[], year: string, months: string[]): Promise<SelectionCounts> {
    const uniqueCategories = [...new Set(categories)];
    const uniqueMonths = [...new Set(months)];

    // Keys are caller data; Maps keep names such as `__proto__` as ordinary keys
    const byCategory = new Map<string, CategoryCounts>();
    const byMonth = new Map<string, MonthCounts>(uniqueMonths.map((month) => [month, { cached: 0, estimated: 0 }]));
    const result: SelectionCounts = {
      totalCached: 0,
      totalEstimated: 0,
      total: 0,
      byCategory: {},
      byMonth: {},
      cachedFiles: 0,
      estimatedFiles: 0
    };

    for (const category of uniqueCategories) {
      const categoryCounts: CategoryCounts = { cached: 0, estimated: 0, total: 0 };

      for (const [month, monthCounts] of byMonth) {
        const { count, isExact } = await this.getCount({ subject: category, year, month });

        if (isExact) {
          categoryCounts.cached += count;
          monthCounts.cached += count;
          result.totalCached += count;
          result.cachedFiles += 1;
        } else {
          categoryCounts.estimated += count;
          monthCounts.estimated += count;
          result.totalEstimated += count;
          result.estimatedFiles += 1;
        }
        categoryCounts.total += count;
      }

      byCategory.set(category, categoryCounts);
    }

    result.byCategory = Object.fromEntries(byCategory);
    result.byMonth = Object.fromEntries(byMonth);
    result.total = result.totalCached + result.totalEstimated;
    return result;
  }

  /**
   * Counts plus time forecast; months default to every month of the year
   * that can hold data.
   */
  async estimateSelection(categories: string[], year: string, months?: string[]): Promise<SelectionEstimate> {
    const resolvedMonths = months && months.length > 0 ? months : monthsForYear(year, this.clock());
    const counts = await this.getCountsForSelection(categories, year, resolvedMonths);
    return {
      ...counts,
      year,
      months: resolvedMonths,
      timeEstimate: estimateProcessingTime(counts.total)
    };
  }
}
