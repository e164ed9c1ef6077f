/**
 * ArxivCacheService
 *
 * Long-lived owner of every cache component for one cache root. The CLI
 * builds exactly one per process; tests build one per temporary directory
 * with an in-process transport.
 */

import type { AppConfig } from '../lib/env-config.js';
import { Logger } from '../lib/logger.js';
import { Result, ok, err } from '../lib/result-types.js';
import type { CacheError } from '../lib/errors/CacheErrors.js';
import { createCacheLayout, describePartition, type CacheLayout } from '../models/PartitionKey.js';
import { expandSelection, type Selection } from '../models/Selection.js';
import { LocalCacheManager } from './cache/LocalCacheManager.js';
import { SubjectCodeStore } from './cache/SubjectCodeStore.js';
import { FetchHubTransport, type HubTransport } from './catalog/HubTransport.js';
import { RemoteCatalogClient, type CircuitBreakerSettings } from './catalog/RemoteCatalogClient.js';
import { EmbeddingPartitionStore } from './derived/EmbeddingPartitionStore.js';
import { ProjectionCache, type ProjectionOutcome } from './derived/ProjectionCache.js';
import { computeSelectionStats, type SelectionStats } from './derived/SelectionStats.js';
import { TopicCache } from './derived/TopicCache.js';
import { DownloadOrchestrator, type SelectionDownloadResult } from './download/DownloadOrchestrator.js';
import { HostedEmbedder, type Embedder } from './embedding/Embedder.js';
import { SelectionEstimator } from './estimator/SelectionEstimator.js';
import { PathLockTable } from './path-lock.js';
import { UmapProjector, type Projector } from './projection/Projector.js';
import type { ProgressCallback } from './progress.js';
import { SemanticSearch } from './search/SemanticSearch.js';
import { KMeansTopicModeler, type TopicModeler } from './topics/TopicModeler.js';

/**
 * Collaborators that may be swapped out (tests, alternative backends)
 */
export interface ServiceOverrides {
  transport?: HubTransport;
  embedder?: Embedder;
  projector?: Projector;
  topicModeler?: TopicModeler;
  logger?: Logger;
  clock?: () => Date;
  breaker?: Partial<CircuitBreakerSettings>;
}

export interface EmbedSelectionResult extends ProjectionOutcome {
  downloads: SelectionDownloadResult;
  embedded: number;
}

export class ArxivCacheService {
  readonly layout: CacheLayout;
  readonly logger: Logger;
  readonly locks: PathLockTable;
  readonly catalog: RemoteCatalogClient;
  readonly cache: LocalCacheManager;
  readonly subjects: SubjectCodeStore;
  readonly orchestrator: DownloadOrchestrator;
  readonly estimator: SelectionEstimator;
  readonly embeddings: EmbeddingPartitionStore;
  readonly projections: ProjectionCache;
  readonly topics: TopicCache;
  readonly search: SemanticSearch;

  constructor(config: AppConfig, overrides: ServiceOverrides = {}) {
    this.layout = createCacheLayout(config.cacheRoot);
    this.logger = overrides.logger ?? new Logger({ logDir: config.logDir });
    this.locks = new PathLockTable(this.logger);

    const transport = overrides.transport ?? new FetchHubTransport(config.hub);
    this.catalog = new RemoteCatalogClient(transport, {
      landingDir: this.layout.hubLandingDir,
      logger: this.logger,
      breaker: overrides.breaker
    });

    this.cache = new LocalCacheManager(this.layout.dataDir, { logger: this.logger, locks: this.locks });
    this.subjects = new SubjectCodeStore(this.layout.subjectCodesFile, this.catalog, this.cache, this.logger);

    this.orchestrator = new DownloadOrchestrator(this.catalog, this.cache, {
      refetchCurrentMonth: config.refetchCurrentMonth,
      clock: overrides.clock,
      logger: this.logger
    });

    this.estimator = new SelectionEstimator(this.cache, this.catalog, {
      bytesPerPaper: config.bytesPerPaper,
      clock: overrides.clock
    });

    const embedder = overrides.embedder ?? new HostedEmbedder(config.embedding);
    this.embeddings = new EmbeddingPartitionStore(this.layout.embeddingsDir, this.cache, embedder, {
      batchSize: config.embedding.batchSize,
      textBudget: config.embedding.textBudget,
      logger: this.logger,
      locks: this.locks
    });

    const projector = overrides.projector ?? new UmapProjector(config.projection);
    this.projections = new ProjectionCache(this.layout.projectionsDir, this.embeddings, projector, {
      logger: this.logger,
      locks: this.locks
    });

    const topicModeler = overrides.topicModeler ?? new KMeansTopicModeler({ seed: config.projection.seed });
    this.topics = new TopicCache(this.layout.topicsDir, this.projections, topicModeler, embedder.modelId, {
      logger: this.logger,
      locks: this.locks
    });
    this.search = new SemanticSearch(this.projections, embedder, { logger: this.logger });
  }

  /**
   * Download, embed and project a selection, reusing every cached stage
   */
  async embedSelection(
    selection: Selection,
    onProgress?: ProgressCallback
  ): Promise<Result<EmbedSelectionResult, CacheError>> {
    onProgress?.(0, 3, 'Checking cached papers');
    const downloads = await this.orchestrator.ensureSelection(selection);
    if (downloads.failed.length > 0) {
      this.logger.warn('Some partitions could not be downloaded', {
        failed: downloads.failed.map(describePartition)
      });
    }

    onProgress?.(1, 3, 'Embedding papers');
    let embedded = 0;
    for (const key of expandSelection(selection)) {
      const result = await this.embeddings.embedPartition(key, { onProgress });
      if (result.isErr()) {
        return err(result.error);
      }
      embedded += result.value;
    }

    onProgress?.(2, 3, 'Projecting');
    const projection = await this.projections.projectSelection(selection, { onProgress });
    if (projection.isErr()) {
      return err(projection.error);
    }

    onProgress?.(3, 3, 'Done');
    return ok({ ...projection.value, downloads, embedded });
  }

  /**
   * Paper total and top subjects over the embedded papers of a selection
   */
  async getStats(selection: Selection): Promise<SelectionStats> {
    return computeSelectionStats(await this.projections.combinePartitions(selection));
  }

  /**
   * Stop background timers so the process can exit
   */
  shutdown(): void {
    this.catalog.shutdown();
  }
}
