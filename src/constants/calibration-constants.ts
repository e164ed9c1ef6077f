/**
 * Calibration constants
 *
 * Empirical numbers behind the size estimator and the processing-time
 * forecast. They are fixed configuration, not measured at runtime.
 */

/**
 * Size-based count estimation
 */
export const SIZE_ESTIMATE_CONFIG = {
  /** Observed parquet bytes per paper for the arXiv partitions */
  BYTES_PER_PAPER: 1000
} as const;

/**
 * Embedding throughput per hardware class (papers per second)
 */
export const EMBEDDING_THROUGHPUT = {
  /** CUDA-class accelerator */
  GPU_PAPERS_PER_SECOND: 667,

  /** Multi-core CPU */
  CPU_PAPERS_PER_SECOND: 50
} as const;

/**
 * Projection cost model: seconds = k * n * (1 + EPSILON * n),
 * with k chosen so the anchor run reproduces exactly.
 */
export const PROJECTION_COST_MODEL = {
  /** Paper count of the measured reference run */
  ANCHOR_PAPERS: 17342,

  /** Measured projection wall time for the reference run */
  ANCHOR_SECONDS: 22,

  /** Super-linear growth factor */
  EPSILON: 1e-5
} as const;

/**
 * Embedding text and batching defaults
 */
export const EMBEDDING_DEFAULTS = {
  /** Model used when none is configured */
  MODEL_ID: 'Snowflake/snowflake-arctic-embed-xs',

  /** Characters of title + abstract sent to the model */
  TEXT_BUDGET: 512,

  /** Papers per embedding request */
  BATCH_SIZE: 100
} as const;

/**
 * Projection hyperparameters
 */
export const PROJECTION_DEFAULTS = {
  N_COMPONENTS: 2,
  N_NEIGHBORS: 15,
  MIN_DIST: 0.1,
  SEED: 42
} as const;

/**
 * Topic extraction defaults
 */
export const TOPIC_DEFAULTS = {
  N_COMPONENTS: 10,

  /** Terms reported per topic */
  TOP_TERMS: 10,

  /** Characters of title + abstract tokenized for topic terms */
  TEXT_BUDGET: 512,

  MAX_ITERATIONS: 50,

  /** Papers required per requested topic */
  PAPERS_PER_TOPIC: 2
} as const;

/**
 * Semantic search defaults
 */
export const SEARCH_DEFAULTS = {
  /** Instruction prefix the embedding model expects on retrieval queries */
  QUERY_PREFIX: 'Represent this sentence for searching relevant passages: ',

  K: 200,
  MAX_K: 1000,

  /** Abstract characters returned per hit */
  ABSTRACT_PREVIEW: 500
} as const;

/**
 * Selection statistics
 */
export const STATS_DEFAULTS = {
  TOP_SUBJECTS: 10
} as const;
