/**
 * Retrieval engine constants
 *
 * Defaults for every tunable the engine exposes. Runtime values come from
 * ConfigurationManager; these are what it falls back to.
 */

/**
 * Persisted Layout
 */
export const STORAGE_CONFIG = {
  /**
   * Bump whenever the snapshot table layout or metadata record changes.
   * A different value invalidates every existing snapshot.
   */
  SCHEMA_VERSION: 1,

  /** Default cache root, relative to the working directory */
  DEFAULT_CACHE_DIR: '.qctx/cache',

  /** Default log directory, relative to the working directory */
  DEFAULT_LOG_DIR: '.qctx/logs',

  /** Suffix of the per-collection metadata record */
  METADATA_SUFFIX: '.meta.json',

  /** Prefix of snapshot database files */
  SNAPSHOT_PREFIX: 'snapshot-',

  /** File holding cached query embeddings */
  QUERY_CACHE_FILE: 'query-embeddings.db'
} as const;

/**
 * Approximate Index Configuration
 */
export const ANN_CONFIG = {
  /**
   * Smallest collection that gets an inverted-file index. Below this the
   * partitioning has too few points per centroid and exact scan is used.
   */
  DEFAULT_MIN_CARDINALITY: 256,

  /** Partitions probed per query */
  DEFAULT_NPROBE: 8,

  /** k-means iteration cap */
  MAX_KMEANS_ITERATIONS: 10
} as const;

/**
 * Embedding Call Configuration
 */
export const EMBEDDING_CONFIG = {
  DEFAULT_BATCH_SIZE: 64,
  DEFAULT_CONCURRENCY: 4,

  /** Per provider call (in ms) */
  DEFAULT_TIMEOUT_MS: 30000,

  /** Vector width of the hashing adapter */
  DEFAULT_HASHING_DIMENSIONS: 1024,

  DEFAULT_TRANSFORMERS_MODEL: 'Xenova/bge-small-en-v1.5'
} as const;

/**
 * Retrieval Configuration
 */
export const RETRIEVAL_CONFIG = {
  /**
   * Results scoring below this are dropped. 0 keeps every match with
   * non-negative similarity; raise it per deployment once scores for the
   * chosen model are known.
   */
  DEFAULT_MIN_SCORE: 0,

  /** Example queries handed to the query generator */
  EXAMPLE_QUERY_LIMIT: 3,

  /** Field metadata entries handed to the query generator */
  FIELD_METADATA_LIMIT: 10,

  /** Query embeddings kept before least-recently-used eviction */
  QUERY_CACHE_MAX_ENTRIES: 10000
} as const;

/**
 * Corpus Freshness
 */
export const CORPUS_CONFIG = {
  /** Field metadata older than this is reported as due for refresh */
  DEFAULT_FIELD_METADATA_MAX_AGE_DAYS: 7
} as const;
