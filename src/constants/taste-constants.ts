/**
 * Taste store constants
 *
 * Centralizes the magic numbers of the feedback transition, retrieval
 * defaults, and store defaults.
 */

/**
 * Feedback transition factors
 */
export const FEEDBACK_RULES = {
  /** Multiplier applied to amount on "more" */
  MORE_FACTOR: 1.1,

  /** Multiplier applied to amount on "less" */
  LESS_FACTOR: 0.9,

  /** Increment applied to feedback_weight on "perfect" */
  PERFECT_WEIGHT_INCREMENT: 1.0,
} as const;

/**
 * Retrieval defaults
 */
export const RETRIEVAL_DEFAULTS = {
  /** Similarity threshold for search results */
  MIN_SCORE: 0.6,

  /** Candidates per search query */
  TOP_K: 5,

  /** Candidates inspected when locating a feedback target */
  FEEDBACK_CANDIDATES: 5,

  /** Queries slower than this are logged (ms) */
  SLOW_QUERY_THRESHOLD_MS: 250,
} as const;

/**
 * Record defaults applied by the codec
 */
export const RECORD_DEFAULTS = {
  UNIT: '',
  FEEDBACK_WEIGHT: 1.0,
} as const;

/**
 * Store and process defaults
 */
export const STORE_DEFAULTS = {
  DB_PATH: '.tastestore/taste.db',
  LOG_DIR: '.tastestore/logs',
  NAMESPACE: '',
  EMBEDDING_MODEL: 'all-MiniLM-L6-v2',
  EMBEDDING_DIMENSIONS: 384,

  /** Entries per upsert call during batch ingestion */
  UPSERT_BATCH_SIZE: 100,
} as const;

/**
 * Neutral phrases used when stored metadata is missing a display field
 */
export const DISPLAY_DEFAULTS = {
  INGREDIENT: 'an ingredient',
  AMOUNT: 'a specific amount',
  SERVINGS: 'an unspecified number of',
  CUISINE: 'a specific',
} as const;
