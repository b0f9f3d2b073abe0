/**
 * Application Constants
 *
 * Centralized location for all magic numbers and configuration constants.
 */

/**
 * Every supported game draws this many numbers
 */
export const NUMBERS_PER_DRAW = 6;

/**
 * Pagination limits for the REST API
 */
export const PAGINATION = {
  /** Default page size for historical results */
  RESULTS_DEFAULT_LIMIT: 50,

  /** Maximum page size for historical results and predictions */
  MAX_LIMIT: 100,

  /** Default number of predictions returned */
  PREDICTIONS_DEFAULT_LIMIT: 10,

  /** Default and maximum number of accuracy records returned */
  ACCURACY_DEFAULT_LIMIT: 100,
  ACCURACY_MAX_LIMIT: 1000,
} as const;

/**
 * Statistics view sizes
 */
export const STATISTICS = {
  /** Length of the hot, cold and overdue lists served by the API */
  TOP_N: 20,
} as const;

/**
 * Batch sizes for bulk database work
 */
export const BATCH = {
  /** Rows per multi-row INSERT */
  INSERT_ROWS: 500,

  /** Ids per DELETE in the duplicate removal job */
  DELETE_IDS: 100,
} as const;

/**
 * Service health check configuration
 */
export const HEALTH_CHECK = {
  /** Maximum retries for service health checks */
  MAX_RETRIES: 30,

  /** Delay between retries (2 seconds) */
  RETRY_DELAY_MS: 2000,

  /** Connection timeout for health checks (1 second) */
  CONNECTION_TIMEOUT_MS: 1000,
} as const;
