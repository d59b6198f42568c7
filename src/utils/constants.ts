/**
 * Centralized constants for timeouts, limits, and defaults.
 */

/** Timeout values in milliseconds */
export const TIMEOUTS = {
  /** Job budget when neither the job nor the configuration sets one (GitHub's 360 minutes) */
  DEFAULT_JOB_TIMEOUT_MS: 360 * 60 * 1000,
  /** Default base delay for retry backoff */
  DEFAULT_RETRY_BASE_DELAY_MS: 1000,
} as const;

/** Limit values for various operations */
export const LIMITS = {
  /** Default number of job instances running at once */
  DEFAULT_MAX_PARALLEL: 4,
  /** Maximum bytes of stdout/stderr kept per step */
  MAX_CAPTURED_OUTPUT_BYTES: 2 * 1024 * 1024,
  /** Maximum length of a single log line before it is split */
  MAX_LOG_LINE_LENGTH: 64 * 1024,
  /** Maximum length of an expression template */
  MAX_TEMPLATE_LENGTH: 10_000,
  /** Maximum nesting depth for expressions */
  MAX_EXPRESSION_DEPTH: 50,
  /** Maximum combinations one matrix may expand into (GitHub's limit) */
  MAX_MATRIX_COMBINATIONS: 256,
} as const;

export const MINUTE_MS = 60_000;
