/**
 * Error Codes
 *
 * Stable identifiers for every failure the sitemap core can raise.
 */

/**
 * Machine-readable error codes
 */
export enum ErrorCode {
  // Configuration
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Rendering
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',

  // Items
  MISSING_LOC = 'MISSING_LOC',
  INVALID_URL = 'INVALID_URL',
  INVALID_PRIORITY = 'INVALID_PRIORITY',
  INVALID_FREQUENCY = 'INVALID_FREQUENCY',
  INVALID_LASTMOD = 'INVALID_LASTMOD',

  // Size limits
  ITEM_TOO_LARGE = 'ITEM_TOO_LARGE',

  // Output
  COMPRESSION_FAILED = 'COMPRESSION_FAILED',
  WRITE_FAILED = 'WRITE_FAILED',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Severity attached to an error
 */
export enum ErrorSeverity {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}
