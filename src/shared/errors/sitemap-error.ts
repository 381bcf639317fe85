/**
 * Sitemap Error Types
 *
 * Structured error types raised by configuration, rendering and output.
 */

import { ErrorCode, ErrorSeverity } from './error-codes.js';

/**
 * Base sitemap error
 *
 * Extends Error with a code, a severity and optional details.
 */
export class SitemapError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    public readonly severity: ErrorSeverity = ErrorSeverity.ERROR,
    public readonly details?: Record<string, unknown>,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'SitemapError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SitemapError);
    }
  }

  /**
   * Convert to a plain structured object (for logs and collaborators)
   */
  toStructured(): {
    error: string;
    code: ErrorCode;
    severity: ErrorSeverity;
    details?: Record<string, unknown>;
    stack?: string;
  } {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      details: this.details,
      stack: this.stack,
    };
  }

  /**
   * Create from standard Error
   */
  static fromError(
    error: Error,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.ERROR,
  ): SitemapError {
    return new SitemapError(error.message, code, severity, undefined, error);
  }
}

/**
 * Domain-specific error classes
 */

/** Invalid configuration value, raised on construction or mutation. */
export class ValidationError extends SitemapError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.INVALID_CONFIG, ErrorSeverity.ERROR, details);
    this.name = 'ValidationError';
  }
}

/** Unknown output format requested. */
export class FormatError extends SitemapError {
  constructor(format: string, supported: readonly string[]) {
    super(
      `Unsupported format: ${format}. Supported formats are: ${supported.join(', ')}`,
      ErrorCode.UNSUPPORTED_FORMAT,
      ErrorSeverity.ERROR,
      { format },
    );
    this.name = 'FormatError';
  }
}

export class ItemValidationError extends SitemapError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_URL,
    details?: Record<string, unknown>,
  ) {
    super(message, code, ErrorSeverity.ERROR, details);
    this.name = 'ItemValidationError';
  }
}

/** A single entry is larger than an entire document may be. */
export class SizeLimitError extends SitemapError {
  constructor(loc: string, bytes: number, maxSize: number) {
    super(
      `Entry for ${loc} needs ${bytes} bytes, which exceeds maxSize ${maxSize} on its own`,
      ErrorCode.ITEM_TOO_LARGE,
      ErrorSeverity.ERROR,
      { loc, bytes, maxSize },
    );
    this.name = 'SizeLimitError';
  }
}

export class CompressionError extends SitemapError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.COMPRESSION_FAILED, ErrorSeverity.ERROR, undefined, cause);
    this.name = 'CompressionError';
  }
}

/** Persistence failure (the IO error kind). */
export class StorageError extends SitemapError {
  constructor(message: string, filePath: string, cause?: Error) {
    super(message, ErrorCode.WRITE_FAILED, ErrorSeverity.ERROR, { filePath }, cause);
    this.name = 'StorageError';
  }
}
