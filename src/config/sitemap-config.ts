/**
 * Sitemap Configuration
 *
 * Validated settings controlling rendering. Every value is checked when the
 * object is built and again on each setter; invalid values are rejected,
 * never clamped.
 */

import type { ZodError } from 'zod';
import { ValidationError } from '../shared/errors/index.js';
import type { SitemapFormat } from '../renderer/types.js';
import {
  SitemapConfigSchema,
  type SitemapConfigInput,
  type SitemapConfigRecord,
  type SitemapConfigValues,
} from './config.schemas.js';

function toValidationError(error: ZodError): ValidationError {
  const issues = error.issues.map((issue) => ({
    option: issue.path.join('.'),
    message: issue.message,
  }));
  const summary = issues.map((i) => `${i.option}: ${i.message}`).join('; ');
  return new ValidationError(`Invalid sitemap configuration: ${summary}`, { issues });
}

export class SitemapConfig {
  private values: SitemapConfigValues;

  /**
   * @throws ValidationError if any option is invalid
   */
  constructor(input: SitemapConfigInput = {}) {
    const result = SitemapConfigSchema.safeParse(input);
    if (!result.success) {
      throw toValidationError(result.error);
    }
    this.values = result.data;
  }

  /**
   * Build from a snake_case record (`use_cache`, `max_size`, ...).
   */
  static fromObject(record: SitemapConfigRecord): SitemapConfig {
    const input: Record<string, unknown> = {
      escaping: record.escaping,
      useCache: record.use_cache,
      cachePath: record.cache_path,
      useLimitSize: record.use_limit_size,
      maxSize: record.max_size,
      useGzip: record.use_gzip,
      useStyles: record.use_styles,
      domain: record.domain,
      strictMode: record.strict_mode,
      defaultFormat: record.default_format,
    };
    const result = SitemapConfigSchema.safeParse(input);
    if (!result.success) {
      throw toValidationError(result.error);
    }
    return new SitemapConfig(result.data);
  }

  /**
   * Export as a snake_case record.
   */
  toObject(): Required<SitemapConfigRecord> {
    const v = this.values;
    return {
      escaping: v.escaping,
      use_cache: v.useCache,
      cache_path: v.cachePath,
      use_limit_size: v.useLimitSize,
      max_size: v.maxSize,
      use_gzip: v.useGzip,
      use_styles: v.useStyles,
      domain: v.domain,
      strict_mode: v.strictMode,
      default_format: v.defaultFormat,
    };
  }

  /**
   * Snapshot of the current values.
   */
  toValues(): Readonly<SitemapConfigValues> {
    return { ...this.values };
  }

  /**
   * Re-validate the whole option set with the patch applied.
   */
  private apply(patch: Partial<Record<keyof SitemapConfigValues, unknown>>): this {
    const result = SitemapConfigSchema.safeParse({ ...this.values, ...patch });
    if (!result.success) {
      throw toValidationError(result.error);
    }
    this.values = result.data;
    return this;
  }

  isEscaping(): boolean {
    return this.values.escaping;
  }

  setEscaping(escaping: boolean): this {
    return this.apply({ escaping });
  }

  isCacheEnabled(): boolean {
    return this.values.useCache;
  }

  setUseCache(useCache: boolean): this {
    return this.apply({ useCache });
  }

  getCachePath(): string | null {
    return this.values.cachePath;
  }

  setCachePath(cachePath: string | null): this {
    return this.apply({ cachePath });
  }

  isLimitSizeEnabled(): boolean {
    return this.values.useLimitSize;
  }

  setUseLimitSize(useLimitSize: boolean): this {
    return this.apply({ useLimitSize });
  }

  /**
   * Maximum document size in bytes.
   */
  getMaxSize(): number {
    return this.values.maxSize;
  }

  setMaxSize(maxSize: number): this {
    return this.apply({ maxSize });
  }

  isGzipEnabled(): boolean {
    return this.values.useGzip;
  }

  setUseGzip(useGzip: boolean): this {
    return this.apply({ useGzip });
  }

  areStylesEnabled(): boolean {
    return this.values.useStyles;
  }

  setUseStyles(useStyles: boolean): this {
    return this.apply({ useStyles });
  }

  getDomain(): string | null {
    return this.values.domain;
  }

  setDomain(domain: string | null): this {
    return this.apply({ domain });
  }

  isStrictMode(): boolean {
    return this.values.strictMode;
  }

  setStrictMode(strictMode: boolean): this {
    return this.apply({ strictMode });
  }

  getDefaultFormat(): SitemapFormat {
    return this.values.defaultFormat;
  }

  /**
   * Accepts any string so callers can pass through untrusted values;
   * anything outside the known formats is rejected.
   */
  setDefaultFormat(defaultFormat: string): this {
    return this.apply({ defaultFormat });
  }
}
