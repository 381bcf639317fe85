/**
 * Item Validator
 *
 * Render-time validation of item fields. Strict mode throws on the first
 * bad field; lenient mode drops the field from that item and carries on.
 */

import type { ZodType } from 'zod';
import { ErrorCode, ItemValidationError } from '../shared/errors/index.js';
import type { Logger } from '../shared/services/logging.service.js';
import {
  ChangeFreqSchema,
  HttpUrlSchema,
  LastmodSchema,
  PrioritySchema,
} from './item.schemas.js';
import type { ChangeFreq, SitemapEntry, SitemapItem } from './item.types.js';

/**
 * Item with its render-time fields checked and formatted.
 */
export interface NormalizedItem {
  item: SitemapItem;
  lastmod?: string;
  /** Formatted with one decimal digit, e.g. `0.8` */
  priority?: string;
  freq?: ChangeFreq;
}

export interface ValidationOptions {
  strict: boolean;
  logger?: Logger;
}

/**
 * Round a validated decimal string to one digit, half up, without going
 * through binary floating point (`0.85` becomes `0.9`).
 */
export function formatPriority(priority: string): string {
  const [whole, fraction = ''] = priority.split('.');
  let tenths = Number(whole) * 10 + Number(fraction.charAt(0) || '0');
  if (Number(fraction.charAt(1) || '0') >= 5) {
    tenths += 1;
  }
  return `${Math.floor(tenths / 10)}.${tenths % 10}`;
}

/**
 * Check a single optional field. Returns the parsed value, or undefined when
 * the field is absent or (in lenient mode) invalid.
 */
function checkField<T>(
  schema: ZodType<T>,
  value: string | undefined,
  field: string,
  code: ErrorCode,
  loc: string,
  options: ValidationOptions,
): T | undefined {
  if (value === undefined) return undefined;

  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const reason = result.error.issues[0]?.message ?? 'invalid value';
  if (options.strict) {
    throw new ItemValidationError(`Invalid ${field} for ${loc}: ${value} (${reason})`, code, {
      loc,
      field,
      value,
    });
  }

  options.logger?.warning(`Dropping invalid ${field}`, { loc, field, value, reason });
  return undefined;
}

/**
 * Strict-mode only: the URL must be absolute http(s).
 */
function assertUrl(url: string, field: string): void {
  const result = HttpUrlSchema.safeParse(url);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? 'invalid URL';
    throw new ItemValidationError(`${reason}: ${url}`, ErrorCode.INVALID_URL, {
      field,
      value: url,
    });
  }
}

/**
 * Validate and normalize one item for rendering.
 *
 * @throws ItemValidationError in strict mode
 */
export function normalizeItem(item: SitemapItem, options: ValidationOptions): NormalizedItem {
  if (options.strict) {
    assertUrl(item.loc, 'loc');
    for (const image of item.images) {
      assertUrl(image.url, 'images.url');
    }
  }

  const lastmod = checkField(
    LastmodSchema,
    item.lastmod,
    'lastmod',
    ErrorCode.INVALID_LASTMOD,
    item.loc,
    options,
  );
  const priority = checkField(
    PrioritySchema,
    item.priority,
    'priority',
    ErrorCode.INVALID_PRIORITY,
    item.loc,
    options,
  );
  const freq = checkField(
    ChangeFreqSchema,
    item.freq,
    'freq',
    ErrorCode.INVALID_FREQUENCY,
    item.loc,
    options,
  );

  return {
    item,
    lastmod,
    priority: priority === undefined ? undefined : formatPriority(priority),
    freq,
  };
}

/**
 * Validate and normalize one child-sitemap entry for rendering.
 */
export function normalizeEntry(entry: SitemapEntry, options: ValidationOptions): SitemapEntry {
  if (options.strict) {
    assertUrl(entry.loc, 'loc');
  }

  const lastmod = checkField(
    LastmodSchema,
    entry.lastmod,
    'lastmod',
    ErrorCode.INVALID_LASTMOD,
    entry.loc,
    options,
  );

  return lastmod === undefined ? { loc: entry.loc } : { loc: entry.loc, lastmod };
}
