/**
 * Item field schemas
 *
 * Zod schemas for the item fields whose validity is decided at render time.
 */

import { z } from 'zod';
import { CHANGE_FREQUENCIES } from './item.types.js';

export const ChangeFreqSchema = z.enum(CHANGE_FREQUENCIES);

/**
 * Decimal string between 0.0 and 1.0 inclusive.
 */
export const PrioritySchema = z
  .string()
  .regex(/^\d+(\.\d+)?$/, 'Priority must be a decimal number')
  .refine((value) => Number(value) >= 0 && Number(value) <= 1, {
    message: 'Priority must be between 0.0 and 1.0',
  });

/**
 * Any string `Date.parse` understands (ISO 8601 in practice).
 */
export const LastmodSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), {
    message: 'Invalid date format, use ISO 8601',
  });

/**
 * Absolute http(s) URL.
 */
export const HttpUrlSchema = z
  .string()
  .min(1, 'URL cannot be empty')
  .url('Invalid URL format')
  .refine((value) => /^https?:\/\//i.test(value), {
    message: 'URL must use http or https scheme',
  });
