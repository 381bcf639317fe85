/**
 * Sitemap configuration schemas
 *
 * Zod schemas for runtime validation and type inference of the
 * configuration options.
 */

import { z } from 'zod';
import { SITEMAP_FORMATS } from '../renderer/constants.js';

/** 10 MiB */
export const DEFAULT_MAX_SIZE = 10 * 1024 * 1024;

export const SitemapFormatSchema = z.enum(SITEMAP_FORMATS);

export const SitemapConfigSchema = z.object({
  escaping: z.boolean().default(true).describe('Escape reserved XML characters in output'),
  useCache: z.boolean().default(false).describe('Hint for an external cache collaborator'),
  cachePath: z.string().nullable().default(null).describe('Hint for an external cache collaborator'),
  useLimitSize: z.boolean().default(false).describe('Split XML sitemaps that exceed protocol limits'),
  maxSize: z
    .number()
    .int('maxSize must be an integer')
    .positive('maxSize must be greater than 0')
    .default(DEFAULT_MAX_SIZE)
    .describe('Maximum document size in bytes'),
  useGzip: z.boolean().default(false).describe('Gzip stored documents'),
  useStyles: z.boolean().default(true).describe('Inject XSL stylesheet references'),
  domain: z.string().url('Invalid domain').nullable().default(null).describe('Base URL of the site'),
  strictMode: z.boolean().default(false).describe('Fail renders on invalid item fields'),
  defaultFormat: SitemapFormatSchema.default('xml').describe('Format used when none is requested'),
});

/** Fully resolved configuration values */
export type SitemapConfigValues = z.output<typeof SitemapConfigSchema>;

/** Constructor input: every option optional */
export type SitemapConfigInput = z.input<typeof SitemapConfigSchema>;

/**
 * Snake-case record form, as found in configuration files.
 */
export interface SitemapConfigRecord {
  escaping?: boolean;
  use_cache?: boolean;
  cache_path?: string | null;
  use_limit_size?: boolean;
  max_size?: number;
  use_gzip?: boolean;
  use_styles?: boolean;
  domain?: string | null;
  strict_mode?: boolean;
  default_format?: string;
}
