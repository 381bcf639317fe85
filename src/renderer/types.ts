/**
 * Renderer Types
 *
 * Shared contract for the format renderers.
 */

import type { SitemapConfig } from '../config/sitemap-config.js';
import type { SitemapEntry, SitemapItem } from '../model/item.types.js';
import type { Logger } from '../shared/services/logging.service.js';
import type { SITEMAP_FORMATS } from './constants.js';

/**
 * Output format name.
 */
export type SitemapFormat = (typeof SITEMAP_FORMATS)[number];

/**
 * Everything a renderer reads. Renderers never mutate it.
 */
export interface RenderContext {
  items: readonly SitemapItem[];
  sitemaps: readonly SitemapEntry[];
  config: SitemapConfig;
  /** Receives warnings about fields dropped in lenient mode */
  logger?: Logger;
}

/**
 * One output format.
 */
export interface FormatRenderer {
  readonly format: SitemapFormat;

  /** MIME type, for response collaborators */
  readonly contentType: string;

  /**
   * Render the whole document. Pure: identical context, identical output.
   *
   * @throws ItemValidationError in strict mode when an item field is invalid
   */
  render(context: RenderContext): string;
}

/**
 * Escapes (or passes through) caller-supplied text.
 */
export type Escaper = (value: string) => string;
