/**
 * Renderer Registry
 *
 * Maps each format name to its renderer. Adding a format means adding an
 * entry here.
 */

import { FormatError } from '../shared/errors/index.js';
import { SITEMAP_FORMATS } from './constants.js';
import { rdfRenderer, rssRenderer } from './feed-renderers.js';
import { googleNewsRenderer } from './google-news-renderer.js';
import { htmlRenderer } from './html-renderer.js';
import { txtRenderer } from './txt-renderer.js';
import type { FormatRenderer, SitemapFormat } from './types.js';
import { xmlRenderer } from './xml-renderer.js';

const RENDERERS: Record<SitemapFormat, FormatRenderer> = {
  xml: xmlRenderer,
  txt: txtRenderer,
  html: htmlRenderer,
  rss: rssRenderer,
  rdf: rdfRenderer,
  'google-news': googleNewsRenderer,
};

export function isSitemapFormat(value: string): value is SitemapFormat {
  return Object.prototype.hasOwnProperty.call(RENDERERS, value);
}

/**
 * Look up the renderer for a format name.
 *
 * @throws FormatError for unknown names; there is no fallback format
 */
export function getRenderer(format: string): FormatRenderer {
  if (!isSitemapFormat(format)) {
    throw new FormatError(format, SITEMAP_FORMATS);
  }
  return RENDERERS[format];
}

/**
 * Formats whose documents are XML (stylesheet injection applies).
 */
export function isXmlFamily(format: SitemapFormat): boolean {
  return format === 'xml' || format === 'google-news';
}
