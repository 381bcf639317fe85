/**
 * Renderer Module
 *
 * Format renderers, escaping and size limiting.
 */

export { getRenderer, isSitemapFormat, isXmlFamily } from './renderer-registry.js';

export { xmlRenderer, renderUrlset, renderSitemapIndex, renderUrlEntry } from './xml-renderer.js';
export { rssRenderer, rdfRenderer } from './feed-renderers.js';
export { googleNewsRenderer } from './google-news-renderer.js';
export { htmlRenderer } from './html-renderer.js';
export { txtRenderer } from './txt-renderer.js';

export { escapeXml, createEscaper } from './escape.js';

// Size limiting
export {
  applySizeLimit,
  partitionItems,
  limitsFor,
  isWithinLimits,
  byteLength,
  type SizeLimits,
  type SplitResult,
} from './size-limiter.js';

// Constants
export { SITEMAP_FORMATS, NAMESPACES, MAX_URLS_PER_SITEMAP, XML_DECLARATION } from './constants.js';

// Types
export type { SitemapFormat, FormatRenderer, RenderContext, Escaper } from './types.js';
