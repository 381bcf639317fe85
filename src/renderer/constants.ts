/**
 * Renderer Constants
 *
 * Formats, namespaces and protocol limits for sitemap rendering.
 */

/**
 * Every format the core can render. Closed set.
 */
export const SITEMAP_FORMATS = ['xml', 'txt', 'html', 'rss', 'rdf', 'google-news'] as const;

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/**
 * XML namespaces used by the sitemap family and the feed formats.
 */
export const NAMESPACES = {
  sitemap: 'http://www.sitemaps.org/schemas/sitemap/0.9',
  image: 'http://www.google.com/schemas/sitemap-image/1.1',
  video: 'http://www.google.com/schemas/sitemap-video/1.1',
  xhtml: 'http://www.w3.org/1999/xhtml',
  news: 'http://www.google.com/schemas/sitemap-news/0.9',
  rdf: 'http://www.w3.org/1999/02/22-rdf-syntax-ns#',
  rss1: 'http://purl.org/rss/1.0/',
  dc: 'http://purl.org/dc/elements/1.1/',
} as const;

/** Protocol ceiling on URLs per sitemap document */
export const MAX_URLS_PER_SITEMAP = 50_000;

/** Indentation unit for every rendered document */
export const INDENT = '  ';
