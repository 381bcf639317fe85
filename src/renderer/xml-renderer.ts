/**
 * XML Renderer
 *
 * Renders the sitemap protocol documents: `<urlset>` for page items and
 * `<sitemapindex>` for child-sitemap entries.
 */

import type { NormalizedItem } from '../model/item-validator.js';
import type { SitemapEntry } from '../model/item.types.js';
import { INDENT, NAMESPACES, XML_DECLARATION } from './constants.js';
import { escaperFor, normalizeEntries, normalizeItems } from './render-context.js';
import {
  element,
  namespacesOf,
  renderAlternateLinks,
  renderImageBlocks,
  renderNewsBlock,
  renderVideoBlocks,
  type ExtensionPrefix,
} from './section-renderers.js';
import type { Escaper, FormatRenderer, RenderContext } from './types.js';

const EXTENSION_ORDER: readonly ExtensionPrefix[] = ['image', 'video', 'xhtml', 'news'];

/**
 * Extension prefixes used by any of the items, in a fixed order.
 */
export function collectNamespaces(items: readonly NormalizedItem[]): ExtensionPrefix[] {
  const used = new Set<ExtensionPrefix>();
  for (const normalized of items) {
    for (const prefix of namespacesOf(normalized.item)) used.add(prefix);
  }
  return EXTENSION_ORDER.filter((prefix) => used.has(prefix));
}

/**
 * Opening `<urlset>` tag declaring the given extension namespaces.
 */
export function urlsetOpenTag(prefixes: readonly ExtensionPrefix[]): string {
  const attrs = [`xmlns="${NAMESPACES.sitemap}"`];
  for (const prefix of prefixes) {
    attrs.push(`xmlns:${prefix}="${NAMESPACES[prefix]}"`);
  }
  return `<urlset ${attrs.join(' ')}>`;
}

/**
 * Render one `<url>` element.
 */
export function renderUrlEntry(normalized: NormalizedItem, esc: Escaper): string {
  const { item } = normalized;
  const child = INDENT.repeat(2);
  const lines: string[] = [`${INDENT}<url>`];

  lines.push(element(child, 'loc', esc(item.loc)));
  if (normalized.lastmod) lines.push(element(child, 'lastmod', esc(normalized.lastmod)));
  if (normalized.freq) lines.push(element(child, 'changefreq', normalized.freq));
  if (normalized.priority) lines.push(element(child, 'priority', normalized.priority));

  lines.push(...renderImageBlocks(item.images, esc));
  lines.push(...renderVideoBlocks(item.videos, esc));
  lines.push(...renderAlternateLinks(item.translations, item.alternates, esc));
  if (item.googlenews) {
    lines.push(...renderNewsBlock(item.googlenews, item.title || item.loc, esc));
  }

  lines.push(`${INDENT}</url>`);
  return lines.join('\n');
}

/**
 * Assemble a urlset document from already-rendered `<url>` entries.
 */
export function wrapUrlset(
  entries: readonly string[],
  prefixes: readonly ExtensionPrefix[],
): string {
  const parts = [XML_DECLARATION, urlsetOpenTag(prefixes), ...entries, '</urlset>'];
  return parts.join('\n');
}

/**
 * Render a complete `<urlset>` document.
 */
export function renderUrlset(items: readonly NormalizedItem[], esc: Escaper): string {
  return wrapUrlset(
    items.map((normalized) => renderUrlEntry(normalized, esc)),
    collectNamespaces(items),
  );
}

/**
 * Render a complete `<sitemapindex>` document.
 */
export function renderSitemapIndex(entries: readonly SitemapEntry[], esc: Escaper): string {
  const child = INDENT.repeat(2);
  const lines = [XML_DECLARATION, `<sitemapindex xmlns="${NAMESPACES.sitemap}">`];

  for (const entry of entries) {
    lines.push(`${INDENT}<sitemap>`);
    lines.push(element(child, 'loc', esc(entry.loc)));
    if (entry.lastmod) lines.push(element(child, 'lastmod', esc(entry.lastmod)));
    lines.push(`${INDENT}</sitemap>`);
  }

  lines.push('</sitemapindex>');
  return lines.join('\n');
}

/**
 * Sitemap protocol renderer: index when child entries exist, urlset otherwise.
 */
export const xmlRenderer: FormatRenderer = {
  format: 'xml',
  contentType: 'application/xml',
  render(context: RenderContext): string {
    const esc = escaperFor(context);
    if (context.sitemaps.length > 0) {
      return renderSitemapIndex(normalizeEntries(context), esc);
    }
    return renderUrlset(normalizeItems(context), esc);
  },
};
