/**
 * Render Context helpers
 *
 * Render-time validation and escaping shared by every renderer.
 */

import { normalizeEntry, normalizeItem, type NormalizedItem } from '../model/item-validator.js';
import type { SitemapEntry } from '../model/item.types.js';
import { createEscaper } from './escape.js';
import type { Escaper, RenderContext } from './types.js';

/**
 * Validate every item (strict or lenient per config), preserving order.
 */
export function normalizeItems(context: RenderContext): NormalizedItem[] {
  const options = { strict: context.config.isStrictMode(), logger: context.logger };
  return context.items.map((item) => normalizeItem(item, options));
}

export function normalizeEntries(context: RenderContext): SitemapEntry[] {
  const options = { strict: context.config.isStrictMode(), logger: context.logger };
  return context.sitemaps.map((entry) => normalizeEntry(entry, options));
}

export function escaperFor(context: RenderContext): Escaper {
  return createEscaper(context.config.isEscaping());
}

/**
 * Display label for feed and HTML formats: the title, or the URL.
 */
export function labelOf(normalized: NormalizedItem): string {
  return normalized.item.title || normalized.item.loc;
}
