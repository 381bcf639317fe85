/**
 * Size Limiter
 *
 * Enforces the sitemap protocol ceilings (URL count and byte size) on
 * `<urlset>` documents by splitting them into contiguous groups.
 */

import type { NormalizedItem } from '../model/item-validator.js';
import { SizeLimitError } from '../shared/errors/index.js';
import { MAX_URLS_PER_SITEMAP } from './constants.js';
import { escaperFor, normalizeItems } from './render-context.js';
import type { Escaper, RenderContext } from './types.js';
import { collectNamespaces, renderUrlEntry, renderUrlset, wrapUrlset } from './xml-renderer.js';

/**
 * Ceilings applied to each document.
 */
export interface SizeLimits {
  /** Maximum UTF-8 byte size per document */
  maxBytes: number;

  /** Maximum `<url>` entries per document */
  maxUrls: number;

  /** Bytes that will be added after rendering (e.g. a stylesheet line) */
  reservedBytes: number;
}

/**
 * Result of size limit application.
 */
export interface SplitResult {
  /** Rendered urlset documents, in item order */
  documents: string[];

  /** Was the item list split across several documents? */
  was_split: boolean;

  /** Byte size of the single-document render */
  original_bytes: number;

  /** Number of items in each document */
  item_counts: number[];
}

export function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

/**
 * Limits for a configuration, with room reserved for post-render additions.
 */
export function limitsFor(maxBytes: number, reservedBytes = 0): SizeLimits {
  return { maxBytes, maxUrls: MAX_URLS_PER_SITEMAP, reservedBytes };
}

/**
 * Partition items into the fewest contiguous groups that each fit the limits.
 *
 * Greedy accumulation over exact per-entry byte costs. The envelope is
 * measured with every namespace the full list uses, so a group's real size
 * never exceeds its measured size.
 *
 * @throws SizeLimitError if one entry cannot fit even in an empty document
 */
export function partitionItems(
  items: readonly NormalizedItem[],
  esc: Escaper,
  limits: SizeLimits,
): NormalizedItem[][] {
  const envelope =
    byteLength(wrapUrlset([], collectNamespaces(items))) + limits.reservedBytes;

  const groups: NormalizedItem[][] = [];
  let current: NormalizedItem[] = [];
  let currentBytes = envelope;

  for (const normalized of items) {
    // +1 for the newline joining entries
    const cost = byteLength(renderUrlEntry(normalized, esc)) + 1;

    if (envelope + cost > limits.maxBytes) {
      throw new SizeLimitError(normalized.item.loc, envelope + cost, limits.maxBytes);
    }

    const full = current.length >= limits.maxUrls || currentBytes + cost > limits.maxBytes;
    if (full && current.length > 0) {
      groups.push(current);
      current = [];
      currentBytes = envelope;
    }

    current.push(normalized);
    currentBytes += cost;
  }

  if (current.length > 0) {
    groups.push(current);
  }

  return groups;
}

/**
 * Render the context's items as one or more urlset documents.
 *
 * Strategy:
 * 1. Render the candidate single document
 * 2. If within both ceilings (or empty), return it as-is
 * 3. Otherwise partition and render each group independently
 */
export function applySizeLimit(context: RenderContext, limits: SizeLimits): SplitResult {
  const esc = escaperFor(context);
  const items = normalizeItems(context);

  const candidate = renderUrlset(items, esc);
  const originalBytes = byteLength(candidate);

  // An empty urlset cannot be split further
  const fits =
    items.length <= limits.maxUrls && originalBytes + limits.reservedBytes <= limits.maxBytes;
  if (fits || items.length === 0) {
    return {
      documents: [candidate],
      was_split: false,
      original_bytes: originalBytes,
      item_counts: [items.length],
    };
  }

  const groups = partitionItems(items, esc, limits);

  return {
    documents: groups.map((group) => renderUrlset(group, esc)),
    was_split: groups.length > 1,
    original_bytes: originalBytes,
    item_counts: groups.map((group) => group.length),
  };
}

/**
 * Check if a rendered document is within the limits.
 */
export function isWithinLimits(document: string, urlCount: number, limits: SizeLimits): boolean {
  return (
    urlCount <= limits.maxUrls && byteLength(document) + limits.reservedBytes <= limits.maxBytes
  );
}
