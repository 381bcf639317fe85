/**
 * Item Store
 *
 * Ordered, append-only collections of page items and child-sitemap
 * entries. One store per Sitemap instance; nothing is shared.
 */

import { ErrorCode, ItemValidationError } from '../shared/errors/index.js';
import type { ItemInput, SitemapEntry, SitemapItem } from './item.types.js';

export class ItemStore {
  private readonly items: SitemapItem[] = [];
  private sitemaps: SitemapEntry[] = [];

  /**
   * Append one item. Only `loc` is checked here.
   *
   * @throws ItemValidationError when `loc` is missing or empty
   */
  addItem(input: ItemInput): void {
    if (typeof input.loc !== 'string' || input.loc.trim() === '') {
      throw new ItemValidationError('Item loc cannot be empty', ErrorCode.MISSING_LOC);
    }

    this.items.push({
      ...input,
      images: input.images ?? [],
      videos: input.videos ?? [],
      translations: input.translations ?? [],
      alternates: input.alternates ?? [],
    });
  }

  /**
   * Append several items in order.
   */
  addItems(inputs: readonly ItemInput[]): void {
    for (const input of inputs) {
      this.addItem(input);
    }
  }

  getItems(): readonly SitemapItem[] {
    return this.items;
  }

  countItems(): number {
    return this.items.length;
  }

  addSitemap(entry: SitemapEntry): void {
    if (typeof entry.loc !== 'string' || entry.loc.trim() === '') {
      throw new ItemValidationError('Sitemap loc cannot be empty', ErrorCode.MISSING_LOC);
    }
    this.sitemaps.push({ ...entry });
  }

  getSitemaps(): readonly SitemapEntry[] {
    return this.sitemaps;
  }

  countSitemaps(): number {
    return this.sitemaps.length;
  }

  /**
   * Replace the whole list of child-sitemap entries.
   */
  resetSitemaps(sitemaps: readonly SitemapEntry[] = []): void {
    this.sitemaps = sitemaps.map((entry) => ({ ...entry }));
  }

  /**
   * Whether renders should produce an index document.
   */
  isIndex(): boolean {
    return this.sitemaps.length > 0;
  }
}
