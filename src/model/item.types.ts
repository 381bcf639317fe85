/**
 * Sitemap Item Types
 *
 * Records accepted by the item store. Only `loc` is required up front;
 * everything else is optional and rendered by the formats that support it.
 */

/**
 * Change frequency values defined by the sitemap protocol.
 */
export const CHANGE_FREQUENCIES = [
  'always',
  'hourly',
  'daily',
  'weekly',
  'monthly',
  'yearly',
  'never',
] as const;

export type ChangeFreq = (typeof CHANGE_FREQUENCIES)[number];

/**
 * Image attached to a page (image sitemap extension).
 */
export interface SitemapImage {
  url: string;
  title?: string;
  caption?: string;
}

/**
 * Video attached to a page (video sitemap extension).
 *
 * One of `content_loc` or `player_loc` should be present.
 */
export interface SitemapVideo {
  thumbnail_loc: string;
  title: string;
  description: string;
  content_loc?: string;
  player_loc?: string;
  /** Length in seconds */
  duration?: number;
  rating?: number;
  view_count?: number;
  publication_date?: string;
  tags?: string[];
  family_friendly?: boolean;
}

/**
 * Language variant of a page.
 */
export interface SitemapTranslation {
  lang: string;
  url: string;
}

/**
 * Protocol-level alternate link.
 */
export interface SitemapAlternate {
  hreflang: string;
  url: string;
}

/**
 * Google News metadata for an article page.
 */
export interface GoogleNewsMeta {
  sitename: string;
  language: string;
  access?: string;
  genres?: string;
  publication_date: string;
  keywords?: string;
}

/**
 * Item as supplied by callers.
 *
 * `priority` and `freq` accept any string; they are checked at render time,
 * strictly or leniently depending on configuration.
 */
export interface ItemInput {
  loc: string;
  lastmod?: string;
  priority?: string;
  freq?: ChangeFreq | (string & {});
  title?: string;
  images?: SitemapImage[];
  videos?: SitemapVideo[];
  translations?: SitemapTranslation[];
  alternates?: SitemapAlternate[];
  googlenews?: GoogleNewsMeta;
}

/**
 * Item as held by the store: list fields always present.
 */
export interface SitemapItem extends ItemInput {
  images: SitemapImage[];
  videos: SitemapVideo[];
  translations: SitemapTranslation[];
  alternates: SitemapAlternate[];
}

/**
 * Child sitemap reference used by index documents.
 */
export interface SitemapEntry {
  loc: string;
  lastmod?: string;
}
