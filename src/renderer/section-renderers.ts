/**
 * Section Renderers
 *
 * Extension blocks emitted inside a sitemap `<url>` element: images,
 * videos, alternate links and Google News metadata. Each returns the block's
 * lines, already indented for a `<url>` child.
 */

import type {
  GoogleNewsMeta,
  SitemapAlternate,
  SitemapImage,
  SitemapItem,
  SitemapTranslation,
  SitemapVideo,
} from '../model/item.types.js';
import { INDENT } from './constants.js';
import type { Escaper } from './types.js';

const CHILD = INDENT.repeat(2);
const GRANDCHILD = INDENT.repeat(3);
const GREAT_GRANDCHILD = INDENT.repeat(4);

/**
 * `<tag>text</tag>` at the given indentation.
 */
export function element(indent: string, tag: string, text: string): string {
  return `${indent}<${tag}>${text}</${tag}>`;
}

/**
 * Render `<image:image>` blocks.
 */
export function renderImageBlocks(images: readonly SitemapImage[], esc: Escaper): string[] {
  const lines: string[] = [];
  for (const image of images) {
    lines.push(`${CHILD}<image:image>`);
    lines.push(element(GRANDCHILD, 'image:loc', esc(image.url)));
    if (image.title) lines.push(element(GRANDCHILD, 'image:title', esc(image.title)));
    if (image.caption) lines.push(element(GRANDCHILD, 'image:caption', esc(image.caption)));
    lines.push(`${CHILD}</image:image>`);
  }
  return lines;
}

/**
 * Render `<video:video>` blocks, children in protocol order.
 */
export function renderVideoBlocks(videos: readonly SitemapVideo[], esc: Escaper): string[] {
  const lines: string[] = [];
  for (const video of videos) {
    lines.push(`${CHILD}<video:video>`);
    lines.push(element(GRANDCHILD, 'video:thumbnail_loc', esc(video.thumbnail_loc)));
    lines.push(element(GRANDCHILD, 'video:title', esc(video.title)));
    lines.push(element(GRANDCHILD, 'video:description', esc(video.description)));
    if (video.content_loc) {
      lines.push(element(GRANDCHILD, 'video:content_loc', esc(video.content_loc)));
    }
    if (video.player_loc) {
      lines.push(element(GRANDCHILD, 'video:player_loc', esc(video.player_loc)));
    }
    if (video.duration !== undefined) {
      lines.push(element(GRANDCHILD, 'video:duration', String(Math.round(video.duration))));
    }
    if (video.rating !== undefined) {
      lines.push(element(GRANDCHILD, 'video:rating', video.rating.toFixed(1)));
    }
    if (video.view_count !== undefined) {
      lines.push(element(GRANDCHILD, 'video:view_count', String(Math.round(video.view_count))));
    }
    if (video.publication_date) {
      lines.push(element(GRANDCHILD, 'video:publication_date', esc(video.publication_date)));
    }
    if (video.family_friendly !== undefined) {
      lines.push(element(GRANDCHILD, 'video:family_friendly', video.family_friendly ? 'yes' : 'no'));
    }
    for (const tag of video.tags ?? []) {
      lines.push(element(GRANDCHILD, 'video:tag', esc(tag)));
    }
    lines.push(`${CHILD}</video:video>`);
  }
  return lines;
}

/**
 * Render `<xhtml:link rel="alternate">` elements: translations first, then
 * alternates.
 */
export function renderAlternateLinks(
  translations: readonly SitemapTranslation[],
  alternates: readonly SitemapAlternate[],
  esc: Escaper,
): string[] {
  const links = [
    ...translations.map((t) => ({ hreflang: t.lang, url: t.url })),
    ...alternates.map((a) => ({ hreflang: a.hreflang, url: a.url })),
  ];
  return links.map(
    (link) =>
      `${CHILD}<xhtml:link rel="alternate" hreflang="${esc(link.hreflang)}" href="${esc(link.url)}"/>`,
  );
}

/**
 * Render the `<news:news>` block.
 *
 * @param title - article title; the page URL stands in when absent
 */
export function renderNewsBlock(news: GoogleNewsMeta, title: string, esc: Escaper): string[] {
  const lines: string[] = [];
  lines.push(`${CHILD}<news:news>`);
  lines.push(`${GRANDCHILD}<news:publication>`);
  lines.push(element(GREAT_GRANDCHILD, 'news:name', esc(news.sitename)));
  lines.push(element(GREAT_GRANDCHILD, 'news:language', esc(news.language)));
  lines.push(`${GRANDCHILD}</news:publication>`);
  if (news.access) lines.push(element(GRANDCHILD, 'news:access', esc(news.access)));
  if (news.genres) lines.push(element(GRANDCHILD, 'news:genres', esc(news.genres)));
  lines.push(element(GRANDCHILD, 'news:publication_date', esc(news.publication_date)));
  lines.push(element(GRANDCHILD, 'news:title', esc(title)));
  if (news.keywords) lines.push(element(GRANDCHILD, 'news:keywords', esc(news.keywords)));
  lines.push(`${CHILD}</news:news>`);
  return lines;
}

/**
 * Namespace prefix of a sitemap extension.
 */
export type ExtensionPrefix = 'image' | 'video' | 'xhtml' | 'news';

/**
 * Extension namespaces an item needs.
 */
export function namespacesOf(item: SitemapItem): ExtensionPrefix[] {
  const prefixes: ExtensionPrefix[] = [];
  if (item.images.length > 0) prefixes.push('image');
  if (item.videos.length > 0) prefixes.push('video');
  if (item.translations.length > 0 || item.alternates.length > 0) prefixes.push('xhtml');
  if (item.googlenews) prefixes.push('news');
  return prefixes;
}
