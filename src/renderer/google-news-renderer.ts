/**
 * Google News Renderer
 *
 * News sitemap: only items carrying a `googlenews` record are emitted.
 */

import { INDENT, NAMESPACES, XML_DECLARATION } from './constants.js';
import { escaperFor, normalizeItems } from './render-context.js';
import { element, renderNewsBlock } from './section-renderers.js';
import type { FormatRenderer, RenderContext } from './types.js';

export const googleNewsRenderer: FormatRenderer = {
  format: 'google-news',
  contentType: 'application/xml',
  render(context: RenderContext): string {
    const esc = escaperFor(context);
    const lines = [
      XML_DECLARATION,
      `<urlset xmlns="${NAMESPACES.sitemap}" xmlns:news="${NAMESPACES.news}">`,
    ];

    for (const normalized of normalizeItems(context)) {
      const { item } = normalized;
      if (!item.googlenews) continue;

      lines.push(`${INDENT}<url>`);
      lines.push(element(INDENT.repeat(2), 'loc', esc(item.loc)));
      lines.push(...renderNewsBlock(item.googlenews, item.title || item.loc, esc));
      lines.push(`${INDENT}</url>`);
    }

    lines.push('</urlset>');
    return lines.join('\n');
  },
};
