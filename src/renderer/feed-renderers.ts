/**
 * Feed Renderers
 *
 * RSS 2.0 and RDF (RSS 1.0) views of the item list. Both carry only the
 * URL, a label and the modification date.
 */

import { INDENT, NAMESPACES, XML_DECLARATION } from './constants.js';
import { escaperFor, labelOf, normalizeItems } from './render-context.js';
import { element } from './section-renderers.js';
import type { FormatRenderer, RenderContext } from './types.js';

/**
 * RFC 822 date for RSS `pubDate`.
 */
function toRfc822(lastmod: string): string {
  return new Date(lastmod).toUTCString();
}

export const rssRenderer: FormatRenderer = {
  format: 'rss',
  contentType: 'application/rss+xml',
  render(context: RenderContext): string {
    const esc = escaperFor(context);
    const items = normalizeItems(context);
    const site = context.config.getDomain() ?? '';
    const l2 = INDENT.repeat(2);
    const l3 = INDENT.repeat(3);

    const lines = [XML_DECLARATION, '<rss version="2.0">', `${INDENT}<channel>`];
    lines.push(element(l2, 'title', esc(site)));
    lines.push(element(l2, 'link', esc(site)));
    lines.push(element(l2, 'description', 'Sitemap'));

    for (const normalized of items) {
      const loc = esc(normalized.item.loc);
      lines.push(`${l2}<item>`);
      lines.push(element(l3, 'title', esc(labelOf(normalized))));
      lines.push(element(l3, 'link', loc));
      lines.push(element(l3, 'guid', loc));
      if (normalized.lastmod) lines.push(element(l3, 'pubDate', toRfc822(normalized.lastmod)));
      lines.push(`${l2}</item>`);
    }

    lines.push(`${INDENT}</channel>`, '</rss>');
    return lines.join('\n');
  },
};

export const rdfRenderer: FormatRenderer = {
  format: 'rdf',
  contentType: 'application/rdf+xml',
  render(context: RenderContext): string {
    const esc = escaperFor(context);
    const items = normalizeItems(context);
    const site = esc(context.config.getDomain() ?? '');
    const l2 = INDENT.repeat(2);
    const l3 = INDENT.repeat(3);
    const l4 = INDENT.repeat(4);

    const lines = [
      XML_DECLARATION,
      `<rdf:RDF xmlns:rdf="${NAMESPACES.rdf}" xmlns="${NAMESPACES.rss1}" xmlns:dc="${NAMESPACES.dc}">`,
      `${INDENT}<channel rdf:about="${site}">`,
      element(l2, 'title', site),
      element(l2, 'link', site),
      element(l2, 'description', 'Sitemap'),
      `${l2}<items>`,
      `${l3}<rdf:Seq>`,
    ];
    for (const normalized of items) {
      lines.push(`${l4}<rdf:li rdf:resource="${esc(normalized.item.loc)}"/>`);
    }
    lines.push(`${l3}</rdf:Seq>`, `${l2}</items>`, `${INDENT}</channel>`);

    for (const normalized of items) {
      const loc = esc(normalized.item.loc);
      lines.push(`${INDENT}<item rdf:about="${loc}">`);
      lines.push(element(l2, 'title', esc(labelOf(normalized))));
      lines.push(element(l2, 'link', loc));
      if (normalized.lastmod) lines.push(element(l2, 'dc:date', esc(normalized.lastmod)));
      lines.push(`${INDENT}</item>`);
    }

    lines.push('</rdf:RDF>');
    return lines.join('\n');
  },
};
