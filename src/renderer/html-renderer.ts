/**
 * HTML Renderer
 *
 * Human-browsable listing: a table row per page, or per child sitemap when
 * index entries exist.
 */

import { INDENT } from './constants.js';
import { escaperFor, labelOf, normalizeEntries, normalizeItems } from './render-context.js';
import type { Escaper, FormatRenderer, RenderContext } from './types.js';

function cell(value: string): string {
  return `<td>${value}</td>`;
}

function link(url: string, esc: Escaper): string {
  return `<a href="${esc(url)}">${esc(url)}</a>`;
}

function table(head: string[], rows: string[][]): string[] {
  const l3 = INDENT.repeat(3);
  const lines = [
    `${INDENT}<table>`,
    `${INDENT.repeat(2)}<thead>`,
    `${l3}<tr>${head.map((h) => `<th>${h}</th>`).join('')}</tr>`,
    `${INDENT.repeat(2)}</thead>`,
    `${INDENT.repeat(2)}<tbody>`,
  ];
  for (const row of rows) {
    lines.push(`${l3}<tr>${row.map(cell).join('')}</tr>`);
  }
  lines.push(`${INDENT.repeat(2)}</tbody>`, `${INDENT}</table>`);
  return lines;
}

export const htmlRenderer: FormatRenderer = {
  format: 'html',
  contentType: 'text/html',
  render(context: RenderContext): string {
    const esc = escaperFor(context);

    const body =
      context.sitemaps.length > 0
        ? table(
            ['Sitemap', 'Last modified'],
            normalizeEntries(context).map((entry) => [
              link(entry.loc, esc),
              esc(entry.lastmod ?? ''),
            ]),
          )
        : table(
            ['URL', 'Title', 'Last modified', 'Priority'],
            normalizeItems(context).map((normalized) => [
              link(normalized.item.loc, esc),
              esc(labelOf(normalized)),
              esc(normalized.lastmod ?? ''),
              normalized.priority ?? '',
            ]),
          );

    return [
      '<!DOCTYPE html>',
      '<html lang="en">',
      '<head>',
      `${INDENT}<meta charset="utf-8">`,
      `${INDENT}<title>Sitemap</title>`,
      '</head>',
      '<body>',
      `${INDENT}<h1>Sitemap</h1>`,
      ...body,
      '</body>',
      '</html>',
    ].join('\n');
  },
};
