/**
 * TXT Renderer
 *
 * One URL per line. Never escaped.
 */

import { normalizeEntries, normalizeItems } from './render-context.js';
import type { FormatRenderer, RenderContext } from './types.js';

export const txtRenderer: FormatRenderer = {
  format: 'txt',
  contentType: 'text/plain',
  render(context: RenderContext): string {
    if (context.sitemaps.length > 0) {
      return normalizeEntries(context)
        .map((entry) => entry.loc)
        .join('\n');
    }
    return normalizeItems(context)
      .map((normalized) => normalized.item.loc)
      .join('\n');
  },
};
