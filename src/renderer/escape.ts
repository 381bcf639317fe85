/**
 * XML escaping
 */

import type { Escaper } from './types.js';

const XML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

/**
 * Replace the five reserved XML characters with entities.
 */
export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => XML_ENTITIES[ch] ?? ch);
}

/**
 * Escaper honouring the `escaping` option: raw text when disabled.
 */
export function createEscaper(enabled: boolean): Escaper {
  return enabled ? escapeXml : (value) => value;
}
