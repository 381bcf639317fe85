/**
 * Output Finalizer
 *
 * Post-render steps: XSL stylesheet injection and gzip compression.
 */

import { gzipSync } from 'node:zlib';
import { CompressionError } from '../shared/errors/index.js';
import { XML_DECLARATION } from '../renderer/constants.js';
import { escapeXml } from '../renderer/escape.js';

/**
 * `<?xml-stylesheet?>` processing instruction for an XSL file.
 */
export function stylesheetInstruction(href: string): string {
  return `<?xml-stylesheet type="text/xsl" href="${escapeXml(href)}"?>`;
}

/**
 * Insert the stylesheet instruction right after the XML declaration, or at
 * the top of documents that have none.
 */
export function injectStylesheet(document: string, href: string): string {
  const instruction = stylesheetInstruction(href);
  if (document.startsWith(XML_DECLARATION)) {
    return `${XML_DECLARATION}\n${instruction}${document.slice(XML_DECLARATION.length)}`;
  }
  return `${instruction}\n${document}`;
}

/**
 * Bytes `injectStylesheet` adds to a document with an XML declaration.
 */
export function stylesheetOverhead(href: string): number {
  return Buffer.byteLength(`\n${stylesheetInstruction(href)}`, 'utf8');
}

/**
 * Gzip a finished document.
 *
 * @throws CompressionError if zlib fails
 */
export function compress(content: string): Buffer {
  try {
    return gzipSync(Buffer.from(content, 'utf8'));
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new CompressionError(`Failed to gzip sitemap: ${cause.message}`, cause);
  }
}
