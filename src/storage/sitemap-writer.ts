/**
 * Sitemap Writer
 *
 * Persistence seam. The core hands finished bytes to a writer; directory
 * handling and I/O errors belong to the writer.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { StorageError } from '../shared/errors/index.js';

export interface SitemapWriter {
  /**
   * Write data to a path.
   *
   * @returns whether the write succeeded
   */
  write(filePath: string, data: string | Buffer): boolean;
}

/**
 * Writes to the local filesystem, creating parent directories.
 */
export class FileSystemSitemapWriter implements SitemapWriter {
  write(filePath: string, data: string | Buffer): boolean {
    try {
      mkdirSync(dirname(filePath), { recursive: true });
      writeFileSync(filePath, data);
      return true;
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new StorageError(`Failed to write sitemap to ${filePath}: ${cause.message}`, filePath, cause);
    }
  }
}

/**
 * Keeps written files in memory. Useful for callers that post-process
 * output, and for tests.
 */
export class MemorySitemapWriter implements SitemapWriter {
  readonly files = new Map<string, string | Buffer>();

  write(filePath: string, data: string | Buffer): boolean {
    this.files.set(filePath, data);
    return true;
  }
}
