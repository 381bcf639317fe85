/**
 * Sitemap rendering core
 *
 * Builds sitemap, sitemap index, news, feed, HTML and text documents from
 * page items.
 */

export { Sitemap, type SitemapOptions, type RenderedDocument } from './sitemap/sitemap.js';

// Configuration
export { SitemapConfig } from './config/sitemap-config.js';
export {
  SitemapConfigSchema,
  DEFAULT_MAX_SIZE,
  type SitemapConfigInput,
  type SitemapConfigRecord,
  type SitemapConfigValues,
} from './config/config.schemas.js';

// Data model
export { ItemStore } from './model/item-store.js';
export { normalizeItem, normalizeEntry, type NormalizedItem } from './model/item-validator.js';
export {
  CHANGE_FREQUENCIES,
  type ChangeFreq,
  type GoogleNewsMeta,
  type ItemInput,
  type SitemapAlternate,
  type SitemapEntry,
  type SitemapImage,
  type SitemapItem,
  type SitemapTranslation,
  type SitemapVideo,
} from './model/item.types.js';

// Rendering
export * from './renderer/index.js';

// Output
export { compress, injectStylesheet, stylesheetInstruction } from './output/output-finalizer.js';
export {
  FileSystemSitemapWriter,
  MemorySitemapWriter,
  type SitemapWriter,
} from './storage/sitemap-writer.js';

// Errors and logging
export * from './shared/errors/index.js';
export {
  LoggingService,
  getLogger,
  setLogger,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './shared/services/logging.service.js';
