/**
 * Sitemap
 *
 * Entry point for collaborators: holds one item store and one
 * configuration, renders documents and hands them to a writer.
 *
 * Instances are not meant to be shared between concurrent requests; give
 * each render its own Sitemap.
 */

import { join } from 'node:path';
import { SitemapConfig } from '../config/sitemap-config.js';
import type { SitemapConfigInput } from '../config/config.schemas.js';
import { ItemStore } from '../model/item-store.js';
import type {
  GoogleNewsMeta,
  ItemInput,
  SitemapAlternate,
  SitemapEntry,
  SitemapImage,
  SitemapTranslation,
  SitemapVideo,
} from '../model/item.types.js';
import { compress, injectStylesheet, stylesheetOverhead } from '../output/output-finalizer.js';
import { escaperFor } from '../renderer/render-context.js';
import { getRenderer, isXmlFamily } from '../renderer/renderer-registry.js';
import { applySizeLimit, byteLength, limitsFor } from '../renderer/size-limiter.js';
import type { RenderContext, SitemapFormat } from '../renderer/types.js';
import { renderSitemapIndex } from '../renderer/xml-renderer.js';
import { ErrorCode, SitemapError } from '../shared/errors/index.js';
import { getLogger, type Logger } from '../shared/services/logging.service.js';
import { FileSystemSitemapWriter, type SitemapWriter } from '../storage/sitemap-writer.js';

/**
 * Collaborators a Sitemap can be given.
 */
export interface SitemapOptions {
  /** Persistence collaborator for `store` (default: local filesystem) */
  writer?: SitemapWriter;

  /** Time source for generated index entries (default: `new Date()`) */
  clock?: () => Date;

  logger?: Logger;
}

/**
 * One finished document.
 */
export interface RenderedDocument {
  /** File name without extension, e.g. `sitemap` or `sitemap-2` */
  name: string;
  format: SitemapFormat;
  content: string;
}

export class Sitemap {
  private readonly model = new ItemStore();
  private config: SitemapConfig;
  private readonly writer: SitemapWriter;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  /**
   * @throws ValidationError if a plain configuration input is invalid
   */
  constructor(config: SitemapConfig | SitemapConfigInput = {}, options: SitemapOptions = {}) {
    this.config = config instanceof SitemapConfig ? config : new SitemapConfig(config);
    this.writer = options.writer ?? new FileSystemSitemapWriter();
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? getLogger();
  }

  getConfig(): SitemapConfig {
    return this.config;
  }

  setConfig(config: SitemapConfig): this {
    this.config = config;
    return this;
  }

  /**
   * The live item store, for collaborators that need raw items.
   */
  getModel(): ItemStore {
    return this.model;
  }

  /**
   * Add one item from positional arguments.
   */
  add(
    loc: string,
    lastmod?: string,
    priority?: string,
    freq?: string,
    images: SitemapImage[] = [],
    title?: string,
    translations: SitemapTranslation[] = [],
    videos: SitemapVideo[] = [],
    googlenews?: GoogleNewsMeta,
    alternates: SitemapAlternate[] = [],
  ): this {
    this.model.addItem({
      loc,
      lastmod,
      priority,
      freq,
      images,
      title,
      translations,
      videos,
      googlenews,
      alternates,
    });
    return this;
  }

  /**
   * Add one item, or several in order.
   *
   * @throws ItemValidationError when an item has no `loc`
   */
  addItem(input: ItemInput | ItemInput[]): this {
    if (Array.isArray(input)) {
      this.model.addItems(input);
    } else {
      this.model.addItem(input);
    }
    return this;
  }

  /**
   * Add a child-sitemap entry; renders then produce index documents.
   */
  addSitemap(loc: string, lastmod?: string): this {
    this.model.addSitemap(lastmod === undefined ? { loc } : { loc, lastmod });
    return this;
  }

  resetSitemaps(sitemaps: readonly SitemapEntry[] = []): this {
    this.model.resetSitemaps(sitemaps);
    return this;
  }

  /**
   * Render a finished document. When the XML render had to be split, this
   * is the index referencing the parts; use `renderDocuments` for all of them.
   *
   * @param format - format name; unknown names throw FormatError
   * @param style - XSL stylesheet href, injected into XML documents when styles are enabled
   */
  render(format: string = this.config.getDefaultFormat(), style?: string): string {
    return this.renderDocuments(format, style)[0].content;
  }

  /**
   * Alias of `render`.
   */
  generate(format: string = this.config.getDefaultFormat(), style?: string): string {
    return this.render(format, style);
  }

  /**
   * Gzipped `render` output.
   *
   * @throws CompressionError if compression fails
   */
  renderCompressed(format: string = this.config.getDefaultFormat(), style?: string): Buffer {
    return compress(this.render(format, style));
  }

  /**
   * Render every document for a format: the single document, or the index
   * followed by each part when the size limit split the urlset.
   */
  renderDocuments(
    format: string = this.config.getDefaultFormat(),
    style?: string,
    name = 'sitemap',
  ): RenderedDocument[] {
    const renderer = getRenderer(format);
    const context = this.createContext();
    const stylesheet = this.stylesheetFor(renderer.format, style);
    const finalize = (content: string): string =>
      stylesheet ? injectStylesheet(content, stylesheet) : content;

    if (renderer.format === 'xml' && this.config.isLimitSizeEnabled() && !this.model.isIndex()) {
      const reserved = stylesheet ? stylesheetOverhead(stylesheet) : 0;
      const result = applySizeLimit(context, limitsFor(this.config.getMaxSize(), reserved));

      if (result.was_split) {
        const parts = result.documents.map((content, i): RenderedDocument => ({
          name: `${name}-${i + 1}`,
          format: 'xml',
          content: finalize(content),
        }));
        const lastmod = this.clock().toISOString();
        const entries = parts.map((part) => ({ loc: this.partLocation(part.name), lastmod }));
        const index = renderSitemapIndex(entries, escaperFor(context));

        this.logger.info('Sitemap split into multiple documents', {
          items: this.model.countItems(),
          documents: parts.length,
          original_bytes: result.original_bytes,
          max_size: this.config.getMaxSize(),
        });

        return [{ name, format: 'xml', content: finalize(index) }, ...parts];
      }

      return [{ name, format: 'xml', content: finalize(result.documents[0]) }];
    }

    const content = finalize(renderer.render(context));
    this.logger.debug('Rendered sitemap', {
      format: renderer.format,
      items: this.model.countItems(),
      sitemaps: this.model.countSitemaps(),
      bytes: byteLength(content),
    });
    return [{ name, format: renderer.format, content }];
  }

  /**
   * Render and hand the bytes to the writer at `path/filename.format`
   * (plus `.gz` when gzip is enabled). Split parts are written beside the
   * index as `filename-N.xml`.
   *
   * @returns whether every write succeeded
   * @throws SitemapError (`WRITE_FAILED` unless the writer raised a SitemapError itself)
   */
  store(
    format: string = this.config.getDefaultFormat(),
    filename = 'sitemap',
    path: string = process.cwd(),
    style?: string,
  ): boolean {
    const renderer = getRenderer(format);
    const suffix = `.${renderer.format}`;
    const stem = filename.endsWith(suffix) ? filename.slice(0, -suffix.length) : filename;
    const gzip = this.config.isGzipEnabled();

    let ok = true;
    for (const document of this.renderDocuments(renderer.format, style, stem)) {
      const filePath = join(path, `${document.name}${suffix}${gzip ? '.gz' : ''}`);
      const data = gzip ? compress(document.content) : document.content;
      ok = this.write(filePath, data) && ok;
      this.logger.debug('Stored sitemap document', { filePath, gzip });
    }
    return ok;
  }

  private write(filePath: string, data: string | Buffer): boolean {
    try {
      return this.writer.write(filePath, data);
    } catch (error) {
      const failure =
        error instanceof SitemapError
          ? error
          : SitemapError.fromError(
              error instanceof Error ? error : new Error(String(error)),
              ErrorCode.WRITE_FAILED,
            );
      const { code, severity, details } = failure.toStructured();
      this.logger.error('Failed to store sitemap document', failure, {
        filePath,
        code,
        severity,
        details,
      });
      throw failure;
    }
  }

  private createContext(): RenderContext {
    return {
      items: this.model.getItems(),
      sitemaps: this.model.getSitemaps(),
      config: this.config,
      logger: this.logger,
    };
  }

  private stylesheetFor(format: SitemapFormat, style: string | undefined): string | undefined {
    if (!style || !this.config.areStylesEnabled() || !isXmlFamily(format)) {
      return undefined;
    }
    return style;
  }

  /**
   * Public location of a split part: under `domain` when configured,
   * otherwise relative to the index.
   */
  private partLocation(name: string): string {
    const file = `${name}.xml${this.config.isGzipEnabled() ? '.gz' : ''}`;
    const domain = this.config.getDomain();
    if (!domain) {
      return file;
    }
    return new URL(file, domain.endsWith('/') ? domain : `${domain}/`).toString();
  }
}
