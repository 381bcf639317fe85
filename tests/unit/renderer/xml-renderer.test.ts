import { describe, it, expect } from 'vitest';
import { XMLParser } from 'fast-xml-parser';
import { SitemapConfig } from '../../../src/config/sitemap-config.js';
import { normalizeItem } from '../../../src/model/item-validator.js';
import { escapeXml } from '../../../src/renderer/escape.js';
import {
  collectNamespaces,
  renderUrlEntry,
  urlsetOpenTag,
  wrapUrlset,
  xmlRenderer,
} from '../../../src/renderer/xml-renderer.js';
import { ItemValidationError } from '../../../src/shared/errors/index.js';
import { countOccurrences, createContext, createHomeAndAbout } from '../../helpers/test-utils.js';

const SITEMAP_NS = 'http://www.sitemaps.org/schemas/sitemap/0.9';

describe('XML Renderer', () => {
  describe('urlset', () => {
    it('should render the two-page example exactly', () => {
      const output = xmlRenderer.render(createContext(createHomeAndAbout()));

      expect(output).toBe(
        [
          '<?xml version="1.0" encoding="UTF-8"?>',
          `<urlset xmlns="${SITEMAP_NS}">`,
          '  <url>',
          '    <loc>https://example.com/</loc>',
          '    <changefreq>daily</changefreq>',
          '    <priority>1.0</priority>',
          '  </url>',
          '  <url>',
          '    <loc>https://example.com/about</loc>',
          '    <changefreq>monthly</changefreq>',
          '    <priority>0.8</priority>',
          '  </url>',
          '</urlset>',
        ].join('\n'),
      );
    });

    it('should render an empty urlset when there are no items', () => {
      expect(xmlRenderer.render(createContext([]))).toBe(
        ['<?xml version="1.0" encoding="UTF-8"?>', `<urlset xmlns="${SITEMAP_NS}">`, '</urlset>'].join(
          '\n',
        ),
      );
    });

    it('should emit lastmod before changefreq and priority', () => {
      const output = xmlRenderer.render(
        createContext([
          { loc: 'https://example.com/', lastmod: '2024-01-15', freq: 'weekly', priority: '0.5' },
        ]),
      );

      expect(output).toContain(
        [
          '    <loc>https://example.com/</loc>',
          '    <lastmod>2024-01-15</lastmod>',
          '    <changefreq>weekly</changefreq>',
          '    <priority>0.5</priority>',
        ].join('\n'),
      );
    });

    it('should render image and alternate blocks with their namespaces', () => {
      const output = xmlRenderer.render(
        createContext([
          {
            loc: 'https://example.com/',
            images: [{ url: 'https://example.com/a.png', title: 'A & B' }],
            translations: [{ lang: 'fr', url: 'https://example.com/fr/' }],
            alternates: [{ hreflang: 'de', url: 'https://example.com/de/' }],
          },
        ]),
      );

      expect(output).toBe(
        [
          '<?xml version="1.0" encoding="UTF-8"?>',
          `<urlset xmlns="${SITEMAP_NS}" xmlns:image="http://www.google.com/schemas/sitemap-image/1.1" xmlns:xhtml="http://www.w3.org/1999/xhtml">`,
          '  <url>',
          '    <loc>https://example.com/</loc>',
          '    <image:image>',
          '      <image:loc>https://example.com/a.png</image:loc>',
          '      <image:title>A &amp; B</image:title>',
          '    </image:image>',
          '    <xhtml:link rel="alternate" hreflang="fr" href="https://example.com/fr/"/>',
          '    <xhtml:link rel="alternate" hreflang="de" href="https://example.com/de/"/>',
          '  </url>',
          '</urlset>',
        ].join('\n'),
      );
    });

    it('should render video blocks in protocol order', () => {
      const output = xmlRenderer.render(
        createContext([
          {
            loc: 'https://example.com/watch',
            videos: [
              {
                thumbnail_loc: 'https://example.com/t.jpg',
                title: 'Clip',
                description: 'Short',
                content_loc: 'https://example.com/v.mp4',
                duration: 120.4,
                rating: 4,
                view_count: 10,
                family_friendly: false,
                tags: ['a', 'b'],
              },
            ],
          },
        ]),
      );

      expect(output).toContain('xmlns:video="http://www.google.com/schemas/sitemap-video/1.1"');
      expect(output).toContain(
        [
          '    <video:video>',
          '      <video:thumbnail_loc>https://example.com/t.jpg</video:thumbnail_loc>',
          '      <video:title>Clip</video:title>',
          '      <video:description>Short</video:description>',
          '      <video:content_loc>https://example.com/v.mp4</video:content_loc>',
          '      <video:duration>120</video:duration>',
          '      <video:rating>4.0</video:rating>',
          '      <video:view_count>10</video:view_count>',
          '      <video:family_friendly>no</video:family_friendly>',
          '      <video:tag>a</video:tag>',
          '      <video:tag>b</video:tag>',
          '    </video:video>',
        ].join('\n'),
      );
    });

    it('should render the news block after the other extensions', () => {
      const output = xmlRenderer.render(
        createContext([
          {
            loc: 'https://example.com/story',
            title: 'Headline',
            images: [{ url: 'https://example.com/s.png' }],
            googlenews: {
              sitename: 'Example Times',
              language: 'en',
              publication_date: '2024-01-15',
              keywords: 'x, y',
            },
          },
        ]),
      );

      expect(output).toContain(
        [
          '    </image:image>',
          '    <news:news>',
          '      <news:publication>',
          '        <news:name>Example Times</news:name>',
          '        <news:language>en</news:language>',
          '      </news:publication>',
          '      <news:publication_date>2024-01-15</news:publication_date>',
          '      <news:title>Headline</news:title>',
          '      <news:keywords>x, y</news:keywords>',
          '    </news:news>',
          '  </url>',
        ].join('\n'),
      );
    });

    it('should not emit extension namespaces for plain items', () => {
      const output = xmlRenderer.render(createContext(createHomeAndAbout()));

      expect(output).not.toContain('xmlns:image');
      expect(output).not.toContain('<image:image>');
      expect(output).not.toContain('<news:news>');
      expect(output).not.toContain('<xhtml:link');
    });
  });

  describe('escaping', () => {
    const loc = 'https://example.com/search?q=a&b=<c>';

    it('should substitute entities when escaping is enabled', () => {
      const output = xmlRenderer.render(createContext([{ loc }]));
      expect(output).toContain('<loc>https://example.com/search?q=a&amp;b=&lt;c&gt;</loc>');
    });

    it('should recover the original loc when parsed', () => {
      const output = xmlRenderer.render(createContext([{ loc }]));
      const parsed: unknown = new XMLParser().parse(output);

      expect(parsed).toMatchObject({ urlset: { url: { loc } } });
    });

    it('should emit raw text when escaping is disabled', () => {
      const output = xmlRenderer.render(
        createContext([{ loc }], new SitemapConfig({ escaping: false })),
      );
      expect(output).toContain(`<loc>${loc}</loc>`);
    });

    it('should escape quotes and apostrophes', () => {
      expect(escapeXml(`"it's"`)).toBe('&quot;it&apos;s&quot;');
    });
  });

  describe('validation', () => {
    it('should omit an out-of-range priority in lenient mode', () => {
      const output = xmlRenderer.render(
        createContext([
          { loc: 'https://example.com/a', priority: '1.2', freq: 'daily' },
          { loc: 'https://example.com/b', priority: '0.3' },
        ]),
      );

      expect(countOccurrences(output, '<priority>')).toBe(1);
      expect(output).toContain('<priority>0.3</priority>');
      expect(output).toContain('<changefreq>daily</changefreq>');
    });

    it('should fail the whole render in strict mode', () => {
      const context = createContext(
        [{ loc: 'https://example.com/a', freq: 'fortnightly' }],
        new SitemapConfig({ strictMode: true }),
      );

      expect(() => xmlRenderer.render(context)).toThrow(ItemValidationError);
    });
  });

  describe('sitemap index', () => {
    it('should render an index instead of a urlset when entries exist', () => {
      const output = xmlRenderer.render(
        createContext(createHomeAndAbout(), new SitemapConfig(), [
          { loc: 'https://example.com/sitemap-posts.xml', lastmod: '2024-01-01' },
          { loc: 'https://example.com/sitemap-pages.xml' },
        ]),
      );

      expect(output).toBe(
        [
          '<?xml version="1.0" encoding="UTF-8"?>',
          `<sitemapindex xmlns="${SITEMAP_NS}">`,
          '  <sitemap>',
          '    <loc>https://example.com/sitemap-posts.xml</loc>',
          '    <lastmod>2024-01-01</lastmod>',
          '  </sitemap>',
          '  <sitemap>',
          '    <loc>https://example.com/sitemap-pages.xml</loc>',
          '  </sitemap>',
          '</sitemapindex>',
        ].join('\n'),
      );
    });
  });

  describe('building blocks', () => {
    it('should collect namespaces in a fixed order', () => {
      const context = createContext([
        { loc: 'https://example.com/a', alternates: [{ hreflang: 'en', url: 'https://example.com/a' }] },
        { loc: 'https://example.com/b', images: [{ url: 'https://example.com/b.png' }] },
      ]);
      const items = context.items.map((i) => normalizeItem(i, { strict: false }));

      expect(collectNamespaces(items)).toEqual(['image', 'xhtml']);
    });

    it('should declare requested namespaces on the urlset tag', () => {
      expect(urlsetOpenTag(['news'])).toBe(
        `<urlset xmlns="${SITEMAP_NS}" xmlns:news="http://www.google.com/schemas/sitemap-news/0.9">`,
      );
    });

    it('should assemble a document from rendered entries', () => {
      const [item] = createContext([{ loc: 'https://example.com/' }]).items;
      const entry = renderUrlEntry(normalizeItem(item, { strict: false }), escapeXml);

      expect(entry).toBe(['  <url>', '    <loc>https://example.com/</loc>', '  </url>'].join('\n'));
      expect(wrapUrlset([entry], [])).toBe(
        [
          '<?xml version="1.0" encoding="UTF-8"?>',
          `<urlset xmlns="${SITEMAP_NS}">`,
          entry,
          '</urlset>',
        ].join('\n'),
      );
    });
  });
});
