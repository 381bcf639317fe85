import { describe, it, expect } from 'vitest';
import { SITEMAP_FORMATS } from '../../../src/renderer/constants.js';
import { getRenderer, isSitemapFormat, isXmlFamily } from '../../../src/renderer/renderer-registry.js';
import { ErrorCode, FormatError } from '../../../src/shared/errors/index.js';
import { createContext } from '../../helpers/test-utils.js';

describe('Renderer Registry', () => {
  it('should resolve a renderer for every supported format', () => {
    for (const format of SITEMAP_FORMATS) {
      expect(getRenderer(format).format).toBe(format);
    }
  });

  it('should render a loc-only item in every format', () => {
    const context = createContext([{ loc: 'https://example.com/' }]);

    for (const format of SITEMAP_FORMATS) {
      if (format === 'google-news') continue;
      expect(getRenderer(format).render(context)).toContain('https://example.com/');
    }
  });

  it('should throw FormatError for an unknown format', () => {
    expect(() => getRenderer('json')).toThrow(FormatError);
    expect(() => getRenderer('json')).toThrow(
      'Unsupported format: json. Supported formats are: xml, txt, html, rss, rdf, google-news',
    );
  });

  it('should not match inherited object keys', () => {
    expect(isSitemapFormat('toString')).toBe(false);
    expect(isSitemapFormat('constructor')).toBe(false);
  });

  it('should carry the unsupported format in error details', () => {
    try {
      getRenderer('pdf');
      expect.fail('Expected FormatError');
    } catch (error) {
      expect(error).toBeInstanceOf(FormatError);
      expect(error).toMatchObject({ code: ErrorCode.UNSUPPORTED_FORMAT, details: { format: 'pdf' } });
    }
  });

  it('should classify xml and google-news as XML documents', () => {
    expect(isXmlFamily('xml')).toBe(true);
    expect(isXmlFamily('google-news')).toBe(true);
    expect(isXmlFamily('rss')).toBe(false);
    expect(isXmlFamily('txt')).toBe(false);
  });
});
