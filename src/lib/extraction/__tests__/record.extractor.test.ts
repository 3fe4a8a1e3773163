/**
 * Record Extractor & Cheerio Locator Tests
 */

import { CheerioFieldLocator, parseSelector } from '../cheerio.locator';
import { RecordExtractor } from '../record.extractor';
import { FetchedPage, FieldLocator } from '../extraction.types';

const page = (html: string, url = 'http://x.test/item/42'): FetchedPage => ({ url, html, statusCode: 200 });

describe('parseSelector', () => {
  it('should split ::attr(name)', () => {
    expect(parseSelector('meta[name="description"]::attr(content)')).toEqual({
      css: 'meta[name="description"]',
      mode: { kind: 'attr', name: 'content' },
    });
  });

  it('should split ::text', () => {
    expect(parseSelector('h1.title::text')).toEqual({ css: 'h1.title', mode: { kind: 'ownText' } });
  });

  it('should default to full text', () => {
    expect(parseSelector(' div.desc ')).toEqual({ css: 'div.desc', mode: { kind: 'text' } });
  });
});

describe('CheerioFieldLocator', () => {
  const locator = new CheerioFieldLocator();
  const html = `
    <h1>Pop <small>beta</small>2024</h1>
    <meta name="description" content="Population figures">
    <ul><li>one</li><li> </li><li>two</li><li>three</li></ul>`;

  it('should read full text by default', () => {
    expect(locator.locate('h1', page(html))).toBe('Pop beta2024');
  });

  it('should read only direct text nodes with ::text', () => {
    expect(locator.locate('h1::text', page(html))).toBe('Pop 2024');
  });

  it('should read attributes with ::attr()', () => {
    expect(locator.locate('meta[name="description"]::attr(content)', page(html))).toBe('Population figures');
  });

  it('should return null when nothing matches', () => {
    expect(locator.locate('h2', page(html))).toBeNull();
  });

  it('should skip blank values and stop at the limit', () => {
    expect(locator.locateAll('li', page(html), 2)).toEqual(['one', 'two']);
  });
});

describe('RecordExtractor', () => {
  const selectors = { title: 'h1', description: '.desc', tags: '.tags a' };

  it('should extract title, description, url and tags', () => {
    const extractor = new RecordExtractor(new CheerioFieldLocator(), { maxTags: 5 });
    const html = '<h1>Pop 2024</h1><p class="desc">Census</p><div class="tags"><a>people</a><a>census</a></div>';

    expect(extractor.extract(page(html), selectors)).toEqual({
      title: 'Pop 2024',
      description: 'Census',
      url: 'http://x.test/item/42',
      tags: ['people', 'census'],
    });
  });

  it('should leave description absent and tags empty when missing', () => {
    const extractor = new RecordExtractor(new CheerioFieldLocator(), { maxTags: 5 });

    expect(extractor.extract(page('<h1>Pop 2024</h1>'), selectors)).toEqual({
      title: 'Pop 2024',
      description: undefined,
      url: 'http://x.test/item/42',
      tags: [],
    });
  });

  it('should abstain when the title is missing or blank', () => {
    const extractor = new RecordExtractor(new CheerioFieldLocator(), { maxTags: 5 });

    expect(extractor.extract(page('<p class="desc">Only a description</p>'), selectors)).toBeNull();
    expect(extractor.extract(page('<h1>   </h1>'), selectors)).toBeNull();
  });

  it('should read at most maxTags tag candidates', () => {
    const extractor = new RecordExtractor(new CheerioFieldLocator(), { maxTags: 2 });
    const html = '<h1>Pop 2024</h1><div class="tags"><a>a</a><a>b</a><a>c</a></div>';

    expect(extractor.extract(page(html), selectors)?.tags).toEqual(['a', 'b']);
  });

  it('should resolve every field through the given locator', () => {
    const locator: FieldLocator = {
      locate: jest.fn((selector: string) => (selector === 'h1' ? 'From locator' : null)),
      locateAll: jest.fn(() => ['x']),
    };
    const extractor = new RecordExtractor(locator, { maxTags: 3 });

    expect(extractor.extract(page('<html></html>'), selectors)).toEqual({
      title: 'From locator',
      description: undefined,
      url: 'http://x.test/item/42',
      tags: ['x'],
    });
    expect(locator.locateAll).toHaveBeenCalledWith('.tags a', expect.objectContaining({ url: 'http://x.test/item/42' }), 3);
  });
});
