/**
 * Record Normalizer Tests
 */

import { createHash } from 'crypto';
import { CrawlErrorCode } from '../../errors/crawl.errors';
import { cleanText } from '../text.processor';
import {
  extractExtension,
  generateContentHash,
  generateHash,
  isValidRecordUrl,
  normalizeRecord,
  processTags,
} from '../record.normalizer';

const sha256 = (input: string): string => createHash('sha256').update(input, 'utf8').digest('hex');

describe('cleanText', () => {
  it('should collapse whitespace, newlines and tabs into single spaces', () => {
    expect(cleanText('  Air\n\tQuality   Index \r\n')).toBe('Air Quality Index');
  });

  it('should strip control characters', () => {
    expect(cleanText('Pop\u0000ulation')).toBe('Population');
  });

  it('should return undefined for empty or blank input', () => {
    expect(cleanText('')).toBeUndefined();
    expect(cleanText(' \n\t ')).toBeUndefined();
    expect(cleanText(undefined)).toBeUndefined();
    expect(cleanText(null)).toBeUndefined();
  });
});

describe('generateHash', () => {
  it('should hash the lower-cased, trimmed URL', () => {
    expect(generateHash('http://x.test/item/42')).toBe(sha256('http://x.test/item/42'));
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(generateHash('  HTTP://X.TEST/Item/42 ')).toBe(generateHash('http://x.test/item/42'));
  });

  it('should differ for different URLs', () => {
    expect(generateHash('http://x.test/item/42')).not.toBe(generateHash('http://x.test/item/43'));
  });
});

describe('generateContentHash', () => {
  it('should hash "title|description|tags" lower-cased', () => {
    expect(generateContentHash('Pop 2024', 'Census', ['b', 'a'])).toBe(sha256('pop 2024|census|a,b'));
  });

  it('should use an empty description segment when description is absent', () => {
    expect(generateContentHash('Pop 2024', undefined, [])).toBe(sha256('pop 2024||'));
  });

  it('should not depend on tag order', () => {
    expect(generateContentHash('T1', 'D', ['health', 'air'])).toBe(generateContentHash('T1', 'D', ['air', 'health']));
  });

  it('should change when the description changes', () => {
    expect(generateContentHash('T1', 'old')).not.toBe(generateContentHash('T1', 'new'));
  });
});

describe('extractExtension', () => {
  it('should prefer the path extension over a format query', () => {
    expect(extractExtension('http://x.test/d.csv?format=xlsx')).toBe('csv');
  });

  it('should fall back to format= when the path has no extension', () => {
    expect(extractExtension('http://x.test/download?format=geojson')).toBe('geojson');
  });

  it('should match path extensions case-insensitively', () => {
    expect(extractExtension('http://x.test/files/Report.PDF')).toBe('pdf');
  });

  it('should ignore path extensions outside the data formats', () => {
    expect(extractExtension('http://x.test/page.html')).toBeUndefined();
  });

  it('should return undefined when nothing matches', () => {
    expect(extractExtension('http://x.test/v1.2/item')).toBeUndefined();
    expect(extractExtension('http://x.test/item/42')).toBeUndefined();
  });
});

describe('processTags', () => {
  it('should clean, lower-case and de-duplicate in first-seen order', () => {
    expect(processTags([' Health ', 'Open\tData', 'health', 'AIR'])).toEqual(['health', 'open data', 'air']);
  });

  it('should drop empty and overlong tags', () => {
    expect(processTags(['', '   ', 'x'.repeat(51), 'y'.repeat(50)])).toEqual(['y'.repeat(50)]);
  });

  it('should accept undefined', () => {
    expect(processTags(undefined)).toEqual([]);
  });
});

describe('isValidRecordUrl', () => {
  it('should require a scheme and an authority', () => {
    expect(isValidRecordUrl('http://x.test/item/42')).toBe(true);
    expect(isValidRecordUrl('mailto:someone@example.org')).toBe(false);
    expect(isValidRecordUrl('/item/42')).toBe(false);
    expect(isValidRecordUrl('')).toBe(false);
    expect(isValidRecordUrl(undefined)).toBe(false);
  });
});

describe('normalizeRecord', () => {
  it('should build the canonical record', () => {
    const result = normalizeRecord(
      {
        title: '  Population\n 2024 ',
        description: ' Census   results ',
        url: 'http://x.test/files/pop.csv',
        tags: ['Census', 'census', 'People'],
      },
      'Example Open Data',
      'job-1'
    );

    expect(result).toEqual({
      ok: true,
      record: {
        hash: sha256('http://x.test/files/pop.csv'),
        contentHash: sha256('population 2024|census results|census,people'),
        title: 'Population 2024',
        description: 'Census results',
        url: 'http://x.test/files/pop.csv',
        fileReferences: ['http://x.test/files/pop.csv'],
        source: 'Example Open Data',
        tags: ['census', 'people'],
        extension: 'csv',
        crawlJobId: 'job-1',
      },
    });
  });

  it('should leave a missing description absent instead of copying the title', () => {
    const result = normalizeRecord({ title: 'Pop 2024', url: 'http://x.test/item/42', tags: [] }, 'X', 'job-1');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.record.description).toBeUndefined();
      expect(result.record.extension).toBeUndefined();
    }
  });

  it('should reject titles shorter than three characters', () => {
    const result = normalizeRecord({ title: ' ab ', url: 'http://x.test/item/1', tags: [] }, 'X', 'job-1');

    expect(result).toEqual({ ok: false, reason: CrawlErrorCode.INVALID_TITLE, message: 'Invalid title: ab' });
  });

  it('should accept a three character title after cleaning', () => {
    const result = normalizeRecord({ title: ' a\nb ', url: 'http://x.test/item/1', tags: [] }, 'X', 'job-1');

    expect(result.ok).toBe(true);
  });

  it('should reject URLs without scheme and authority', () => {
    const result = normalizeRecord({ title: 'Valid title', url: 'item/42', tags: [] }, 'X', 'job-1');

    expect(result).toEqual({ ok: false, reason: CrawlErrorCode.INVALID_URL, message: 'Invalid URL: item/42' });
  });

  it('should reject records without a source', () => {
    const result = normalizeRecord({ title: 'Valid title', url: 'http://x.test/item/1', tags: [] }, '  ', 'job-1');

    expect(result).toEqual({
      ok: false,
      reason: CrawlErrorCode.INCOMPLETE_RECORD,
      message: 'Missing required field(s): source',
    });
  });
});
