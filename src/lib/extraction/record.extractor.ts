/**
 * Record Extractor
 * Reads title, description and tags off a page through a FieldLocator
 */

import { env } from '../../config/env';
import { cheerioFieldLocator } from './cheerio.locator';
import { CandidateRecord, FetchedPage, FieldLocator, FieldSelectors } from './extraction.types';

export interface RecordExtractorOptions {
  /**
   * Maximum raw tag candidates read per page
   */
  maxTags?: number;
}

export class RecordExtractor {
  private readonly maxTags: number;

  constructor(
    private readonly locator: FieldLocator = cheerioFieldLocator,
    options: RecordExtractorOptions = {}
  ) {
    this.maxTags = options.maxTags ?? env.CRAWL_MAX_TAGS;
  }

  /**
   * Extract a candidate record, or null when the page has no usable title
   */
  extract(page: FetchedPage, selectors: FieldSelectors): CandidateRecord | null {
    const title = this.locator.locate(selectors.title, page);
    if (!title || !title.trim()) {
      return null;
    }

    const description = selectors.description
      ? this.locator.locate(selectors.description, page) ?? undefined
      : undefined;

    const tags = selectors.tags
      ? this.locator.locateAll(selectors.tags, page, this.maxTags)
      : [];

    return {
      title,
      description,
      url: page.url,
      tags,
    };
  }
}

export const recordExtractor = new RecordExtractor();
