/**
 * Extraction Types
 * Page, selector and candidate record definitions for field extraction
 */

/**
 * A downloaded page handed to the extractor
 */
export interface FetchedPage {
  /**
   * Final URL after redirects
   */
  url: string;

  /**
   * Raw response body
   */
  html: string;

  statusCode: number;

  contentType?: string;
}

/**
 * How to locate each field on a page
 */
export interface FieldSelectors {
  title: string;
  description?: string;
  tags?: string;
}

/**
 * Raw extraction output, before cleaning and validation
 */
export interface CandidateRecord {
  title: string;
  description?: string;
  url: string;
  tags: string[];
}

/**
 * Capability used by the extractor to read values off a page.
 * Implementations decide what a selector means (CSS, XPath, ...).
 */
export interface FieldLocator {
  /**
   * First value matched by the selector, or null
   */
  locate(selector: string, page: FetchedPage): string | null;

  /**
   * Up to `limit` values matched by the selector, in document order
   */
  locateAll(selector: string, page: FetchedPage, limit: number): string[];
}
