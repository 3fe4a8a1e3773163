/**
 * Crawling Types
 * Type definitions for rule-based site walking
 */

import { FetchedPage, FieldSelectors } from '../extraction/extraction.types';
import { DatasetRecord } from '../../modules/dataset/dataset.types';
import { CrawlErrorCode, RejectionReason } from '../errors/crawl.errors';

/**
 * Rule role: traversal rules only expand the frontier,
 * extraction rules are followed and parsed
 */
export type RuleRole = 'traversal' | 'extraction';

/**
 * Link-following rule as written in a site configuration
 */
export interface SiteRule {
  /**
   * Regex searched in the absolute URL (empty matches everything)
   */
  allow: string;

  /**
   * Regex that excludes a link even when `allow` matches
   */
  deny?: string;

  role?: RuleRole;
}

/**
 * Rule with compiled patterns and a resolved role
 */
export interface CompiledRule {
  allow: RegExp | null;
  deny: RegExp | null;
  role: RuleRole;
  source: SiteRule;
}

/**
 * Everything the walker needs to know about one site
 */
export interface WalkTarget {
  startUrl: string;
  domain: string;
  sourceName: string;
  rules: SiteRule[];
  selectors: FieldSelectors;
}

/**
 * Process-wide politeness settings (never negotiated per job)
 */
export interface WalkPolicy {
  /**
   * Maximum in-flight fetches per domain
   */
  maxConcurrency: number;

  /**
   * Base delay between requests to the same domain, jittered 0.5x - 1.5x
   */
  downloadDelayMs: number;

  /**
   * Whether to respect robots.txt
   */
  obeyRobotsTxt: boolean;

  /**
   * User agent sent with every request and matched against robots.txt
   */
  userAgent: string;
}

/**
 * A discovered URL waiting to be fetched
 */
export interface FrontierEntry {
  url: string;
  role: RuleRole;
  depth: number;
  parentUrl?: string;
}

// ============================================================================
// Walk events
// ============================================================================

export interface ProgressEvent {
  type: 'progress';
  url: string;
  role: RuleRole;
}

export interface RecordFoundEvent {
  type: 'record';
  url: string;
  record: DatasetRecord;
}

export interface RecordRejectedEvent {
  type: 'rejected';
  url: string;
  reason: RejectionReason | 'NoTitle';
  message: string;
}

export interface WalkErrorEvent {
  type: 'error';
  url: string;
  code: CrawlErrorCode.FETCH_ERROR | CrawlErrorCode.EXTRACTION_ERROR;
  error: string;
}

export type WalkEvent = ProgressEvent | RecordFoundEvent | RecordRejectedEvent | WalkErrorEvent;

/**
 * Receives walk events. The walker awaits each call, so a page's
 * extract → normalize → store chain completes before its task ends.
 * A rejection from `onEvent` aborts the walk.
 */
export interface WalkObserver {
  onEvent(event: WalkEvent): Promise<void> | void;
}

/**
 * Per-walk inputs (job identity, budget and cancellation)
 */
export interface WalkRequest {
  jobId: string;
  target: WalkTarget;
  pageBudget?: number;
  isCancelled: () => boolean;
}

export interface WalkSummary {
  pagesFetched: number;
  extractionPages: number;
  pagesSkipped: number;
  errors: number;
  stoppedBy: 'exhausted' | 'budget' | 'cancelled';
}

/**
 * Downloads one page
 */
export interface PageFetcher {
  fetch(url: string): Promise<FetchedPage>;
}
