/**
 * Site Walker
 * Rule-driven traversal of one site: fetches pages under the per-domain
 * concurrency bound, discovers links, and hands extraction pages to the
 * extractor and normalizer. Everything it learns goes to the observer.
 */

import pLimit from 'p-limit';
import { env } from '../../config/env';
import { CrawlErrorCode, getErrorMessage } from '../errors/crawl.errors';
import { CandidateRecord, FetchedPage, RecordExtractor, recordExtractor } from '../extraction';
import { normalizeRecord } from '../processing';
import { compileRules } from './crawl-rules';
import {
  CompiledRule,
  FrontierEntry,
  PageFetcher,
  WalkEvent,
  WalkObserver,
  WalkPolicy,
  WalkRequest,
  WalkSummary,
} from './crawling.types';
import { DomainThrottle } from './domain-throttle';
import { DuplicateDetector } from './duplicate-detector';
import { LinkDiscoverer, linkDiscoverer } from './link-discoverer';
import { RobotsRules, loadRobotsRules } from './robots-txt';
import { isWithinDomain, normalizeUrl, originOf } from './url-normalizer';

export function defaultWalkPolicy(): WalkPolicy {
  return {
    maxConcurrency: env.CRAWL_CONCURRENCY_PER_DOMAIN,
    downloadDelayMs: env.CRAWL_DOWNLOAD_DELAY_MS,
    obeyRobotsTxt: env.CRAWL_OBEY_ROBOTS,
    userAgent: env.CRAWL_USER_AGENT,
  };
}

export interface SiteWalkerDependencies {
  extractor?: RecordExtractor;
  discoverer?: LinkDiscoverer;
  /**
   * Jitter source for the download delay
   */
  random?: () => number;
}

/**
 * Mutable state of one walk
 */
interface WalkState {
  request: WalkRequest;
  rules: CompiledRule[];
  visited: DuplicateDetector;
  throttle: DomainThrottle;
  robots: Map<string, Promise<RobotsRules>>;
  limit: ReturnType<typeof pLimit>;
  tasks: Set<Promise<void>>;
  pagesFetched: number;
  /**
   * Extraction pages dispatched or in flight; reserved when scheduled
   */
  extractionPages: number;
  /**
   * Extraction links turned away by a full budget; a released reservation takes the next one
   */
  deferred: FrontierEntry[];
  pagesSkipped: number;
  errors: number;
  fatal: { error: unknown } | null;
}

export class SiteWalker {
  private readonly extractor: RecordExtractor;
  private readonly discoverer: LinkDiscoverer;
  private readonly random: () => number;

  constructor(
    private readonly fetcher: PageFetcher,
    private readonly observer: WalkObserver,
    private readonly policy: WalkPolicy = defaultWalkPolicy(),
    dependencies: SiteWalkerDependencies = {}
  ) {
    this.extractor = dependencies.extractor ?? recordExtractor;
    this.discoverer = dependencies.discoverer ?? linkDiscoverer;
    this.random = dependencies.random ?? Math.random;
  }

  /**
   * Walk the target until the frontier is exhausted, the page budget is spent,
   * or the request is cancelled. Resolves after every in-flight page drained.
   * Rejects only when the observer rejected.
   */
  async walk(request: WalkRequest): Promise<WalkSummary> {
    const state: WalkState = {
      request,
      rules: compileRules(request.target.rules),
      visited: new DuplicateDetector(),
      throttle: new DomainThrottle(this.policy.downloadDelayMs, this.random),
      robots: new Map(),
      limit: pLimit(Math.max(1, this.policy.maxConcurrency)),
      tasks: new Set(),
      pagesFetched: 0,
      extractionPages: 0,
      deferred: [],
      pagesSkipped: 0,
      errors: 0,
      fatal: null,
    };

    console.log(`Job ${request.jobId}: Walking ${request.target.startUrl} (${state.rules.length} rules, budget ${request.pageBudget ?? 'none'})`);

    // The start page only expands the frontier
    this.schedule(state, { url: normalizeUrl(request.target.startUrl), role: 'traversal', depth: 0 });

    while (state.tasks.size > 0) {
      await Promise.all([...state.tasks]);
    }

    if (state.fatal) {
      throw state.fatal.error;
    }

    const summary: WalkSummary = {
      pagesFetched: state.pagesFetched,
      extractionPages: state.extractionPages,
      pagesSkipped: state.pagesSkipped,
      errors: state.errors,
      stoppedBy: request.isCancelled()
        ? 'cancelled'
        : this.budgetReached(state)
          ? 'budget'
          : 'exhausted',
    };

    const { duplicates } = state.visited.getStats();
    console.log(
      `Job ${request.jobId}: Walk ${summary.stoppedBy} - ${summary.pagesFetched} pages fetched, ` +
      `${summary.extractionPages} extraction pages, ${summary.pagesSkipped} skipped, ` +
      `${duplicates} repeated links, ${summary.errors} errors`
    );

    return summary;
  }

  private budgetReached(state: WalkState): boolean {
    const budget = state.request.pageBudget;
    return budget !== undefined && state.extractionPages >= budget;
  }

  private isStopped(state: WalkState): boolean {
    return state.fatal !== null || state.request.isCancelled();
  }

  private schedule(state: WalkState, entry: FrontierEntry): void {
    if (this.isStopped(state)) {
      return;
    }

    // Not marked visited yet, so a released reservation can still pick it up
    if (entry.role === 'extraction' && this.budgetReached(state)) {
      state.deferred.push(entry);
      return;
    }

    if (state.visited.addUrl(entry.url)) {
      return;
    }

    if (entry.role === 'extraction') {
      state.extractionPages++;
    }

    const task: Promise<void> = state.limit(() => this.visit(state, entry)).then(() => {
      state.tasks.delete(task);
    });
    state.tasks.add(task);
  }

  /**
   * Give back an extraction reservation for a page that was never fetched
   */
  private release(state: WalkState, entry: FrontierEntry): void {
    if (entry.role !== 'extraction') {
      return;
    }

    state.extractionPages--;
    while (state.deferred.length > 0 && !this.budgetReached(state) && !this.isStopped(state)) {
      const next = state.deferred.shift();
      if (next) {
        this.schedule(state, next);
      }
    }
  }

  private async visit(state: WalkState, entry: FrontierEntry): Promise<void> {
    try {
      await this.processEntry(state, entry);
    } catch (error) {
      // Only observer failures get here; they end the walk
      if (!state.fatal) {
        state.fatal = { error };
        console.error(`Job ${state.request.jobId}: Walk aborted at ${entry.url}: ${getErrorMessage(error)}`);
      }
    }
  }

  private async processEntry(state: WalkState, entry: FrontierEntry): Promise<void> {
    const { request } = state;

    if (this.isStopped(state) || (entry.role === 'traversal' && this.budgetReached(state))) {
      this.release(state, entry);
      return;
    }

    if (!(await this.isAllowedByRobots(state, entry.url))) {
      console.log(`Job ${request.jobId}: Disallowed by robots.txt: ${entry.url}`);
      state.pagesSkipped++;
      this.release(state, entry);
      return;
    }

    await state.throttle.acquire();
    if (this.isStopped(state)) {
      this.release(state, entry);
      return;
    }

    state.pagesFetched++;
    await this.emit({ type: 'progress', url: entry.url, role: entry.role });

    let page: FetchedPage;
    try {
      page = await this.fetcher.fetch(entry.url);
    } catch (error) {
      await this.pageError(state, entry.url, CrawlErrorCode.FETCH_ERROR, error);
      return;
    }

    if (!isWithinDomain(page.url, request.target.domain)) {
      console.log(`Job ${request.jobId}: Redirected off ${request.target.domain}, skipping: ${entry.url} -> ${page.url}`);
      state.pagesSkipped++;
      return;
    }

    let links: FrontierEntry[] = [];
    try {
      links = this.discoverer.discoverLinks(page.html, page.url, state.rules, request.target.domain, entry.depth);
    } catch (error) {
      await this.pageError(state, page.url, CrawlErrorCode.EXTRACTION_ERROR, error);
    }

    if (entry.role === 'extraction') {
      await this.extractFrom(state, page);
    }

    for (const link of links) {
      this.schedule(state, link);
    }
  }

  private async extractFrom(state: WalkState, page: FetchedPage): Promise<void> {
    const { request } = state;

    let candidate: CandidateRecord | null;
    try {
      candidate = this.extractor.extract(page, request.target.selectors);
    } catch (error) {
      await this.pageError(state, page.url, CrawlErrorCode.EXTRACTION_ERROR, error);
      return;
    }

    if (!candidate) {
      console.warn(`Job ${request.jobId}: No title found for ${page.url}`);
      await this.emit({ type: 'rejected', url: page.url, reason: 'NoTitle', message: 'No title found' });
      return;
    }

    const result = normalizeRecord(candidate, request.target.sourceName, request.jobId);
    if (!result.ok) {
      console.warn(`Job ${request.jobId}: Rejected ${page.url}: ${result.message}`);
      await this.emit({ type: 'rejected', url: page.url, reason: result.reason, message: result.message });
      return;
    }

    await this.emit({ type: 'record', url: page.url, record: result.record });
  }

  private async pageError(
    state: WalkState,
    url: string,
    code: CrawlErrorCode.FETCH_ERROR | CrawlErrorCode.EXTRACTION_ERROR,
    error: unknown
  ): Promise<void> {
    state.errors++;
    const message = getErrorMessage(error);
    console.error(`Job ${state.request.jobId}: ${code}`, { url, error: message });
    await this.emit({ type: 'error', url, code, error: message });
  }

  private async isAllowedByRobots(state: WalkState, url: string): Promise<boolean> {
    if (!this.policy.obeyRobotsTxt) {
      return true;
    }

    const origin = originOf(url);
    if (!origin) {
      return true;
    }

    // One robots.txt fetch per origin per walk, spaced like any other request
    let rules = state.robots.get(origin);
    if (!rules) {
      rules = state.throttle.acquire().then(() => loadRobotsRules(origin, this.fetcher));
      state.robots.set(origin, rules);
    }

    return (await rules).isAllowed(url, this.policy.userAgent);
  }

  private async emit(event: WalkEvent): Promise<void> {
    await this.observer.onEvent(event);
  }
}
