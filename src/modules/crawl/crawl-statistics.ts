/**
 * Crawl Statistics Tracker
 * One monotonic counter set per run
 */

import { StoreOutcome } from '../dataset/dataset.types';
import { CrawlStatistics } from './crawl.types';

export function emptyStatistics(): CrawlStatistics {
  return {
    pagesCrawled: 0,
    datasetsFound: 0,
    datasetsCreated: 0,
    datasetsUpdated: 0,
    datasetsUnchanged: 0,
    duplicatesSkipped: 0,
    errorsCount: 0,
  };
}

export class CrawlStatisticsTracker {
  private readonly counters: CrawlStatistics = emptyStatistics();

  /**
   * Record an extraction page fetch attempt
   */
  recordPageCrawled(): void {
    this.counters.pagesCrawled++;
  }

  /**
   * Record a normalized record reaching the gateway
   */
  recordDatasetFound(): void {
    this.counters.datasetsFound++;
  }

  recordError(): void {
    this.counters.errorsCount++;
  }

  /**
   * Record a gateway outcome
   */
  recordOutcome(outcome: StoreOutcome): void {
    switch (outcome) {
      case StoreOutcome.CREATED:
        this.counters.datasetsCreated++;
        break;
      case StoreOutcome.UPDATED:
        this.counters.datasetsUpdated++;
        break;
      case StoreOutcome.UNCHANGED:
        this.counters.datasetsUnchanged++;
        break;
      case StoreOutcome.DUPLICATE_SKIPPED:
        this.counters.duplicatesSkipped++;
        break;
      case StoreOutcome.ERROR:
        this.counters.errorsCount++;
        break;
    }
  }

  get pagesCrawled(): number {
    return this.counters.pagesCrawled;
  }

  /**
   * Copy of the current counters
   */
  getStatistics(): CrawlStatistics {
    return { ...this.counters };
  }
}
