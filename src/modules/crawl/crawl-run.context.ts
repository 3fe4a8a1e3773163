/**
 * Crawl Run Context
 * All per-run state of one job, threaded through the walker observer,
 * the gateway and the job controller
 */

import { env } from '../../config/env';
import { WalkTarget } from '../../lib/crawling/crawling.types';
import { DatasetBatch } from '../dataset/dataset.batch';
import { GatewayRun } from '../dataset/dataset.gateway';
import { CrawlStatisticsTracker } from './crawl-statistics';
import { CrawlOptions } from './crawl.types';

export class CancellationToken {
  private reason: string | null = null;

  cancel(reason: string): void {
    if (this.reason === null) {
      this.reason = reason;
    }
  }

  get isCancelled(): boolean {
    return this.reason !== null;
  }

  get cancelReason(): string | null {
    return this.reason;
  }
}

export class CrawlRunContext implements GatewayRun {
  readonly batch: DatasetBatch;
  readonly statistics = new CrawlStatisticsTracker();
  readonly cancellation = new CancellationToken();
  currentPage?: string;

  constructor(
    readonly jobId: string,
    readonly target: WalkTarget,
    readonly options: CrawlOptions,
    batchSize: number = env.CRAWL_BATCH_SIZE
  ) {
    this.batch = new DatasetBatch(batchSize);
  }

  get testMode(): boolean {
    return this.options.testMode === true;
  }

  get pageBudget(): number | undefined {
    return this.options.pageBudget;
  }

  /**
   * min(100, pagesCrawled / pageBudget * 100); 0 without a budget
   */
  get progressPercentage(): number {
    const budget = this.pageBudget;
    if (!budget) {
      return 0;
    }
    return Math.min(100, (this.statistics.pagesCrawled / budget) * 100);
  }
}
