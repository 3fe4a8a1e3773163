/**
 * Job Controller
 * Runs one crawl job: drives its state machine, turns walk events into
 * gateway calls and statistics, persists progress and handles cancellation
 */

import { env } from '../../config/env';
import {
  PageFetcher,
  SiteWalker,
  SiteWalkerDependencies,
  WalkEvent,
  WalkObserver,
  WalkPolicy,
  WalkTarget,
  defaultWalkPolicy,
} from '../../lib/crawling';
import { getErrorMessage, getErrorType } from '../../lib/errors/crawl.errors';
import { DatasetGateway } from '../dataset/dataset.gateway';
import { StoreResult } from '../dataset/dataset.types';
import { CrawlRunContext } from './crawl-run.context';
import { CrawlJobStore } from './crawl.repository';
import { toJobSnapshot } from './crawl.snapshot';
import { CrawlJob, CrawlJobNotifier, CrawlStatus } from './crawl.types';

export interface JobControllerDependencies {
  store: CrawlJobStore;
  gateway: DatasetGateway;
  fetcher: PageFetcher;
  policy?: WalkPolicy;
  walker?: SiteWalkerDependencies;
  notifier?: CrawlJobNotifier;
  cancelGraceMs?: number;
  batchSize?: number;
}

export class JobController implements WalkObserver {
  readonly context: CrawlRunContext;

  private readonly store: CrawlJobStore;
  private readonly gateway: DatasetGateway;
  private readonly walker: SiteWalker;
  private readonly notifier?: CrawlJobNotifier;
  private readonly cancelGraceMs: number;

  private running: Promise<CrawlJob> | null = null;
  private finalized: CrawlJob | null = null;

  // Coalesced progress writes: at most one in flight, the latest state always follows
  private progressWrite: Promise<void> | null = null;
  private progressDirty = false;

  constructor(job: CrawlJob, target: WalkTarget, dependencies: JobControllerDependencies) {
    this.context = new CrawlRunContext(job.jobId, target, job.options, dependencies.batchSize);
    this.store = dependencies.store;
    this.gateway = dependencies.gateway;
    this.notifier = dependencies.notifier;
    this.cancelGraceMs = dependencies.cancelGraceMs ?? env.CRAWL_CANCEL_GRACE_MS;
    this.walker = new SiteWalker(
      dependencies.fetcher,
      this,
      dependencies.policy ?? defaultWalkPolicy(),
      dependencies.walker
    );
  }

  get jobId(): string {
    return this.context.jobId;
  }

  /**
   * Run the job once; later calls return the same promise.
   * Resolves with the job as finalized in the store.
   */
  start(): Promise<CrawlJob> {
    if (!this.running) {
      this.running = this.execute();
    }
    return this.running;
  }

  /**
   * Cooperative cancellation: stop dispatching fetches, let in-flight pages
   * drain for up to the grace period, drop unflushed records, mark cancelled
   */
  async cancel(): Promise<CrawlJob> {
    this.context.cancellation.cancel('Cancelled by request');
    console.log(`Job ${this.jobId}: Cancellation requested`);

    if (!this.running) {
      // Never dispatched
      return this.finishCancelled();
    }

    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), this.cancelGraceMs);
    });

    try {
      const job = await Promise.race([this.running, grace]);
      if (job) {
        return job;
      }
    } finally {
      clearTimeout(timer);
    }

    console.warn(`Job ${this.jobId}: Walk did not drain within ${this.cancelGraceMs}ms, cancelling anyway`);
    return this.finishCancelled();
  }

  async onEvent(event: WalkEvent): Promise<void> {
    const { context } = this;

    switch (event.type) {
      case 'progress':
        context.currentPage = event.url;
        if (event.role === 'extraction') {
          context.statistics.recordPageCrawled();
        }
        break;

      case 'record': {
        context.statistics.recordDatasetFound();
        // Nothing new reaches storage once cancelled
        if (context.cancellation.isCancelled) {
          break;
        }
        this.applyResults(await this.gateway.submit(event.record, context));
        break;
      }

      case 'rejected':
        if (event.reason !== 'NoTitle') {
          context.statistics.recordError();
        }
        break;

      case 'error':
        context.statistics.recordError();
        break;
    }

    this.requestProgressWrite();
  }

  private async execute(): Promise<CrawlJob> {
    const { context } = this;

    const started = await this.store.transition(this.jobId, [CrawlStatus.PENDING], CrawlStatus.RUNNING, {
      startedAt: new Date(),
    });
    if (!started) {
      const current = await this.store.findByJobId(this.jobId);
      console.log(`Job ${this.jobId}: Not started, status is ${current?.status ?? 'missing'}`);
      if (!current) {
        throw new Error(`Crawl job ${this.jobId} disappeared before it started`);
      }
      this.finalized = current;
      return current;
    }

    console.log(`Job ${this.jobId}: Running ${context.target.sourceName} from ${context.target.startUrl}${context.testMode ? ' (test mode)' : ''}`);
    this.notifier?.progress(toJobSnapshot(started));

    try {
      await this.walker.walk({
        jobId: this.jobId,
        target: context.target,
        pageBudget: context.pageBudget,
        isCancelled: () => context.cancellation.isCancelled,
      });

      if (context.cancellation.isCancelled) {
        return await this.finishCancelled();
      }

      this.applyResults(await this.gateway.flush(context));
      return await this.finishCompleted();
    } catch (error) {
      return await this.finishFailed(error);
    }
  }

  private applyResults(results: StoreResult[]): void {
    for (const result of results) {
      this.context.statistics.recordOutcome(result.outcome);
    }
  }

  private requestProgressWrite(): void {
    this.progressDirty = true;
    if (!this.progressWrite) {
      this.progressWrite = this.writeProgress();
    }
  }

  private async writeProgress(): Promise<void> {
    while (this.progressDirty) {
      this.progressDirty = false;
      try {
        const job = await this.store.updateProgress(this.jobId, {
          progressPercentage: this.context.progressPercentage,
          currentPage: this.context.currentPage,
          statistics: this.context.statistics.getStatistics(),
        });

        if (!job) {
          // Cancelled or finalized elsewhere
          this.context.cancellation.cancel('Job is no longer running');
        } else {
          this.notifier?.progress(toJobSnapshot(job));
        }
      } catch (error) {
        console.warn(`Job ${this.jobId}: Progress update failed: ${getErrorMessage(error)}`);
      }
    }
    this.progressWrite = null;
  }

  private async settleProgress(): Promise<void> {
    while (this.progressWrite) {
      await this.progressWrite;
    }
  }

  private async finishCompleted(): Promise<CrawlJob> {
    await this.settleProgress();

    const statistics = this.context.statistics.getStatistics();
    const job = await this.store.transition(this.jobId, [CrawlStatus.RUNNING], CrawlStatus.COMPLETED, {
      progressPercentage: 100,
      currentPage: this.context.currentPage,
      statistics,
      completedAt: new Date(),
    });

    console.log(
      `Job ${this.jobId}: Completed - ${statistics.pagesCrawled} pages, ${statistics.datasetsFound} found, ` +
      `${statistics.datasetsCreated} created, ${statistics.datasetsUpdated} updated, ` +
      `${statistics.datasetsUnchanged} unchanged, ${statistics.duplicatesSkipped} duplicates, ${statistics.errorsCount} errors`
    );

    return this.finalize(job);
  }

  private async finishFailed(error: unknown): Promise<CrawlJob> {
    const message = getErrorMessage(error);
    console.error(`Job ${this.jobId}: Failed - ${message}`);

    const dropped = this.context.batch.discard();
    if (dropped > 0) {
      console.warn(`Job ${this.jobId}: Dropped ${dropped} unflushed records`);
    }

    await this.settleProgress();

    const job = await this.store.transition(this.jobId, [CrawlStatus.RUNNING], CrawlStatus.FAILED, {
      currentPage: this.context.currentPage,
      statistics: this.context.statistics.getStatistics(),
      errorMessage: message,
      errorDetails: {
        exceptionType: getErrorType(error),
        message,
        taskId: this.jobId,
      },
      completedAt: new Date(),
    });

    return this.finalize(job);
  }

  private async finishCancelled(): Promise<CrawlJob> {
    if (this.finalized) {
      return this.finalized;
    }

    const dropped = this.context.batch.discard();
    console.log(`Job ${this.jobId}: Cancelled${dropped > 0 ? `, ${dropped} unflushed records dropped` : ''}`);

    await this.settleProgress();

    const job = await this.store.transition(
      this.jobId,
      [CrawlStatus.PENDING, CrawlStatus.RUNNING],
      CrawlStatus.CANCELLED,
      {
        currentPage: this.context.currentPage,
        statistics: this.context.statistics.getStatistics(),
        completedAt: new Date(),
      }
    );

    return this.finalize(job);
  }

  /**
   * A null transition means another writer already finalized the job;
   * report whatever the store holds
   */
  private async finalize(transitioned: CrawlJob | null): Promise<CrawlJob> {
    if (this.finalized) {
      return this.finalized;
    }

    const job = transitioned ?? (await this.store.findByJobId(this.jobId));
    if (!job) {
      throw new Error(`Crawl job ${this.jobId} not found while finalizing`);
    }

    this.finalized = job;
    this.notifier?.complete(toJobSnapshot(job));
    return job;
  }
}
