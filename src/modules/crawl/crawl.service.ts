/**
 * Crawl Service
 * Accepts crawl requests, resolves site configs, creates jobs and hands them
 * to the dispatcher; cancels, lists and recovers jobs
 */

import { randomUUID } from 'crypto';
import { HttpPageFetcher, PageFetcher, SiteWalkerDependencies, WalkPolicy } from '../../lib/crawling';
import { CrawlError, CrawlErrorCode } from '../../lib/errors/crawl.errors';
import { DatasetGateway, datasetGateway } from '../dataset/dataset.gateway';
import { SiteConfigRegistry, siteConfigRegistry } from '../sites/site-config.registry';
import { CrawlDispatcher } from './crawl.dispatcher';
import { socketJobNotifier } from './crawl.notifier';
import { CrawlJobStore, crawlJobRepository } from './crawl.repository';
import { toJobSnapshot } from './crawl.snapshot';
import {
  CrawlJob,
  CrawlJobNotifier,
  CrawlOptions,
  CrawlStatus,
  ICrawlJobListQuery,
  isTerminalStatus,
} from './crawl.types';
import { JobController } from './job.controller';

export interface CrawlServiceDependencies {
  store: CrawlJobStore;
  gateway: DatasetGateway;
  registry: SiteConfigRegistry;
  fetcher: PageFetcher;
  dispatcher: CrawlDispatcher;
  notifier?: CrawlJobNotifier;
  policy?: WalkPolicy;
  walker?: SiteWalkerDependencies;
  cancelGraceMs?: number;
  batchSize?: number;
  newJobId?: () => string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate submitted options; unknown keys are kept as they are
 */
export function parseCrawlOptions(raw: unknown): CrawlOptions {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isPlainObject(raw)) {
    throw new CrawlError(CrawlErrorCode.INVALID_OPTIONS, 'options must be an object');
  }

  const { pageBudget, testMode, ...rest } = raw;
  const options: CrawlOptions = { ...rest };

  if (pageBudget !== undefined && pageBudget !== null) {
    if (typeof pageBudget !== 'number' || !Number.isInteger(pageBudget) || pageBudget <= 0) {
      throw new CrawlError(CrawlErrorCode.INVALID_OPTIONS, 'pageBudget must be a positive integer');
    }
    options.pageBudget = pageBudget;
  }

  if (testMode !== undefined && testMode !== null) {
    if (typeof testMode !== 'boolean') {
      throw new CrawlError(CrawlErrorCode.INVALID_OPTIONS, 'testMode must be a boolean');
    }
    options.testMode = testMode;
  }

  return options;
}

export class CrawlService {
  private readonly deps: CrawlServiceDependencies;
  private readonly newJobId: () => string;

  constructor(dependencies: Partial<CrawlServiceDependencies> = {}) {
    this.deps = {
      store: dependencies.store ?? crawlJobRepository,
      gateway: dependencies.gateway ?? datasetGateway,
      registry: dependencies.registry ?? siteConfigRegistry,
      fetcher: dependencies.fetcher ?? new HttpPageFetcher(),
      dispatcher: dependencies.dispatcher ?? new CrawlDispatcher(),
      notifier: dependencies.notifier ?? socketJobNotifier,
      policy: dependencies.policy,
      walker: dependencies.walker,
      cancelGraceMs: dependencies.cancelGraceMs,
      batchSize: dependencies.batchSize,
    };
    this.newJobId = dependencies.newJobId ?? randomUUID;
  }

  get dispatcher(): CrawlDispatcher {
    return this.deps.dispatcher;
  }

  /**
   * Create a pending job for a configured site and queue it
   */
  async startCrawl(siteId: unknown, rawOptions?: unknown, createdBy?: string): Promise<CrawlJob> {
    if ((typeof siteId !== 'string' || !siteId.trim()) && typeof siteId !== 'number') {
      throw new CrawlError(CrawlErrorCode.INVALID_OPTIONS, 'siteId is required');
    }

    const options = parseCrawlOptions(rawOptions);
    const site = await this.deps.registry.resolve(String(siteId).trim());

    const job = await this.deps.store.create({
      jobId: this.newJobId(),
      siteId: site.siteId,
      sourceName: site.target.sourceName,
      startUrl: site.target.startUrl,
      crawlerType: site.crawlerType,
      options,
      createdBy,
    });

    console.log(`Job ${job.jobId}: Created for site ${site.siteId} (${site.target.sourceName})`);

    const controller = new JobController(job, site.target, {
      store: this.deps.store,
      gateway: this.deps.gateway,
      fetcher: this.deps.fetcher,
      policy: this.deps.policy,
      walker: this.deps.walker,
      notifier: this.deps.notifier,
      cancelGraceMs: this.deps.cancelGraceMs,
      batchSize: this.deps.batchSize,
    });
    void this.deps.dispatcher.dispatch(controller);

    return job;
  }

  /**
   * Cancel a pending or running job; terminal jobs are rejected
   */
  async cancelCrawl(jobId: string): Promise<CrawlJob> {
    const job = await this.getJob(jobId);

    if (isTerminalStatus(job.status)) {
      throw new CrawlError(CrawlErrorCode.INVALID_TRANSITION, `Job ${jobId} is already ${job.status}`, {
        details: { status: job.status },
      });
    }

    const controller = this.deps.dispatcher.get(jobId);
    if (job.status === CrawlStatus.RUNNING && controller) {
      return controller.cancel();
    }

    // Pending here, or running in another process
    const cancelled = await this.deps.store.transition(
      jobId,
      [CrawlStatus.PENDING, CrawlStatus.RUNNING],
      CrawlStatus.CANCELLED,
      { completedAt: new Date() }
    );

    if (!cancelled) {
      // Lost a race with another transition
      const current = await this.getJob(jobId);
      if (current.status === CrawlStatus.RUNNING && this.deps.dispatcher.get(jobId)) {
        return this.cancelCrawl(jobId);
      }
      throw new CrawlError(CrawlErrorCode.INVALID_TRANSITION, `Job ${jobId} is already ${current.status}`, {
        details: { status: current.status },
      });
    }

    console.log(`Job ${jobId}: Cancelled while ${job.status}`);
    this.deps.notifier?.complete(toJobSnapshot(cancelled));
    return cancelled;
  }

  async getJob(jobId: string): Promise<CrawlJob> {
    const job = await this.deps.store.findByJobId(jobId);
    if (!job) {
      throw new CrawlError(CrawlErrorCode.JOB_NOT_FOUND, `Crawl job not found: ${jobId}`);
    }
    return job;
  }

  async listJobs(query: ICrawlJobListQuery): Promise<{ jobs: CrawlJob[]; total: number }> {
    return this.deps.store.list(query);
  }

  /**
   * Jobs left running by a previous process can never finish; fail them
   */
  async recoverInterruptedJobs(): Promise<number> {
    const stale = await this.deps.store.findByStatus(CrawlStatus.RUNNING);
    let recovered = 0;

    for (const job of stale) {
      if (this.deps.dispatcher.get(job.jobId)) {
        continue;
      }
      const message = 'Interrupted by a service restart';
      const failed = await this.deps.store.transition(job.jobId, [CrawlStatus.RUNNING], CrawlStatus.FAILED, {
        errorMessage: message,
        errorDetails: { exceptionType: 'Interrupted', message, taskId: job.jobId },
        completedAt: new Date(),
      });
      if (failed) {
        recovered++;
      }
    }

    if (recovered > 0) {
      console.warn(`Recovered ${recovered} interrupted crawl job(s)`);
    }
    return recovered;
  }
}

export const crawlService = new CrawlService();
