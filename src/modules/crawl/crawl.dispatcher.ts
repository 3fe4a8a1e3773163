/**
 * Crawl Dispatcher
 * Runs job controllers with a bound on concurrently running jobs;
 * the rest wait in the queue and stay pending
 */

import pLimit from 'p-limit';
import { env } from '../../config/env';
import { getErrorMessage } from '../../lib/errors/crawl.errors';
import { JobController } from './job.controller';
import { CrawlJob } from './crawl.types';

export class CrawlDispatcher {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly controllers = new Map<string, JobController>();
  private readonly runs = new Set<Promise<CrawlJob | null>>();

  constructor(maxConcurrentJobs: number = env.MAX_CONCURRENT_CRAWLS) {
    this.limit = pLimit(Math.max(1, maxConcurrentJobs));
  }

  /**
   * Queue a controller. The returned promise resolves with the finalized job,
   * or null when the run itself threw; it never rejects.
   */
  dispatch(controller: JobController): Promise<CrawlJob | null> {
    const { jobId } = controller;
    this.controllers.set(jobId, controller);

    const run: Promise<CrawlJob | null> = this.limit(() => controller.start())
      .catch((error: unknown) => {
        console.error(`Job ${jobId}: Run aborted: ${getErrorMessage(error)}`);
        return null;
      })
      .then((job) => {
        this.controllers.delete(jobId);
        this.runs.delete(run);
        return job;
      });

    this.runs.add(run);
    return run;
  }

  /**
   * Controller of a job queued or running in this process
   */
  get(jobId: string): JobController | undefined {
    return this.controllers.get(jobId);
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  /**
   * Resolve once every dispatched job has finished
   */
  async idle(): Promise<void> {
    while (this.runs.size > 0) {
      await Promise.all([...this.runs]);
    }
  }
}
