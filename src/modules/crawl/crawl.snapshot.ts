/**
 * Outbound job view
 */

import { CrawlJob, CrawlJobSnapshot } from './crawl.types';

export function toJobSnapshot(job: CrawlJob, now: Date = new Date()): CrawlJobSnapshot {
  let durationSeconds: number | null = null;
  if (job.startedAt) {
    const end = job.completedAt ?? now;
    durationSeconds = Math.max(0, (end.getTime() - job.startedAt.getTime()) / 1000);
  }

  return {
    jobId: job.jobId,
    siteId: job.siteId,
    sourceName: job.sourceName,
    status: job.status,
    progressPercentage: job.progressPercentage,
    currentPage: job.currentPage ?? null,
    statistics: { ...job.statistics },
    options: job.options,
    errorMessage: job.errorMessage,
    errorDetails: job.errorDetails,
    createdAt: job.createdAt,
    startedAt: job.startedAt ?? null,
    completedAt: job.completedAt ?? null,
    updatedAt: job.updatedAt,
    durationSeconds,
  };
}
