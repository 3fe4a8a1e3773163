/**
 * Crawl Job Repository
 * Data access layer for crawl jobs. Every status change goes through
 * `transition`, which only applies while the job is in one of the `from` states.
 */

import { FilterQuery } from 'mongoose';
import { CrawlJobModel } from './crawl.model';
import {
  CrawlJob,
  CrawlJobPatch,
  CrawlProgressPatch,
  CrawlStatus,
  ICrawlJobListQuery,
  NewCrawlJob,
} from './crawl.types';

export interface CrawlJobStore {
  create(job: NewCrawlJob): Promise<CrawlJob>;

  findByJobId(jobId: string): Promise<CrawlJob | null>;

  list(query: ICrawlJobListQuery): Promise<{ jobs: CrawlJob[]; total: number }>;

  findByStatus(status: CrawlStatus): Promise<CrawlJob[]>;

  /**
   * Move the job to `to` if its status is one of `from`; null when it is not
   */
  transition(jobId: string, from: readonly CrawlStatus[], to: CrawlStatus, patch?: CrawlJobPatch): Promise<CrawlJob | null>;

  /**
   * Write progress while the job is running; null when it no longer is
   */
  updateProgress(jobId: string, patch: CrawlProgressPatch): Promise<CrawlJob | null>;
}

export class CrawlJobRepository implements CrawlJobStore {
  /**
   * Create a new pending crawl job
   */
  async create(job: NewCrawlJob): Promise<CrawlJob> {
    const created = await CrawlJobModel.create({ ...job, status: CrawlStatus.PENDING });
    return created.toObject<CrawlJob>();
  }

  async findByJobId(jobId: string): Promise<CrawlJob | null> {
    return await CrawlJobModel.findOne({ jobId }).lean<CrawlJob | null>();
  }

  async list(query: ICrawlJobListQuery): Promise<{ jobs: CrawlJob[]; total: number }> {
    const { page = 1, limit = 20, status } = query;
    const skip = (page - 1) * limit;

    const filter: FilterQuery<CrawlJob> = {};
    if (status) {
      filter.status = status;
    }

    const [jobs, total] = await Promise.all([
      CrawlJobModel.find(filter)
        .sort({ createdAt: -1 })
        .skip(skip)
        .limit(limit)
        .lean<CrawlJob[]>(),
      CrawlJobModel.countDocuments(filter),
    ]);

    return { jobs, total };
  }

  async findByStatus(status: CrawlStatus): Promise<CrawlJob[]> {
    return await CrawlJobModel.find({ status }).lean<CrawlJob[]>();
  }

  async transition(
    jobId: string,
    from: readonly CrawlStatus[],
    to: CrawlStatus,
    patch: CrawlJobPatch = {}
  ): Promise<CrawlJob | null> {
    return await CrawlJobModel.findOneAndUpdate(
      { jobId, status: { $in: [...from] } },
      { $set: { ...patch, status: to } },
      { new: true }
    ).lean<CrawlJob | null>();
  }

  async updateProgress(jobId: string, patch: CrawlProgressPatch): Promise<CrawlJob | null> {
    return await CrawlJobModel.findOneAndUpdate(
      { jobId, status: CrawlStatus.RUNNING },
      { $set: patch },
      { new: true }
    ).lean<CrawlJob | null>();
  }
}

export const crawlJobRepository = new CrawlJobRepository();
