/**
 * Crawl Controller
 * HTTP request/response handling for crawl job endpoints
 */

import { Request, Response } from 'express';
import { asyncHandler } from '../../middleware/error-handler';
import { queryInt, queryString } from '../../lib/http/query';
import { crawlService } from './crawl.service';
import { toJobSnapshot } from './crawl.snapshot';
import {
  CrawlStatus,
  ICrawlJobListResponse,
  ICrawlJobResponse,
  IStartCrawlRequest,
} from './crawl.types';

const MAX_PAGE_SIZE = 100;

function parseStatus(value: unknown): CrawlStatus | undefined {
  const status = queryString(value);
  return Object.values(CrawlStatus).find((candidate) => candidate === status);
}

export class CrawlController {
  /**
   * POST /api/crawl/start
   * Queue a crawl of a configured site
   */
  startCrawl = asyncHandler(async (req: Request, res: Response) => {
    const { siteId, options }: IStartCrawlRequest = req.body ?? {};
    const createdBy = queryString(req.headers['x-user-id']);

    const job = await crawlService.startCrawl(siteId, options, createdBy);

    const response: ICrawlJobResponse = {
      success: true,
      job: toJobSnapshot(job),
    };

    res.status(202).json(response);
  });

  /**
   * GET /api/crawl/jobs
   * List crawl jobs, newest first
   */
  listJobs = asyncHandler(async (req: Request, res: Response) => {
    const page = queryInt(req.query.page, 1);
    const limit = queryInt(req.query.limit, 20, MAX_PAGE_SIZE);
    const status = parseStatus(req.query.status);

    const { jobs, total } = await crawlService.listJobs({ page, limit, status });

    const response: ICrawlJobListResponse = {
      success: true,
      jobs: jobs.map((job) => toJobSnapshot(job)),
      total,
      page,
      limit,
    };

    res.json(response);
  });

  /**
   * GET /api/crawl/jobs/:jobId
   */
  getJob = asyncHandler(async (req: Request, res: Response) => {
    const job = await crawlService.getJob(req.params.jobId);

    const response: ICrawlJobResponse = {
      success: true,
      job: toJobSnapshot(job),
    };

    res.json(response);
  });

  /**
   * POST /api/crawl/jobs/:jobId/cancel
   */
  cancelJob = asyncHandler(async (req: Request, res: Response) => {
    const job = await crawlService.cancelCrawl(req.params.jobId);

    const response: ICrawlJobResponse = {
      success: true,
      job: toJobSnapshot(job),
    };

    res.json(response);
  });
}

export const crawlController = new CrawlController();
