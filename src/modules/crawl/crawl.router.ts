/**
 * Crawl Router
 * Route definitions for crawl job endpoints
 */

import { Router } from 'express';
import { crawlController } from './crawl.controller';

const router = Router();

/**
 * @route   POST /api/crawl/start
 * @desc    Start a crawl: { siteId, options: { pageBudget?, testMode? } }
 * @access  Public
 */
router.post('/start', crawlController.startCrawl);

/**
 * @route   GET /api/crawl/jobs
 * @desc    List crawl jobs (page, limit, status)
 * @access  Public
 */
router.get('/jobs', crawlController.listJobs);

/**
 * @route   GET /api/crawl/jobs/:jobId
 * @desc    Get a crawl job
 * @access  Public
 */
router.get('/jobs/:jobId', crawlController.getJob);

/**
 * @route   POST /api/crawl/jobs/:jobId/cancel
 * @desc    Cancel a pending or running crawl job
 * @access  Public
 */
router.post('/jobs/:jobId/cancel', crawlController.cancelJob);

export default router;
