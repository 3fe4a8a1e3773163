/**
 * Dataset Router
 * Route definitions for dataset endpoints
 */

import { Router } from 'express';
import { datasetController } from './dataset.controller';

const router = Router();

/**
 * @route   GET /api/datasets
 * @desc    List datasets (page, limit, source, crawlJobId)
 * @access  Public
 */
router.get('/', datasetController.listDatasets);

/**
 * @route   GET /api/datasets/:hash
 * @desc    Get a dataset by identity hash
 * @access  Public
 */
router.get('/:hash', datasetController.getDataset);

export default router;
