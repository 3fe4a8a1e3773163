/**
 * Dataset Controller
 * HTTP request/response handling for dataset endpoints
 */

import { Request, Response } from 'express';
import { ApiError, asyncHandler } from '../../middleware/error-handler';
import { queryInt, queryString } from '../../lib/http/query';
import { datasetGateway } from './dataset.gateway';
import { IDatasetListResponse } from './dataset.types';

const MAX_PAGE_SIZE = 100;

export class DatasetController {
  /**
   * GET /api/datasets
   * List active datasets, optionally filtered by source or crawl job
   */
  listDatasets = asyncHandler(async (req: Request, res: Response) => {
    const page = queryInt(req.query.page, 1);
    const limit = queryInt(req.query.limit, 20, MAX_PAGE_SIZE);

    const { datasets, total } = await datasetGateway.listDatasets({
      page,
      limit,
      source: queryString(req.query.source),
      crawlJobId: queryString(req.query.crawlJobId),
    });

    const response: IDatasetListResponse = {
      success: true,
      datasets,
      total,
      page,
      limit,
    };

    res.json(response);
  });

  /**
   * GET /api/datasets/:hash
   */
  getDataset = asyncHandler(async (req: Request, res: Response) => {
    const dataset = await datasetGateway.getDataset(req.params.hash);

    if (!dataset) {
      throw new ApiError(404, 'Dataset not found');
    }

    res.json({ success: true, dataset });
  });
}

export const datasetController = new DatasetController();
