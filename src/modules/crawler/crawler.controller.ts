/**
 * Crawler Controller
 * HTTP request/response handling for crawl endpoints
 */

import { Request, Response } from 'express';
import { ApiError, asyncHandler } from '../../middleware/error-handler';
import { CrawlerService, crawlerService } from './crawler.service';
import {
  ICrawlJobResponse,
  ICrawlListResponse,
  ICrawlPagesResponse,
  ICreateCrawlJobRequest,
} from './crawler.types';

/**
 * Pull url and maxPages out of an untyped request body
 */
export function parseCreateRequest(body: unknown): ICreateCrawlJobRequest {
  if (body === undefined || body === null) {
    return {};
  }
  if (typeof body !== 'object' || Array.isArray(body)) {
    throw new ApiError(400, 'Request body must be a JSON object');
  }

  const fields: Record<string, unknown> = { ...body };
  const request: ICreateCrawlJobRequest = {};

  if (fields.url !== undefined) {
    if (typeof fields.url !== 'string' || fields.url.trim() === '') {
      throw new ApiError(400, 'url must be a non-empty string');
    }
    request.url = fields.url.trim();
  }

  if (fields.maxPages !== undefined) {
    if (typeof fields.maxPages !== 'number') {
      throw new ApiError(400, 'maxPages must be a positive integer');
    }
    request.maxPages = fields.maxPages;
  }

  return request;
}

export class CrawlerController {
  constructor(private readonly service: CrawlerService = crawlerService) {}

  /**
   * POST /api/crawl
   * Start a crawl of the configured (or given) site
   */
  createJob = asyncHandler(async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const job = this.service.createJob(parseCreateRequest(body));

    const response: ICrawlJobResponse = {
      success: true,
      job,
    };

    res.status(201).json(response);
  });

  /**
   * GET /api/crawl
   */
  getJobs = asyncHandler(async (_req: Request, res: Response) => {
    const jobs = this.service.getJobs();

    const response: ICrawlListResponse = {
      success: true,
      jobs,
      total: jobs.length,
    };

    res.json(response);
  });

  /**
   * GET /api/crawl/:id
   */
  getJob = asyncHandler(async (req: Request, res: Response) => {
    const job = this.service.getJob(req.params.id);

    if (!job) {
      throw new ApiError(404, 'Crawl job not found');
    }

    const response: ICrawlJobResponse = {
      success: true,
      job,
    };

    res.json(response);
  });

  /**
   * GET /api/crawl/:id/pages
   */
  getPages = asyncHandler(async (req: Request, res: Response) => {
    const pages = this.service.getPages(req.params.id);

    if (!pages) {
      throw new ApiError(404, 'Crawl job not found');
    }

    const response: ICrawlPagesResponse = {
      success: true,
      pages,
      total: pages.length,
    };

    res.json(response);
  });

  /**
   * GET /api/crawl/:id/summary
   * Plain-text summary in the same format as the summary file
   */
  getSummary = asyncHandler(async (req: Request, res: Response) => {
    const summary = this.service.getSummary(req.params.id);

    if (summary === null) {
      throw new ApiError(404, 'Crawl job not found');
    }

    res.type('text/plain').send(summary);
  });

  /**
   * POST /api/crawl/:id/cancel
   */
  cancelJob = asyncHandler(async (req: Request, res: Response) => {
    const job = this.service.cancelJob(req.params.id);

    if (!job) {
      throw new ApiError(404, 'Crawl job not found');
    }

    const response: ICrawlJobResponse = {
      success: true,
      job,
    };

    res.json(response);
  });
}

export const crawlerController = new CrawlerController();
