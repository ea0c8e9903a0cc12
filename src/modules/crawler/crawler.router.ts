/**
 * Crawler Router
 * Route definitions for crawl endpoints
 */

import { Router } from 'express';
import { CrawlerController, crawlerController } from './crawler.controller';

export function createCrawlerRouter(controller: CrawlerController = crawlerController): Router {
  const router = Router();

  /**
   * @route   POST /api/crawl
   * @desc    Start a crawl
   */
  router.post('/', controller.createJob);

  /**
   * @route   GET /api/crawl
   * @desc    List crawl jobs, newest first
   */
  router.get('/', controller.getJobs);

  /**
   * @route   GET /api/crawl/:id
   * @desc    Get a crawl job
   */
  router.get('/:id', controller.getJob);

  /**
   * @route   GET /api/crawl/:id/pages
   * @desc    Get the page records of a crawl job
   */
  router.get('/:id/pages', controller.getPages);

  /**
   * @route   GET /api/crawl/:id/summary
   * @desc    Get the text summary of a crawl job
   */
  router.get('/:id/summary', controller.getSummary);

  /**
   * @route   POST /api/crawl/:id/cancel
   * @desc    Cancel a queued or running crawl
   */
  router.post('/:id/cancel', controller.cancelJob);

  return router;
}

export default createCrawlerRouter;
