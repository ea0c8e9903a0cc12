/**
 * Crawler Service
 * Runs crawl jobs in the background, one at a time, and keeps their output
 */

import { buildCrawlConfig } from '../../config/crawler';
import { env } from '../../config/env';
import { BrowserLauncher, launchChromiumSession } from '../../lib/browser';
import type { CrawlConfig } from '../../lib/crawling/crawling.types';
import { toError } from '../../lib/scraping/errors';
import { ApiError } from '../../middleware/error-handler';
import { CrawlOrchestrator, PersistenceSink } from './crawl-orchestrator';
import { FilePersistenceSink, SerializedPageRecord, formatSummary, serializePageRecord } from './crawl-persistence';
import { CrawlJobRepository, crawlJobRepository } from './crawler.repository';
import { CrawlStatus, ICrawlJob, ICreateCrawlJobRequest } from './crawler.types';

const USER_CANCELLED = 'cancelled';
const DEADLINE_REACHED = 'deadline';

export interface CrawlerServiceOptions {
  repository?: CrawlJobRepository;
  launchBrowser?: BrowserLauncher;
  sink?: PersistenceSink;
  /**
   * Applied on top of the environment configuration for every job
   */
  configOverrides?: Partial<CrawlConfig>;
  /**
   * Abort a crawl after this many milliseconds; 0 disables
   */
  deadlineMs?: number;
}

interface ActiveRun {
  controller: AbortController;
  done: Promise<void>;
}

export class CrawlerService {
  private readonly repository: CrawlJobRepository;
  private readonly launchBrowser: BrowserLauncher;
  private readonly sink: PersistenceSink;
  private readonly configOverrides: Partial<CrawlConfig>;
  private readonly deadlineMs: number;
  private readonly runs: Map<string, ActiveRun> = new Map();

  constructor(options: CrawlerServiceOptions = {}) {
    this.repository = options.repository ?? crawlJobRepository;
    this.launchBrowser =
      options.launchBrowser ??
      (() =>
        launchChromiumSession({
          headless: env.HEADLESS,
          userAgent: env.USER_AGENT,
          timeout: env.PAGE_LOAD_TIMEOUT,
          executablePath: env.CHROMIUM_EXECUTABLE_PATH,
        }));
    this.sink = options.sink ?? new FilePersistenceSink(env.DATA_DIR);
    this.configOverrides = options.configOverrides ?? {};
    this.deadlineMs = options.deadlineMs ?? env.CRAWL_DEADLINE_MS;
  }

  /**
   * Validate the request, create a job and start crawling in the background
   */
  createJob(request: ICreateCrawlJobRequest): ICrawlJob {
    const config = buildCrawlConfig({
      ...this.configOverrides,
      ...(request.url !== undefined ? { baseUrl: request.url } : {}),
      ...(request.maxPages !== undefined ? { maxPages: request.maxPages } : {}),
    });

    if (!isHttpUrl(config.baseUrl)) {
      throw new ApiError(400, 'Invalid URL format');
    }
    if (!Number.isInteger(config.maxPages) || config.maxPages < 1) {
      throw new ApiError(400, 'maxPages must be a positive integer');
    }
    if (this.runs.size > 0 || this.repository.findActive().length > 0) {
      throw new ApiError(409, 'A crawl is already running');
    }

    const job = this.repository.create({ baseUrl: config.baseUrl, maxPages: config.maxPages });
    const controller = new AbortController();
    const done = this.executeJob(job.id, config, controller);
    this.runs.set(job.id, { controller, done });

    console.log(`Job ${job.id}: started crawl of ${config.baseUrl}`);
    return this.repository.findById(job.id) ?? job;
  }

  getJob(jobId: string): ICrawlJob | null {
    return this.repository.findById(jobId);
  }

  getJobs(): ICrawlJob[] {
    return this.repository.findAll();
  }

  getPages(jobId: string): SerializedPageRecord[] | null {
    return this.repository.findStoredById(jobId)?.pages ?? null;
  }

  getSummary(jobId: string): string | null {
    return this.repository.findStoredById(jobId)?.summary ?? null;
  }

  /**
   * Signal a queued or running crawl to stop; pages gathered so far are kept
   */
  cancelJob(jobId: string): ICrawlJob | null {
    const job = this.repository.findById(jobId);
    if (!job) {
      return null;
    }

    if (job.status !== CrawlStatus.QUEUED && job.status !== CrawlStatus.RUNNING) {
      throw new ApiError(
        400,
        `Cannot cancel job with status: ${job.status}. Only queued or running jobs can be cancelled.`
      );
    }

    this.runs.get(jobId)?.controller.abort(USER_CANCELLED);
    console.log(`Job ${jobId}: cancellation requested`);
    return this.repository.updateStatus(jobId, CrawlStatus.CANCELLED);
  }

  /**
   * Resolves once the job's crawl has settled
   */
  async waitForJob(jobId: string): Promise<void> {
    await this.runs.get(jobId)?.done;
  }

  /**
   * Cancel whatever is running and wait for it to finish
   */
  async shutdown(): Promise<void> {
    const pending = Array.from(this.runs.entries()).map(([jobId, run]) => {
      run.controller.abort(USER_CANCELLED);
      console.log(`Job ${jobId}: stopping for shutdown`);
      return run.done;
    });
    await Promise.all(pending);
  }

  /**
   * Never rejects: every failure ends up on the job record
   */
  private async executeJob(jobId: string, config: CrawlConfig, controller: AbortController): Promise<void> {
    const deadline =
      this.deadlineMs > 0 ? setTimeout(() => controller.abort(DEADLINE_REACHED), this.deadlineMs) : undefined;

    try {
      this.repository.updateStatus(jobId, CrawlStatus.RUNNING);

      const orchestrator = new CrawlOrchestrator({
        config,
        launchBrowser: this.launchBrowser,
        sink: this.sink,
        signal: controller.signal,
        onPhaseChange: (phase) => {
          this.repository.update(jobId, { phase });
        },
      });

      const result = await orchestrator.crawl();

      this.repository.update(jobId, {
        phase: result.phase,
        pageCount: result.records.length,
        pages: result.records.map(serializePageRecord),
        summary: formatSummary(result.baseUrl, result.records),
        statistics: result.statistics,
        artifacts: result.artifacts,
      });

      const cancelledByUser = result.cancelled && controller.signal.reason === USER_CANCELLED;
      this.repository.updateStatus(jobId, cancelledByUser ? CrawlStatus.CANCELLED : CrawlStatus.COMPLETED);

      if (result.cancelled && !cancelledByUser) {
        console.warn(`Job ${jobId}: deadline of ${this.deadlineMs}ms reached, kept partial crawl`);
      }
      console.log(
        `Job ${jobId}: crawled ${result.records.length} page(s) in ${result.statistics.totalTime}ms`
      );
    } catch (error) {
      this.repository.updateStatus(jobId, CrawlStatus.FAILED, toError(error).message);
      console.error(`Crawl job ${jobId} failed:`, error);
    } finally {
      clearTimeout(deadline);
      this.runs.delete(jobId);
    }
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export const crawlerService = new CrawlerService();
