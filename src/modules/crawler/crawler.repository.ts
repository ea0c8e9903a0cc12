/**
 * Crawler Repository
 * In-memory store for crawl jobs and their output
 */

import { randomUUID } from 'crypto';
import { CrawlPhase } from '../../lib/crawling/crawling.types';
import { CrawlStatus, ICrawlJob, IStoredCrawlJob } from './crawler.types';

export class CrawlJobRepository {
  private jobs: Map<string, IStoredCrawlJob> = new Map();

  /**
   * Create a new queued job
   */
  create(data: { baseUrl: string; maxPages: number }): ICrawlJob {
    const job: IStoredCrawlJob = {
      id: randomUUID(),
      baseUrl: data.baseUrl,
      maxPages: data.maxPages,
      status: CrawlStatus.QUEUED,
      phase: CrawlPhase.IDLE,
      pageCount: 0,
      createdAt: new Date(),
      pages: [],
      summary: '',
    };
    this.jobs.set(job.id, job);
    return toPublicJob(job);
  }

  /**
   * Find job by ID
   */
  findById(id: string): ICrawlJob | null {
    const job = this.jobs.get(id);
    return job ? toPublicJob(job) : null;
  }

  /**
   * Find job by ID, including pages and summary
   */
  findStoredById(id: string): IStoredCrawlJob | null {
    return this.jobs.get(id) ?? null;
  }

  /**
   * All jobs, newest first
   */
  findAll(): ICrawlJob[] {
    return Array.from(this.jobs.values())
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(toPublicJob);
  }

  /**
   * Jobs currently queued or running
   */
  findActive(): ICrawlJob[] {
    return this.findAll().filter(
      (job) => job.status === CrawlStatus.QUEUED || job.status === CrawlStatus.RUNNING
    );
  }

  /**
   * Merge changes into a job
   */
  update(id: string, changes: Partial<Omit<IStoredCrawlJob, 'id' | 'createdAt'>>): ICrawlJob | null {
    const job = this.jobs.get(id);
    if (!job) {
      return null;
    }

    const updated: IStoredCrawlJob = { ...job, ...changes };
    this.jobs.set(id, updated);
    return toPublicJob(updated);
  }

  /**
   * Update job status, stamping start and completion times
   */
  updateStatus(id: string, status: CrawlStatus, errorMessage?: string): ICrawlJob | null {
    const changes: Partial<IStoredCrawlJob> = { status };
    if (status === CrawlStatus.RUNNING) {
      changes.startedAt = new Date();
    } else if (status !== CrawlStatus.QUEUED) {
      changes.completedAt = new Date();
    }
    if (errorMessage) {
      changes.errorMessage = errorMessage;
    }
    return this.update(id, changes);
  }
}

function toPublicJob(job: IStoredCrawlJob): ICrawlJob {
  const { pages: _pages, summary: _summary, ...publicJob } = job;
  return publicJob;
}

export const crawlJobRepository = new CrawlJobRepository();
