/**
 * Crawler Module Types
 * Job and API shapes for crawl runs
 */

import type { CrawlPhase, CrawlingStatistics, PersistedArtifacts } from '../../lib/crawling/crawling.types';
import type { SerializedPageRecord } from './crawl-persistence';

// ============================================================================
// Enums
// ============================================================================

export enum CrawlStatus {
  QUEUED = 'queued',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

// ============================================================================
// Core Interfaces
// ============================================================================

export interface ICrawlJob {
  id: string;
  baseUrl: string;
  maxPages: number;
  status: CrawlStatus;
  phase: CrawlPhase;
  pageCount: number;
  statistics?: CrawlingStatistics;
  artifacts?: PersistedArtifacts;
  errorMessage?: string;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

/**
 * A job together with its crawl output
 */
export interface IStoredCrawlJob extends ICrawlJob {
  pages: SerializedPageRecord[];
  summary: string;
}

// ============================================================================
// API Request/Response Types
// ============================================================================

export interface ICreateCrawlJobRequest {
  url?: string;
  maxPages?: number;
}

export interface ICrawlJobResponse {
  success: boolean;
  job: ICrawlJob;
}

export interface ICrawlListResponse {
  success: boolean;
  jobs: ICrawlJob[];
  total: number;
}

export interface ICrawlPagesResponse {
  success: boolean;
  pages: SerializedPageRecord[];
  total: number;
}
