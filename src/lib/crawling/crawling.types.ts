/**
 * Crawling Types
 * Type definitions for the section-first website crawler
 */

/**
 * One successfully scraped page. Frozen once created.
 */
export interface PageRecord {
  /**
   * Canonical absolute URL, unique within a crawl session
   */
  readonly url: string;

  /**
   * First-level heading or document title (may be empty)
   */
  readonly title: string;

  /**
   * Cleaned body text, never empty
   */
  readonly content: string;

  /**
   * Heading texts (h1-h6) in document order, duplicates kept
   */
  readonly headings: readonly string[];

  /**
   * Raw meta description, or empty string
   */
  readonly metaDescription: string;

  /**
   * Capture time in seconds since the epoch
   */
  readonly scrapedAt: number;

  /**
   * Whitespace-delimited token count of content
   */
  readonly wordCount: number;
}

/**
 * Crawl session states
 */
export enum CrawlPhase {
  IDLE = 'idle',
  DISCOVERING_NAV = 'discovering_nav',
  SCRAPING_HOME = 'scraping_home',
  SCRAPING_SECTIONS = 'scraping_sections',
  SWEEPING_REMAINDER = 'sweeping_remainder',
  PERSISTING = 'persisting',
  DONE = 'done',
  ABORTED = 'aborted',
}

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

/**
 * Crawl configuration interface
 */
export interface CrawlConfig {
  /**
   * Site root; also the home page
   */
  baseUrl: string;

  /**
   * Hard ceiling on recorded pages
   */
  maxPages: number;

  /**
   * Politeness delay in milliseconds before each section, subsection and sweep fetch
   */
  delayBetweenRequests: number;

  /**
   * Subsections fetched per section page
   */
  maxSubsectionsPerSection: number;

  /**
   * Extra pages fetched by the sweep phase
   */
  maxSweepPages: number;

  /**
   * Navigation timeout in milliseconds
   */
  pageLoadTimeout: number;

  /**
   * Per-query timeout in milliseconds; a timed-out query counts as "element absent"
   */
  selectorTimeout: number;

  /**
   * Pause after each page load
   */
  pageSettleDelay: number;

  /**
   * Pause on the home page before navigation discovery
   */
  navigationSettleDelay: number;

  /**
   * Pause after hovering each dropdown trigger
   */
  dropdownRevealDelay: number;

  /**
   * Load state awaited by every navigation
   */
  waitUntil: LoadState;
}

/**
 * What happened to a single fetch attempt
 */
export type FetchOutcome = 'recorded' | 'empty' | 'failed' | 'skipped';

/**
 * Crawling statistics interface
 */
export interface CrawlingStatistics {
  pagesScraped: number;
  pagesEmpty: number;
  pagesFailed: number;
  pagesSkipped: number;
  linksDiscovered: number;
  duplicatesAvoided: number;
  totalTime: number;
  averagePageTime: number;
  successRate: number;
  phaseDurations: Partial<Record<CrawlPhase, number>>;
}

/**
 * Outcome of a completed crawl session
 */
export interface CrawlResult {
  baseUrl: string;
  records: readonly PageRecord[];
  visitedUrls: string[];
  phase: CrawlPhase;
  cancelled: boolean;
  statistics: CrawlingStatistics;
  startedAt: Date;
  completedAt: Date;
  artifacts?: PersistedArtifacts;
}

/**
 * Files written by a persistence sink
 */
export interface PersistedArtifacts {
  dataFile: string;
  summaryFile: string;
}
