/**
 * Crawl Orchestrator
 * Section-first crawl of one website:
 * navigation discovery → home page → sections + subsections → sweep → persist
 */

import type { BrowserLauncher, BrowserPage, BrowserSession } from '../../lib/browser/browser.types';
import {
  CrawlConfig,
  CrawlLedger,
  CrawlPhase,
  CrawlResult,
  CrawlingStatisticsTracker,
  FetchOutcome,
  LinkDiscoverer,
  PersistedArtifacts,
  PageRecord,
  dedupePreservingOrder,
  normalizeUrl,
} from '../../lib/crawling';
import { ContentExtractor } from '../../lib/processing';
import {
  BrowserSetupError,
  NavigationError,
  ScrapingError,
  classifyError,
  toError,
} from '../../lib/scraping/errors';

export interface PersistenceSink {
  persist(baseUrl: string, records: readonly PageRecord[]): Promise<PersistedArtifacts>;
}

export interface CrawlOrchestratorOptions {
  config: CrawlConfig;
  launchBrowser: BrowserLauncher;
  sink?: PersistenceSink;
  /**
   * Checked at every phase boundary and before every fetch
   */
  signal?: AbortSignal;
  onPhaseChange?: (phase: CrawlPhase) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class CrawlOrchestrator {
  private readonly config: CrawlConfig;
  private readonly homeUrl: string;
  private readonly ledger: CrawlLedger;
  private readonly discoverer: LinkDiscoverer;
  private readonly extractor: ContentExtractor;
  private readonly stats: CrawlingStatisticsTracker;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private phase: CrawlPhase = CrawlPhase.IDLE;
  private started = false;

  constructor(private readonly options: CrawlOrchestratorOptions) {
    this.config = options.config;
    this.homeUrl = normalizeUrl(options.config.baseUrl);
    this.ledger = new CrawlLedger(options.config.maxPages);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.stats = new CrawlingStatisticsTracker(this.now);
    this.discoverer = new LinkDiscoverer({
      baseUrl: this.homeUrl,
      selectorTimeout: options.config.selectorTimeout,
      dropdownRevealDelay: options.config.dropdownRevealDelay,
    });
    this.extractor = new ContentExtractor({
      selectorTimeout: options.config.selectorTimeout,
      now: this.now,
    });
  }

  get currentPhase(): CrawlPhase {
    return this.phase;
  }

  /**
   * Run the crawl once. Only setup failures (and a failing sink) reject.
   */
  async crawl(): Promise<CrawlResult> {
    if (this.started) {
      throw new Error('CrawlOrchestrator instances run a single crawl');
    }
    this.started = true;

    const startedAt = new Date(this.now());
    console.log(`[Crawler] Starting crawl of ${this.homeUrl} (max ${this.config.maxPages} pages)`);

    let session: BrowserSession;
    try {
      session = await this.options.launchBrowser();
    } catch (error) {
      this.transition(CrawlPhase.ABORTED);
      console.error('[Crawler] Browser setup failed:', error);
      throw error instanceof BrowserSetupError
        ? error
        : new BrowserSetupError(`Failed to start browser: ${toError(error).message}`, { cause: error });
    }

    try {
      await this.runPhases(session.page);
    } catch (error) {
      this.transition(CrawlPhase.ABORTED);
      console.error('[Crawler] Crawl aborted:', error);
      throw error;
    } finally {
      await this.closeSession(session);
    }

    let artifacts: PersistedArtifacts | undefined;
    this.transition(CrawlPhase.PERSISTING);
    if (this.options.sink) {
      try {
        artifacts = await this.options.sink.persist(this.homeUrl, this.ledger.getRecords());
      } catch (error) {
        this.transition(CrawlPhase.ABORTED);
        console.error('[Crawler] Failed to persist crawl output:', error);
        throw error;
      }
    }

    this.transition(CrawlPhase.DONE);
    console.log(`[Crawler] Crawl completed. Total pages scraped: ${this.ledger.pagesScraped}`);

    return {
      baseUrl: this.homeUrl,
      records: this.ledger.getRecords(),
      visitedUrls: this.ledger.getVisitedUrls(),
      phase: this.phase,
      cancelled: this.cancelled,
      statistics: this.stats.getStatistics(),
      startedAt,
      completedAt: new Date(this.now()),
      artifacts,
    };
  }

  private get cancelled(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  private transition(phase: CrawlPhase): void {
    this.phase = phase;
    this.stats.enterPhase(phase);
    this.options.onPhaseChange?.(phase);
  }

  private async runPhases(page: BrowserPage): Promise<void> {
    if (this.cancelled) return this.logCancelled();
    this.transition(CrawlPhase.DISCOVERING_NAV);
    const sections = await this.discoverSections(page);

    if (this.cancelled) return this.logCancelled();
    this.transition(CrawlPhase.SCRAPING_HOME);
    await this.scrapePage(page, this.homeUrl);

    if (this.cancelled) return this.logCancelled();
    this.transition(CrawlPhase.SCRAPING_SECTIONS);
    await this.scrapeSections(page, sections);

    if (this.cancelled) return this.logCancelled();
    this.transition(CrawlPhase.SWEEPING_REMAINDER);
    await this.sweepRemainder(page);
  }

  private logCancelled(): void {
    console.warn(`[Crawler] Crawl cancelled during ${this.phase}; keeping ${this.ledger.pagesScraped} page(s)`);
  }

  /**
   * Load the home page and collect section links. A failing load means no seeds.
   */
  private async discoverSections(page: BrowserPage): Promise<string[]> {
    console.log('[Crawler] Extracting navigation structure...');
    try {
      await page.goto(this.homeUrl, { waitUntil: this.config.waitUntil, timeout: this.config.pageLoadTimeout });
      await page.waitForTimeout(this.config.navigationSettleDelay);
    } catch (error) {
      const classified = this.ensureRecoverable(error);
      console.warn(`[Crawler] Could not load home page for navigation discovery: ${classified.message}`);
      return [];
    }

    const sections = await this.discoverer.discoverNavigationLinks(page);
    this.stats.recordLinkDiscovery(sections.length);
    console.log(`[Crawler] Navigation links: ${sections.join(', ') || '(none)'}`);
    return sections;
  }

  private async scrapeSections(page: BrowserPage, sections: string[]): Promise<void> {
    for (const sectionUrl of sections) {
      if (!this.canFetch()) break;
      if (this.ledger.alreadyVisited(sectionUrl)) {
        this.stats.recordDuplicate();
        continue;
      }

      console.log(`[Crawler] Scraping main section: ${sectionUrl}`);
      await this.sleep(this.config.delayBetweenRequests);
      const outcome = await this.scrapePage(page, sectionUrl);
      if (outcome !== 'recorded' && outcome !== 'empty') continue;

      const subsections = (await this.discoverer.discoverSubsectionLinks(page, sectionUrl)).slice(
        0,
        this.config.maxSubsectionsPerSection
      );
      this.stats.recordLinkDiscovery(subsections.length);

      for (const subsectionUrl of subsections) {
        if (!this.canFetch()) return;
        if (this.ledger.alreadyVisited(subsectionUrl)) {
          this.stats.recordDuplicate();
          continue;
        }

        await this.sleep(this.config.delayBetweenRequests);
        await this.scrapePage(page, subsectionUrl);
      }
    }
  }

  /**
   * Revisit recorded pages, gather internal links nobody followed yet and fetch a few
   */
  private async sweepRemainder(page: BrowserPage): Promise<void> {
    if (!this.ledger.budgetRemaining()) return;

    const harvested: string[] = [];
    for (const record of this.ledger.getRecords()) {
      if (this.cancelled) return;
      try {
        const response = await page.goto(record.url, {
          waitUntil: this.config.waitUntil,
          timeout: this.config.pageLoadTimeout,
        });
        if (!response || response.status !== 200) continue;
      } catch (error) {
        const classified = this.ensureRecoverable(error);
        console.warn(`[Crawler] Could not revisit ${record.url}: ${classified.message}`);
        continue;
      }
      harvested.push(...(await this.discoverer.discoverInternalLinks(page)));
    }

    const remaining = dedupePreservingOrder(harvested)
      .filter((url) => !this.ledger.alreadyVisited(url))
      .slice(0, this.config.maxSweepPages);
    this.stats.recordLinkDiscovery(remaining.length);
    console.log(`[Crawler] Sweep found ${remaining.length} unvisited internal link(s)`);

    for (const url of remaining) {
      if (!this.canFetch()) break;
      await this.sleep(this.config.delayBetweenRequests);
      await this.scrapePage(page, url);
    }
  }

  private canFetch(): boolean {
    return !this.cancelled && this.ledger.budgetRemaining();
  }

  /**
   * Fetch and extract one URL. The URL counts as visited from the moment it is attempted.
   */
  private async scrapePage(page: BrowserPage, url: string): Promise<FetchOutcome> {
    if (!this.canFetch()) {
      this.stats.recordSkipped();
      return 'skipped';
    }
    if (!this.ledger.claim(url)) {
      this.stats.recordDuplicate();
      return 'skipped';
    }

    const startedAt = this.now();
    console.log(`[Crawler] Scraping page: ${url}`);

    let record: PageRecord | null;
    try {
      const response = await page.goto(url, {
        waitUntil: this.config.waitUntil,
        timeout: this.config.pageLoadTimeout,
      });
      if (!response) {
        throw new NavigationError(url, `No response for ${url}`);
      }
      if (response.status !== 200) {
        throw new NavigationError(url, `HTTP ${response.status} for ${url}`, response.status);
      }

      await this.settle(page);
      const html = await page.content();
      record = await this.extractor.extract(page, url, html);
    } catch (error) {
      const classified = this.ensureRecoverable(error);
      console.warn(
        `[Crawler] Failed to load ${url}: ${classified.type}${classified.statusCode ? ` (HTTP ${classified.statusCode})` : ''} - ${classified.message}`
      );
      this.stats.recordFailed();
      return 'failed';
    }

    if (!record) {
      console.warn(`[Crawler] No content extracted from: ${url}`);
      this.stats.recordEmpty();
      return 'empty';
    }

    this.ledger.record(record);
    this.stats.recordPageScraped(this.now() - startedAt);
    console.log(`[Crawler] Successfully scraped: ${url} (${record.wordCount} words)`);
    return 'recorded';
  }

  /**
   * Give client-side rendering a moment before reading the DOM
   */
  private async settle(page: BrowserPage): Promise<void> {
    await page.waitForTimeout(this.config.pageSettleDelay);
    try {
      await page.waitForLoadState('domcontentloaded', { timeout: this.config.pageLoadTimeout });
    } catch (error) {
      console.debug(`[Crawler] Load state wait ended early on ${page.url()}:`, toError(error).message);
    }
  }

  /**
   * Classify a page-level failure; rethrow the ones that end the session
   */
  private ensureRecoverable(error: unknown): ScrapingError {
    const classified = classifyError(error);
    if (!classified.recoverable) {
      throw new BrowserSetupError(classified.message, { cause: error });
    }
    return classified;
  }

  private async closeSession(session: BrowserSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      console.warn('[Crawler] Failed to close browser:', toError(error).message);
    }
  }
}
