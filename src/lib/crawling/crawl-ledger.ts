/**
 * Crawl Ledger
 * Visited set, ordered page records and the page budget of one crawl session
 */

import { LedgerError } from '../scraping/errors';
import { PageRecord } from './crawling.types';

export class CrawlLedger {
  private readonly visitedUrls: Set<string> = new Set();
  private readonly records: PageRecord[] = [];

  constructor(readonly maxPages: number) {
    if (!Number.isInteger(maxPages) || maxPages < 1) {
      throw new RangeError(`maxPages must be a positive integer, got ${maxPages}`);
    }
  }

  /**
   * Check if URL has already been fetched or attempted
   */
  alreadyVisited(url: string): boolean {
    return this.visitedUrls.has(url);
  }

  /**
   * Mark URL visited; false when it already was
   */
  claim(url: string): boolean {
    if (this.visitedUrls.has(url)) {
      return false;
    }

    this.visitedUrls.add(url);
    return true;
  }

  /**
   * Append a page record and mark its URL visited
   */
  record(page: PageRecord): void {
    if (!this.budgetRemaining()) {
      throw new LedgerError(`Page budget of ${this.maxPages} exhausted, cannot record ${page.url}`);
    }
    if (this.records.some((existing) => existing.url === page.url)) {
      throw new LedgerError(`Page already recorded: ${page.url}`);
    }

    this.records.push(page);
    this.visitedUrls.add(page.url);
  }

  budgetRemaining(): boolean {
    return this.records.length < this.maxPages;
  }

  get pagesScraped(): number {
    return this.records.length;
  }

  /**
   * Records in scrape order
   */
  getRecords(): readonly PageRecord[] {
    return [...this.records];
  }

  getVisitedUrls(): string[] {
    return Array.from(this.visitedUrls);
  }
}
