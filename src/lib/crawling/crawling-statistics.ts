/**
 * Crawling Statistics Tracker
 * Track per-session crawling statistics
 */

import { CrawlPhase, CrawlingStatistics } from './crawling.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pagesScraped: number = 0;
  private pagesEmpty: number = 0;
  private pagesFailed: number = 0;
  private pagesSkipped: number = 0;
  private linksDiscovered: number = 0;
  private duplicatesAvoided: number = 0;
  private pageTimes: number[] = [];
  private phaseDurations: Partial<Record<CrawlPhase, number>> = {};
  private currentPhase: { phase: CrawlPhase; startedAt: number } | null = null;

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = this.now();
  }

  /**
   * Record a page that produced a record
   */
  recordPageScraped(time: number): void {
    this.pagesScraped++;
    this.pageTimes.push(time);
  }

  /**
   * Record a page that loaded but had no usable content
   */
  recordEmpty(): void {
    this.pagesEmpty++;
  }

  /**
   * Record a failed page
   */
  recordFailed(): void {
    this.pagesFailed++;
  }

  /**
   * Record a candidate that was never fetched (budget or cancellation)
   */
  recordSkipped(): void {
    this.pagesSkipped++;
  }

  /**
   * Record link discovery
   */
  recordLinkDiscovery(count: number): void {
    this.linksDiscovered += count;
  }

  /**
   * Record a candidate dropped because it was already visited
   */
  recordDuplicate(): void {
    this.duplicatesAvoided++;
  }

  /**
   * Close the running phase (if any) and start timing the next one
   */
  enterPhase(phase: CrawlPhase): void {
    const now = this.now();
    if (this.currentPhase) {
      const { phase: previous, startedAt } = this.currentPhase;
      this.phaseDurations[previous] = (this.phaseDurations[previous] ?? 0) + (now - startedAt);
    }
    this.currentPhase = { phase, startedAt: now };
  }

  /**
   * Get final statistics
   */
  getStatistics(): CrawlingStatistics {
    const totalTime = this.now() - this.startTime;
    const averagePageTime =
      this.pageTimes.length > 0
        ? this.pageTimes.reduce((sum, time) => sum + time, 0) / this.pageTimes.length
        : 0;

    const totalAttempts = this.pagesScraped + this.pagesEmpty + this.pagesFailed;
    const successRate = totalAttempts > 0 ? this.pagesScraped / totalAttempts : 0;

    return {
      pagesScraped: this.pagesScraped,
      pagesEmpty: this.pagesEmpty,
      pagesFailed: this.pagesFailed,
      pagesSkipped: this.pagesSkipped,
      linksDiscovered: this.linksDiscovered,
      duplicatesAvoided: this.duplicatesAvoided,
      totalTime,
      averagePageTime,
      successRate,
      phaseDurations: { ...this.phaseDurations },
    };
  }
}
