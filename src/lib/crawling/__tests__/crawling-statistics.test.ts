/**
 * Crawling Statistics Tests
 */

import { CrawlPhase } from '../crawling.types';
import { CrawlingStatisticsTracker } from '../crawling-statistics';

describe('CrawlingStatisticsTracker', () => {
  let clock: number;
  let tracker: CrawlingStatisticsTracker;

  beforeEach(() => {
    clock = 1000;
    tracker = new CrawlingStatisticsTracker(() => clock);
  });

  it('should start from zero', () => {
    const stats = tracker.getStatistics();

    expect(stats.pagesScraped).toBe(0);
    expect(stats.successRate).toBe(0);
    expect(stats.averagePageTime).toBe(0);
    expect(stats.phaseDurations).toEqual({});
  });

  it('should count outcomes and compute the success rate over attempts', () => {
    tracker.recordPageScraped(100);
    tracker.recordPageScraped(300);
    tracker.recordPageScraped(200);
    tracker.recordEmpty();
    tracker.recordFailed();
    tracker.recordSkipped();
    tracker.recordDuplicate();
    tracker.recordLinkDiscovery(4);
    tracker.recordLinkDiscovery(2);

    const stats = tracker.getStatistics();
    expect(stats.pagesScraped).toBe(3);
    expect(stats.pagesEmpty).toBe(1);
    expect(stats.pagesFailed).toBe(1);
    expect(stats.pagesSkipped).toBe(1);
    expect(stats.duplicatesAvoided).toBe(1);
    expect(stats.linksDiscovered).toBe(6);
    expect(stats.averagePageTime).toBe(200);
    expect(stats.successRate).toBe(0.6);
  });

  it('should accumulate time spent in each phase', () => {
    tracker.enterPhase(CrawlPhase.DISCOVERING_NAV);
    clock = 1250;
    tracker.enterPhase(CrawlPhase.SCRAPING_HOME);
    clock = 1400;
    tracker.enterPhase(CrawlPhase.DONE);
    clock = 1500;

    const stats = tracker.getStatistics();
    expect(stats.phaseDurations).toEqual({
      [CrawlPhase.DISCOVERING_NAV]: 250,
      [CrawlPhase.SCRAPING_HOME]: 150,
    });
    expect(stats.totalTime).toBe(500);
  });
});
