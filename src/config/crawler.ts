import { env } from './env';
import type { CrawlConfig } from '../lib/crawling/crawling.types';

/**
 * Crawl configuration from the environment, with per-run overrides
 */
export function buildCrawlConfig(overrides: Partial<CrawlConfig> = {}): CrawlConfig {
  return {
    baseUrl: env.TARGET_WEBSITE_URL,
    maxPages: env.MAX_PAGES_TO_SCRAPE,
    delayBetweenRequests: Math.round(env.SCRAPING_DELAY * 1000),
    maxSubsectionsPerSection: env.MAX_SUBSECTIONS_PER_SECTION,
    maxSweepPages: env.MAX_SWEEP_PAGES,
    pageLoadTimeout: env.PAGE_LOAD_TIMEOUT,
    selectorTimeout: env.SELECTOR_TIMEOUT,
    pageSettleDelay: env.PAGE_SETTLE_DELAY,
    navigationSettleDelay: env.NAVIGATION_SETTLE_DELAY,
    dropdownRevealDelay: env.DROPDOWN_REVEAL_DELAY,
    waitUntil: 'networkidle',
    ...overrides,
  };
}
