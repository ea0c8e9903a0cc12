#!/usr/bin/env node
/**
 * Command-line entry point
 * Usage: site-crawl [url] [maxPages]
 */

import { buildCrawlConfig } from './config/crawler';
import { env } from './config/env';
import type { CrawlConfig, CrawlResult } from './lib/crawling/crawling.types';
import { launchChromiumSession } from './lib/browser';
import { CrawlOrchestrator } from './modules/crawler/crawl-orchestrator';
import { FilePersistenceSink } from './modules/crawler/crawl-persistence';

/**
 * Map positional arguments onto config overrides
 */
export function parseCliArgs(argv: readonly string[]): Partial<CrawlConfig> {
  const [url, maxPages] = argv;
  const overrides: Partial<CrawlConfig> = {};

  if (url) {
    overrides.baseUrl = url;
  }
  if (maxPages !== undefined) {
    const parsed = Number(maxPages);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new Error(`maxPages must be a positive integer, got "${maxPages}"`);
    }
    overrides.maxPages = parsed;
  }

  return overrides;
}

export async function runCrawl(argv: readonly string[]): Promise<CrawlResult> {
  const config = buildCrawlConfig(parseCliArgs(argv));
  const controller = new AbortController();
  const deadline =
    env.CRAWL_DEADLINE_MS > 0 ? setTimeout(() => controller.abort(), env.CRAWL_DEADLINE_MS) : undefined;
  const onInterrupt = (): void => {
    console.warn('[Crawler] Interrupted, finishing with the pages gathered so far');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const orchestrator = new CrawlOrchestrator({
      config,
      launchBrowser: () =>
        launchChromiumSession({
          headless: env.HEADLESS,
          userAgent: env.USER_AGENT,
          timeout: env.PAGE_LOAD_TIMEOUT,
          executablePath: env.CHROMIUM_EXECUTABLE_PATH,
        }),
      sink: new FilePersistenceSink(env.DATA_DIR),
      signal: controller.signal,
    });
    return await orchestrator.crawl();
  } finally {
    clearTimeout(deadline);
    process.removeListener('SIGINT', onInterrupt);
  }
}

if (require.main === module) {
  runCrawl(process.argv.slice(2))
    .then((result) => {
      console.log(`Scraped ${result.records.length} page(s) from ${result.baseUrl}`);
      if (result.artifacts) {
        console.log(`Data: ${result.artifacts.dataFile}`);
        console.log(`Summary: ${result.artifacts.summaryFile}`);
      }
    })
    .catch((error: unknown) => {
      console.error('Crawl failed:', error);
      process.exitCode = 1;
    });
}
