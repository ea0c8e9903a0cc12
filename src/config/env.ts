import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Crawl target
  TARGET_WEBSITE_URL: process.env.TARGET_WEBSITE_URL || 'https://example.com',
  SCRAPING_DELAY: parseFloat(process.env.SCRAPING_DELAY || '1'), // seconds between requests
  MAX_PAGES_TO_SCRAPE: parseInt(process.env.MAX_PAGES_TO_SCRAPE || '50', 10),
  DATA_DIR: process.env.DATA_DIR || 'data',

  // Crawl shape
  MAX_SUBSECTIONS_PER_SECTION: parseInt(process.env.MAX_SUBSECTIONS_PER_SECTION || '5', 10),
  MAX_SWEEP_PAGES: parseInt(process.env.MAX_SWEEP_PAGES || '10', 10),
  CRAWL_DEADLINE_MS: parseInt(process.env.CRAWL_DEADLINE_MS || '0', 10), // 0 = no deadline

  // Browser
  HEADLESS: process.env.HEADLESS !== 'false', // Default true
  CHROMIUM_EXECUTABLE_PATH: process.env.CHROMIUM_EXECUTABLE_PATH || undefined,
  USER_AGENT: process.env.USER_AGENT || 'Mozilla/5.0 (compatible; SiteCrawler/1.0)',
  PAGE_LOAD_TIMEOUT: parseInt(process.env.PAGE_LOAD_TIMEOUT || '30000', 10),
  SELECTOR_TIMEOUT: parseInt(process.env.SELECTOR_TIMEOUT || '5000', 10),
  PAGE_SETTLE_DELAY: parseInt(process.env.PAGE_SETTLE_DELAY || '2000', 10), // after each page load
  NAVIGATION_SETTLE_DELAY: parseInt(process.env.NAVIGATION_SETTLE_DELAY || '3000', 10), // home page before nav discovery
  DROPDOWN_REVEAL_DELAY: parseInt(process.env.DROPDOWN_REVEAL_DELAY || '500', 10),
} as const;

export default env;
