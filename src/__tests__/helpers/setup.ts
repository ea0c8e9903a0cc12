/**
 * Jest Test Setup
 * Global test configuration and setup
 */

import * as os from 'os';
import * as path from 'path';

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.TARGET_WEBSITE_URL = 'https://example.com';
process.env.SCRAPING_DELAY = '0';
process.env.PAGE_SETTLE_DELAY = '0';
process.env.NAVIGATION_SETTLE_DELAY = '0';
process.env.DROPDOWN_REVEAL_DELAY = '0';
process.env.SELECTOR_TIMEOUT = '50';
process.env.DATA_DIR = path.join(os.tmpdir(), 'site-crawler-test-data');

// Suppress console logs during tests (optional, uncomment if needed)
// global.console = {
//   ...console,
//   log: jest.fn(),
//   debug: jest.fn(),
//   info: jest.fn(),
//   warn: jest.fn(),
//   error: jest.fn(),
// };
