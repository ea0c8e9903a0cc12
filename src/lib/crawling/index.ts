/**
 * Crawling System
 * Main export file for crawling utilities
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './url-classifier';
export * from './crawl-ledger';
export * from './link-discoverer';
export * from './crawling-statistics';
