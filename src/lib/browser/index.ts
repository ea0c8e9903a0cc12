/**
 * Browser
 * Main export file for browser automation
 */

export * from './browser.types';
export * from './page-query';
export * from './playwright.browser';
