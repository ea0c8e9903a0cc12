/**
 * Browser Types
 * The slice of browser automation the crawler depends on
 */

import type { LoadState } from '../crawling/crawling.types';

export interface NavigationResponse {
  status: number;
  url: string;
}

export interface PageElement {
  getAttribute(name: string): Promise<string | null>;
  innerText(): Promise<string>;
  hover(options?: { timeout?: number }): Promise<void>;
}

export interface BrowserPage {
  /**
   * Navigate; resolves null when the navigation produced no response
   */
  goto(
    url: string,
    options: { waitUntil: LoadState; timeout: number }
  ): Promise<NavigationResponse | null>;
  waitForLoadState(state: LoadState, options?: { timeout?: number }): Promise<void>;
  waitForTimeout(ms: number): Promise<void>;
  querySelector(selector: string): Promise<PageElement | null>;
  querySelectorAll(selector: string): Promise<PageElement[]>;
  content(): Promise<string>;
  url(): string;
}

export interface BrowserSession {
  page: BrowserPage;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<BrowserSession>;
