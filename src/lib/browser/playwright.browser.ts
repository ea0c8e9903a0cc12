/**
 * Playwright Browser
 * Headless Chromium behind the crawler's BrowserPage port
 */

import { chromium, Browser, ElementHandle, Page } from 'playwright-core';
import { BrowserSetupError, toError } from '../scraping/errors';
import type { LoadState } from '../crawling/crawling.types';
import type { BrowserPage, BrowserSession, NavigationResponse, PageElement } from './browser.types';

export interface PlaywrightLaunchOptions {
  headless: boolean;
  userAgent: string;
  timeout: number;
  /**
   * Chromium binary to drive; Playwright's installed build when unset
   */
  executablePath?: string;
}

class PlaywrightElement implements PageElement {
  constructor(private readonly handle: ElementHandle<SVGElement | HTMLElement>) {}

  getAttribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  innerText(): Promise<string> {
    return this.handle.innerText();
  }

  hover(options?: { timeout?: number }): Promise<void> {
    return this.handle.hover(options);
  }
}

export class PlaywrightPage implements BrowserPage {
  constructor(private readonly page: Page) {}

  async goto(
    url: string,
    options: { waitUntil: LoadState; timeout: number }
  ): Promise<NavigationResponse | null> {
    const response = await this.page.goto(url, options);
    return response ? { status: response.status(), url: response.url() } : null;
  }

  waitForLoadState(state: LoadState, options?: { timeout?: number }): Promise<void> {
    return this.page.waitForLoadState(state, options);
  }

  waitForTimeout(ms: number): Promise<void> {
    return this.page.waitForTimeout(ms);
  }

  async querySelector(selector: string): Promise<PageElement | null> {
    const handle = await this.page.$(selector);
    return handle ? new PlaywrightElement(handle) : null;
  }

  async querySelectorAll(selector: string): Promise<PageElement[]> {
    const handles = await this.page.$$(selector);
    return handles.map((handle) => new PlaywrightElement(handle));
  }

  content(): Promise<string> {
    return this.page.content();
  }

  url(): string {
    return this.page.url();
  }
}

/**
 * Launch Chromium with one context and one page.
 * Any failure here is a setup failure for the whole session.
 */
export async function launchChromiumSession(options: PlaywrightLaunchOptions): Promise<BrowserSession> {
  let browser: Browser;
  try {
    browser = await chromium.launch({
      headless: options.headless,
      executablePath: options.executablePath,
      args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage', '--disable-gpu'],
    });
  } catch (error) {
    throw new BrowserSetupError(`Failed to launch browser: ${toError(error).message}`, { cause: error });
  }

  try {
    const context = await browser.newContext({ userAgent: options.userAgent });
    const page = await context.newPage();
    page.setDefaultTimeout(options.timeout);

    return {
      page: new PlaywrightPage(page),
      close: () => browser.close(),
    };
  } catch (error) {
    await browser.close();
    throw new BrowserSetupError(`Failed to open browser page: ${toError(error).message}`, { cause: error });
  }
}
