/**
 * Content Extractor
 * Turns a loaded page into a PageRecord, or null when it has no usable text
 */

import type { BrowserPage } from '../browser/browser.types';
import { describeFailure, firstSuccessful, queryText } from '../browser/page-query';
import type { PageRecord } from '../crawling/crawling.types';
import { HtmlProcessor, htmlProcessor as defaultHtmlProcessor } from './html.processor';
import { cleanText, countWords } from './text.processor';

// Content regions, in order of preference
export const CONTENT_SELECTORS = [
  'main',
  'article',
  '.content',
  '#content',
  '.main-content',
  '.page-content',
  '.entry-content',
  '.post-content',
  '[role="main"]',
];

export interface ContentExtractorOptions {
  selectorTimeout: number;
  htmlProcessor?: HtmlProcessor;
  /**
   * Clock in milliseconds
   */
  now?: () => number;
}

export class ContentExtractor {
  private readonly selectorTimeout: number;
  private readonly htmlProcessor: HtmlProcessor;
  private readonly now: () => number;

  constructor(options: ContentExtractorOptions) {
    this.selectorTimeout = options.selectorTimeout;
    this.htmlProcessor = options.htmlProcessor ?? defaultHtmlProcessor;
    this.now = options.now ?? Date.now;
  }

  async extract(page: BrowserPage, url: string, html: string): Promise<PageRecord | null> {
    const parsed = this.htmlProcessor.process(html);

    const title = (await this.renderedText(page, 'h1')) ?? parsed.documentTitle;

    const rawContent =
      (await firstSuccessful([
        ...CONTENT_SELECTORS.map((selector) => () => this.renderedText(page, selector)),
        () => this.renderedText(page, 'body'),
      ])) ?? parsed.text;

    const content = cleanText(rawContent);
    if (!content) {
      return null;
    }

    return Object.freeze({
      url,
      title: title.trim(),
      content,
      headings: Object.freeze([...parsed.headings]),
      metaDescription: parsed.metaDescription,
      scrapedAt: this.now() / 1000,
      wordCount: countWords(content),
    });
  }

  /**
   * Non-blank rendered text of the first match, or null
   */
  private async renderedText(page: BrowserPage, selector: string): Promise<string | null> {
    const result = await queryText(page, selector, this.selectorTimeout);
    if (!result.ok) {
      if (result.reason !== 'absent') {
        console.debug(`[Crawler] Selector ${selector} on ${page.url()}: ${describeFailure(result)}`);
      }
      return null;
    }
    return result.value.trim() ? result.value : null;
  }
}
