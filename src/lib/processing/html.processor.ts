/**
 * HTML Processor
 * Parses a copy of the rendered markup and pulls out title, meta, headings
 * and boilerplate-free text
 */

import * as cheerio from 'cheerio';

// Removed before any text is read from the parsed copy
const NON_CONTENT_SELECTORS = [
  'script',
  'style',
  'noscript',
  'nav',
  'footer',
  'header',
  'aside',
  '.advertisement',
  '.ads',
  '.ad-banner',
  '.ad-container',
  '[class*="advert"]',
];

const HEADING_SELECTOR = 'h1, h2, h3, h4, h5, h6';

export interface ProcessedHtml {
  documentTitle: string;
  metaDescription: string;
  headings: string[];
  text: string;
  metadata: {
    originalLength: number;
    removedElements: number;
  };
}

export class HtmlProcessor {
  process(html: string): ProcessedHtml {
    if (!html || html.trim().length === 0) {
      return {
        documentTitle: '',
        metaDescription: '',
        headings: [],
        text: '',
        metadata: {
          originalLength: 0,
          removedElements: 0,
        },
      };
    }

    const $ = cheerio.load(html);

    const documentTitle = $('title').first().text().trim();
    const metaDescription = $('meta[name="description"]').first().attr('content') ?? '';

    const noise = $(NON_CONTENT_SELECTORS.join(', '));
    const removedElements = noise.length;
    noise.remove();

    const headings: string[] = [];
    $(HEADING_SELECTOR).each((_, el) => {
      const text = $(el).text().trim();
      if (text) {
        headings.push(text);
      }
    });

    const body = $('body');
    const text = body.length > 0 ? body.text() : $.root().text();

    return {
      documentTitle,
      metaDescription,
      headings,
      text,
      metadata: {
        originalLength: html.length,
        removedElements,
      },
    };
  }
}

export const htmlProcessor = new HtmlProcessor();
