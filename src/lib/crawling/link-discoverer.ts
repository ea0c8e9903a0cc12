/**
 * Link Discoverer
 * Finds section, subsection and internal links on a loaded page
 */

import type { BrowserPage, PageElement } from '../browser/browser.types';
import { describeFailure, queryAll, readAttribute, readText } from '../browser/page-query';
import { isMainSection, isSectionLinkText, isSubsection, isValidUrl } from './url-classifier';
import { dedupePreservingOrder, normalizeUrl, resolveUrl } from './url-normalizer';

// Navigation containers, in the order their links are collected
const NAVIGATION_SELECTORS = [
  'nav a[href]',
  '.navigation a[href]',
  '.nav a[href]',
  '.menu a[href]',
  '.navbar a[href]',
  'header a[href]',
  '.main-nav a[href]',
  '.primary-nav a[href]',
];

const DROPDOWN_TRIGGER_SELECTOR = 'nav .dropdown, nav .has-dropdown, .menu-item-has-children';

const ANCHOR_SELECTOR = 'a[href]';

export interface LinkDiscovererOptions {
  baseUrl: string;
  selectorTimeout: number;
  dropdownRevealDelay: number;
}

interface AnchorInfo {
  href: string;
  url: string;
  element: PageElement;
}

export class LinkDiscoverer {
  constructor(private readonly options: LinkDiscovererOptions) {}

  /**
   * Section links from the home page: navigation containers first,
   * then any anchor whose text names a section. Never throws.
   */
  async discoverNavigationLinks(page: BrowserPage): Promise<string[]> {
    await this.revealDropdowns(page);

    const links: string[] = [];

    for (const selector of NAVIGATION_SELECTORS) {
      const anchors = await this.collectAnchors(page, selector);
      for (const anchor of anchors) {
        if (isMainSection(anchor.href)) {
          links.push(anchor.url);
        }
      }
    }

    const byText = await this.collectByLinkText(page);
    links.push(...byText);

    const unique = dedupePreservingOrder(links);
    console.log(`[Crawler] Found ${unique.length} navigation link(s)`);
    return unique;
  }

  /**
   * Links on the current page nesting under the parent's path
   */
  async discoverSubsectionLinks(page: BrowserPage, parentUrl: string): Promise<string[]> {
    const anchors = await this.collectAnchors(page, ANCHOR_SELECTOR);
    return dedupePreservingOrder(
      anchors.filter((anchor) => isSubsection(parentUrl, anchor.url)).map((anchor) => anchor.url)
    );
  }

  /**
   * Every valid internal link on the current page
   */
  async discoverInternalLinks(page: BrowserPage): Promise<string[]> {
    const anchors = await this.collectAnchors(page, ANCHOR_SELECTOR);
    return dedupePreservingOrder(anchors.map((anchor) => anchor.url));
  }

  /**
   * Hover dropdown triggers so their menus render. Optional, so failures are only logged.
   */
  private async revealDropdowns(page: BrowserPage): Promise<void> {
    const { selectorTimeout, dropdownRevealDelay } = this.options;
    const triggers = await queryAll(page, DROPDOWN_TRIGGER_SELECTOR, selectorTimeout);
    if (!triggers.ok) {
      console.debug(`[Crawler] Dropdown lookup skipped (${describeFailure(triggers)})`);
      return;
    }

    for (const trigger of triggers.value) {
      try {
        await trigger.hover({ timeout: selectorTimeout });
        await page.waitForTimeout(dropdownRevealDelay);
      } catch (error) {
        console.debug('[Crawler] Could not open dropdown:', error);
      }
    }
  }

  /**
   * Valid anchors for a selector, resolved against the base URL.
   * A failing selector contributes nothing.
   */
  private async collectAnchors(page: BrowserPage, selector: string): Promise<AnchorInfo[]> {
    const { baseUrl, selectorTimeout } = this.options;
    const elements = await queryAll(page, selector, selectorTimeout);
    if (!elements.ok) {
      console.debug(`[Crawler] Selector ${selector} yielded nothing (${describeFailure(elements)})`);
      return [];
    }

    const anchors: AnchorInfo[] = [];
    for (const element of elements.value) {
      const href = await readAttribute(element, 'href', selectorTimeout);
      if (!href.ok || !href.value) continue;

      const absoluteUrl = resolveUrl(href.value, baseUrl);
      if (!absoluteUrl || !isValidUrl(absoluteUrl, baseUrl)) continue;

      anchors.push({ href: href.value, url: normalizeUrl(absoluteUrl), element });
    }

    return anchors;
  }

  /**
   * Anchors whose visible text contains a section keyword
   */
  private async collectByLinkText(page: BrowserPage): Promise<string[]> {
    const anchors = await this.collectAnchors(page, ANCHOR_SELECTOR);
    const links: string[] = [];

    for (const anchor of anchors) {
      const text = await readText(anchor.element, this.options.selectorTimeout);
      if (text.ok && isSectionLinkText(text.value.trim())) {
        links.push(anchor.url);
      }
    }

    return links;
  }
}
