/**
 * Test Fixtures
 * A small fake website and page markup reused across tests
 */

import type { PageRecord } from '../../lib/crawling/crawling.types';
import type { FakeSite } from './mocks';

export const BASE_URL = 'https://example.com';
export const HOME_URL = 'https://example.com/';

export const NAV = `<nav>
  <a href="/">Home</a>
  <a href="/about">About</a>
  <a href="/services">Services</a>
  <a href="/contact">Contact</a>
</nav>`;

export function page(title: string, body: string, head = ''): string {
  return `<!DOCTYPE html>
<html>
<head>
  <title>${title}</title>
  ${head}
</head>
<body>
${NAV}
${body}
</body>
</html>`;
}

export const homeHtml = page(
  'Example Home',
  `<main>
  <h1>Welcome to Example</h1>
  <p>We help small teams ship better software.</p>
  <ul>
    <li><a href="/products">Products</a></li>
  </ul>
</main>
<footer>
  <a href="/brochure.pdf">Brochure</a>
  <a href="https://partner.example.org/about">Partner</a>
</footer>`,
  '<meta name="description" content="Example home page">'
);

/**
 * Home, three sections (one with a failing subsection), and two pages
 * only reachable through the final sweep
 */
export const exampleSite: FakeSite = {
  'https://example.com/': { html: homeHtml },
  'https://example.com/about': {
    html: page(
      'About | Example',
      `<main>
  <h1>About Us</h1>
  <p>Example was founded to make software simpler.</p>
  <ul>
    <li><a href="/about/history">Our history</a></li>
    <li><a href="/about/team">Our team</a></li>
  </ul>
</main>`
    ),
  },
  'https://example.com/about/history': {
    html: page('History | Example', '<main><h1>History</h1><p>Started in a garage with two laptops.</p></main>'),
  },
  'https://example.com/about/team': {
    status: 404,
    html: page('Not Found', '<main><h1>Not Found</h1></main>'),
  },
  'https://example.com/services': {
    html: page(
      'Services | Example',
      `<main>
  <h1>Services</h1>
  <p>Consulting and development services for growing teams.</p>
  <ul>
    <li><a href="/services/consulting">Consulting</a></li>
    <li><a href="/services/">All services</a></li>
  </ul>
</main>`
    ),
  },
  'https://example.com/services/consulting': {
    html: page(
      'Consulting | Example',
      `<main>
  <h1>Consulting</h1>
  <p>Hands-on help with architecture reviews.</p>
  <p><a href="/pricing">See pricing</a></p>
</main>`
    ),
  },
  'https://example.com/contact': {
    html: page(
      'Contact | Example',
      '<div class="content"><h2>Contact</h2><p>Write to us any time.</p></div>'
    ),
  },
  'https://example.com/products': {
    html: page('Products | Example', '<main><h1>Products</h1><p>Tools for planning and tracking work.</p></main>'),
  },
  'https://example.com/pricing': {
    html: page('Pricing | Example', '<main><h1>Pricing</h1><p>Plans start small and grow with you.</p></main>'),
  },
};

export function pageRecord(overrides: Partial<PageRecord> = {}): PageRecord {
  return {
    url: 'https://example.com/about',
    title: 'About Us',
    content: 'About Us\nExample was founded to make software simpler.',
    headings: ['About Us'],
    metaDescription: '',
    scrapedAt: 1700000000,
    wordCount: 9,
    ...overrides,
  };
}
