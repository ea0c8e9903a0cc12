/**
 * URL Classifier
 * Pure predicates deciding which links the crawler follows
 */

import { extractPath } from './url-normalizer';

/**
 * Keywords describing top-level site sections
 */
export const SECTION_KEYWORDS = [
  'about',
  'services',
  'team',
  'resources',
  'contact',
  'portfolio',
  'blog',
  'news',
  'careers',
  'clients',
] as const;

/**
 * Keywords matched against visible link text; narrower than the href list
 */
export const LINK_TEXT_KEYWORDS = ['about', 'services', 'team', 'resources', 'contact', 'portfolio', 'blog'] as const;

// Documents, images, stylesheets, scripts, icons, archives, feeds and media
const BLOCKED_EXTENSIONS = [
  '.pdf', '.doc', '.docx', '.xls', '.xlsx', '.ppt', '.pptx',
  '.jpg', '.jpeg', '.png', '.gif', '.svg', '.webp', '.bmp',
  '.css', '.js', '.ico',
  '.zip', '.rar', '.gz', '.tar', '.7z',
  '.xml', '.rss', '.atom',
  '.mp3', '.mp4', '.avi', '.mov',
];

const BLOCKED_PATTERNS = ['#', 'mailto:', 'tel:', 'javascript:', 'login', 'admin', 'wp-admin'];

/**
 * True iff the URL is on the base host, is not a non-HTML asset,
 * and carries no fragment, pseudo-scheme or login/admin path.
 */
export function isValidUrl(url: string, baseUrl: string): boolean {
  let parsed: URL;
  let base: URL;
  try {
    parsed = new URL(url);
    base = new URL(baseUrl);
  } catch {
    return false;
  }

  // Same host only (no subdomains)
  if (parsed.host !== base.host) {
    return false;
  }

  const pathname = parsed.pathname.toLowerCase();
  if (BLOCKED_EXTENSIONS.some((ext) => pathname.endsWith(ext))) {
    return false;
  }

  const lowerUrl = url.toLowerCase();
  if (BLOCKED_PATTERNS.some((pattern) => lowerUrl.includes(pattern))) {
    return false;
  }

  return true;
}

/**
 * True iff the text (an href or link text) mentions a section keyword
 */
export function mentionsSectionKeyword(text: string): boolean {
  const lower = text.toLowerCase();
  return SECTION_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * True iff an anchor's visible text names a section
 */
export function isSectionLinkText(text: string): boolean {
  const lower = text.toLowerCase();
  return LINK_TEXT_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * True iff the raw href looks like a top-level section link
 */
export function isMainSection(href: string): boolean {
  return mentionsSectionKeyword(href);
}

/**
 * True iff the child's path nests under the parent's path.
 * Accepts absolute URLs or bare paths.
 */
export function isSubsection(parentUrl: string, childUrl: string): boolean {
  const parentPath = trimSlashes(extractPath(parentUrl));
  const childPath = trimSlashes(extractPath(childUrl));

  return childPath.startsWith(parentPath) && childPath !== parentPath;
}

function trimSlashes(path: string): string {
  return path.replace(/^\/+|\/+$/g, '');
}
