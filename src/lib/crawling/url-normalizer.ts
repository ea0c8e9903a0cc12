/**
 * URL Normalization Utilities
 * Functions for resolving and canonicalizing URLs
 */

/**
 * Canonicalize an absolute URL: drop the fragment, sort query params,
 * lowercase the hostname and remove the trailing slash (except for root).
 * Returns the input unchanged when it cannot be parsed.
 */
export function normalizeUrl(url: string): string {
  try {
    const urlObj = new URL(url);

    // Remove fragment
    urlObj.hash = '';

    // Sort query parameters
    const sortedParams = Array.from(urlObj.searchParams.entries()).sort(([a], [b]) =>
      a.localeCompare(b)
    );
    urlObj.search = '';
    sortedParams.forEach(([key, value]) => {
      urlObj.searchParams.append(key, value);
    });

    // Remove trailing slash (except for root)
    const pathname = urlObj.pathname;
    if (pathname.length > 1 && pathname.endsWith('/')) {
      urlObj.pathname = pathname.slice(0, -1);
    }

    urlObj.hostname = urlObj.hostname.toLowerCase();

    return urlObj.href;
  } catch {
    return url;
  }
}

/**
 * Resolve an href against the site's base URL.
 * Returns null for hrefs that do not form a URL.
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href.trim(), baseUrl).href;
  } catch {
    return null;
  }
}

/**
 * Path of a URL, or of a bare path such as "/services/tax"
 */
export function extractPath(urlOrPath: string): string {
  try {
    return new URL(urlOrPath).pathname;
  } catch {
    return urlOrPath.split(/[?#]/)[0];
  }
}

/**
 * Deduplicate while preserving first-seen order
 */
export function dedupePreservingOrder(urls: Iterable<string>): string[] {
  return Array.from(new Set(urls));
}
