/**
 * URL Normalizer Tests
 */

import { dedupePreservingOrder, extractPath, normalizeUrl, resolveUrl } from '../url-normalizer';

describe('normalizeUrl', () => {
  it('should drop the fragment', () => {
    expect(normalizeUrl('https://example.com/about#team')).toBe('https://example.com/about');
  });

  it('should sort query parameters', () => {
    expect(normalizeUrl('https://example.com/search?q=x&a=1')).toBe('https://example.com/search?a=1&q=x');
  });

  it('should lowercase the host', () => {
    expect(normalizeUrl('https://Example.COM/About')).toBe('https://example.com/About');
  });

  it('should strip a trailing slash except on the root path', () => {
    expect(normalizeUrl('https://example.com/services/')).toBe('https://example.com/services');
    expect(normalizeUrl('https://example.com')).toBe('https://example.com/');
    expect(normalizeUrl('https://example.com/')).toBe('https://example.com/');
  });

  it('should return unparseable input unchanged', () => {
    expect(normalizeUrl('not a url')).toBe('not a url');
  });
});

describe('resolveUrl', () => {
  it('should resolve relative hrefs against the base', () => {
    expect(resolveUrl('/about', 'https://example.com/')).toBe('https://example.com/about');
    expect(resolveUrl('team', 'https://example.com/about/')).toBe('https://example.com/about/team');
  });

  it('should trim surrounding whitespace', () => {
    expect(resolveUrl('  /contact \n', 'https://example.com')).toBe('https://example.com/contact');
  });

  it('should keep absolute hrefs', () => {
    expect(resolveUrl('https://other.org/x', 'https://example.com')).toBe('https://other.org/x');
  });

  it('should return null when no URL can be formed', () => {
    expect(resolveUrl('http://', 'https://example.com')).toBeNull();
  });
});

describe('extractPath', () => {
  it('should read the path of an absolute URL', () => {
    expect(extractPath('https://example.com/services/tax?x=1')).toBe('/services/tax');
  });

  it('should accept bare paths', () => {
    expect(extractPath('/services/tax?x=1#top')).toBe('/services/tax');
  });
});

describe('dedupePreservingOrder', () => {
  it('should keep the first occurrence of each URL', () => {
    expect(dedupePreservingOrder(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c']);
  });
});
