/**
 * URL Classifier Tests
 */

import { isMainSection, isSectionLinkText, isSubsection, isValidUrl, mentionsSectionKeyword } from '../url-classifier';

const BASE = 'https://example.com';

describe('isValidUrl', () => {
  it('should accept same-host pages', () => {
    expect(isValidUrl('https://example.com/about', BASE)).toBe(true);
    expect(isValidUrl('https://example.com/', BASE)).toBe(true);
  });

  it('should reject other hosts, including subdomains', () => {
    expect(isValidUrl('https://other.org/about', BASE)).toBe(false);
    expect(isValidUrl('https://blog.example.com/post', BASE)).toBe(false);
  });

  it('should reject a different port', () => {
    expect(isValidUrl('https://example.com:8443/about', BASE)).toBe(false);
  });

  it.each([
    'https://example.com/files/report.pdf',
    'https://example.com/img/logo.PNG',
    'https://example.com/static/site.css',
    'https://example.com/app.js',
    'https://example.com/downloads/archive.zip',
    'https://example.com/feed.xml',
    'https://example.com/video/intro.mp4',
  ])('should reject the asset %s', (url) => {
    expect(isValidUrl(url, BASE)).toBe(false);
  });

  it.each([
    'https://example.com/about#team',
    'https://example.com/user/login',
    'https://example.com/wp-admin/edit',
    'https://example.com/Admin/panel',
  ])('should reject %s', (url) => {
    expect(isValidUrl(url, BASE)).toBe(false);
  });

  it('should reject pseudo-scheme links', () => {
    expect(isValidUrl('mailto:info@example.com', BASE)).toBe(false);
    expect(isValidUrl('tel:+100000000', BASE)).toBe(false);
    expect(isValidUrl('javascript:void(0)', BASE)).toBe(false);
  });

  it('should reject unparseable input', () => {
    expect(isValidUrl('not a url', BASE)).toBe(false);
    expect(isValidUrl('https://example.com/about', 'nope')).toBe(false);
  });

  it('should check extensions on the path, not the query', () => {
    expect(isValidUrl('https://example.com/download?file=a.pdf', BASE)).toBe(true);
  });
});

describe('mentionsSectionKeyword', () => {
  it('should match keywords case-insensitively anywhere in the text', () => {
    expect(mentionsSectionKeyword('About Us')).toBe(true);
    expect(mentionsSectionKeyword('OUR CLIENTS')).toBe(true);
    expect(mentionsSectionKeyword('Latest news')).toBe(true);
  });

  it('should not match unrelated text', () => {
    expect(mentionsSectionKeyword('Products')).toBe(false);
    expect(mentionsSectionKeyword('')).toBe(false);
  });
});

describe('isSectionLinkText', () => {
  it('should match the link-text keywords', () => {
    expect(isSectionLinkText('About Us')).toBe(true);
    expect(isSectionLinkText('Our Portfolio')).toBe(true);
  });

  it('should ignore keywords only used for hrefs', () => {
    expect(isSectionLinkText('Latest news')).toBe(false);
    expect(isSectionLinkText('Careers')).toBe(false);
    expect(isSectionLinkText('Our clients')).toBe(false);
  });
});

describe('isMainSection', () => {
  it('should flag hrefs carrying a section keyword', () => {
    expect(isMainSection('/about')).toBe(true);
    expect(isMainSection('/our-services/')).toBe(true);
    expect(isMainSection('https://example.com/careers')).toBe(true);
  });

  it('should not flag other hrefs', () => {
    expect(isMainSection('/')).toBe(false);
    expect(isMainSection('/products')).toBe(false);
  });
});

describe('isSubsection', () => {
  it('should accept children nested under the parent path', () => {
    expect(isSubsection('https://example.com/services', 'https://example.com/services/tax')).toBe(true);
    expect(isSubsection('/services', '/services/tax')).toBe(true);
    expect(isSubsection('/services/', '/services/tax/')).toBe(true);
  });

  it('should reject the parent itself', () => {
    expect(isSubsection('https://example.com/services', 'https://example.com/services/')).toBe(false);
  });

  it('should reject unrelated paths', () => {
    expect(isSubsection('https://example.com/services', 'https://example.com/about')).toBe(false);
  });

  it('should treat the path as a plain string prefix', () => {
    expect(isSubsection('/service', '/services')).toBe(true);
  });

  it('should treat every page as nested under the root', () => {
    expect(isSubsection('https://example.com/', 'https://example.com/about')).toBe(true);
    expect(isSubsection('https://example.com/', 'https://example.com/')).toBe(false);
  });
});
