import { describe, it, expect } from 'vitest';
import { canonUrl, hostOf, isHttpUrl, isSameSite, registrableDomain, resolveUrl, visitKey } from './canonicalize.js';

describe('canonUrl', () => {
  it('should drop query, fragment and trailing slashes', () => {
    expect(canonUrl('https://Shop.Example.com/products/widget/?utm_source=x#top')).toBe(
      'https://shop.example.com/products/widget'
    );
  });

  it('should be idempotent', () => {
    const urls = [
      'https://shop.test/products/widget/',
      'http://www.shop.test/?page=2',
      'https://shop.test',
      'mailto:sales@shop.test/',
      'not a url//',
      '',
    ];
    for (const url of urls) {
      expect(canonUrl(canonUrl(url))).toBe(canonUrl(url));
    }
  });

  it('should only strip trailing slashes from non-http input', () => {
    expect(canonUrl('mailto:sales@shop.test/')).toBe('mailto:sales@shop.test');
    expect(canonUrl('  not a url/ ')).toBe('not a url');
  });
});

describe('visitKey', () => {
  it('should ignore scheme, www and trailing slashes', () => {
    expect(visitKey('http://shop.test/catalog')).toBe(visitKey('https://www.shop.test/catalog/'));
  });

  it('should drop tracking parameters and fragments but keep paging', () => {
    expect(visitKey('https://www.Shop.test/catalog/?utm_source=mail&page=2&ref=x#frag')).toBe(
      'shop.test/catalog?page=2'
    );
  });

  it('should sort the remaining query parameters', () => {
    expect(visitKey('https://shop.test/c?b=2&a=1')).toBe('shop.test/c?a=1&b=2');
  });

  it('should keep different pages distinct', () => {
    expect(visitKey('https://shop.test/c?page=2')).not.toBe(visitKey('https://shop.test/c?page=3'));
  });
});

describe('registrableDomain', () => {
  it('should respect multi-part public suffixes', () => {
    expect(registrableDomain('https://shop.example.co.uk/x')).toBe('example.co.uk');
  });

  it('should drop subdomains', () => {
    expect(registrableDomain('https://www.example.com/')).toBe('example.com');
  });
});

describe('isSameSite', () => {
  it('should accept the same host and its subdomains', () => {
    expect(isSameSite('https://shop.test/a', 'https://shop.test/')).toBe(true);
    expect(isSameSite('https://blog.shop.test/a', 'https://shop.test/')).toBe(true);
  });

  it('should reject other hosts', () => {
    expect(isSameSite('https://other.test/', 'https://shop.test/')).toBe(false);
  });

  it('should reject everything when the page URL does not parse', () => {
    expect(isSameSite('https://shop.test/', 'garbage')).toBe(false);
  });
});

describe('resolveUrl', () => {
  it('should resolve relative hrefs', () => {
    expect(resolveUrl('https://shop.test/c/', '../p/1')).toBe('https://shop.test/p/1');
  });

  it('should return the base for an empty href', () => {
    expect(resolveUrl('https://shop.test/c', '')).toBe('https://shop.test/c');
    expect(resolveUrl('https://shop.test/c', undefined)).toBe('https://shop.test/c');
  });

  it('should return an empty string when the href cannot be resolved', () => {
    expect(resolveUrl('garbage', 'x')).toBe('');
  });
});

describe('hostOf / isHttpUrl', () => {
  it('should lowercase the host and drop the port', () => {
    expect(hostOf('https://Shop.Test:8443/a')).toBe('shop.test');
    expect(hostOf('garbage')).toBe('');
  });

  it('should accept only http and https', () => {
    expect(isHttpUrl('https://shop.test')).toBe(true);
    expect(isHttpUrl('ftp://shop.test')).toBe(false);
    expect(isHttpUrl('javascript:void(0)')).toBe(false);
  });
});
