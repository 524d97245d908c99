import { describe, it, expect, vi } from 'vitest';
import { discoverSitemapSeeds, isSeedCandidate, parseSitemapLocs, type TextSource } from './sitemap.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const URLSET = `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <url><loc>https://shop.test/products/alpha</loc></url>
  <url><loc>https://shop.test/pages/contact</loc></url>
  <url><loc> https://shop.test/collections/mice </loc></url>
  <url><loc>https://other.test/products/beta</loc></url>
</urlset>`;

const INDEX = `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <sitemap><loc>https://shop.test/sitemap_products_1.xml</loc></sitemap>
</sitemapindex>`;

function fakeSource(responses: Record<string, string>): TextSource & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async getText(url) {
      calls.push(url);
      const body = responses[url];
      if (body === undefined) {
        throw new Error('Request failed with status code 404');
      }
      return body;
    },
  };
}

describe('parseSitemapLocs', () => {
  it('should read urlset entries', () => {
    expect(parseSitemapLocs(URLSET)).toEqual([
      'https://shop.test/products/alpha',
      'https://shop.test/pages/contact',
      'https://shop.test/collections/mice',
      'https://other.test/products/beta',
    ]);
  });

  it('should read sitemap index entries', () => {
    expect(parseSitemapLocs(INDEX)).toEqual(['https://shop.test/sitemap_products_1.xml']);
  });

  it('should throw on malformed XML', () => {
    expect(() => parseSitemapLocs('<urlset><url><loc>x</url>')).toThrow();
  });
});

describe('isSeedCandidate', () => {
  it('should keep same-site product and category pages', () => {
    expect(isSeedCandidate('https://shop.test/products/alpha', 'https://shop.test')).toBe(true);
    expect(isSeedCandidate('https://shop.test/collections/mice', 'https://shop.test')).toBe(true);
  });

  it('should drop other sites, nested sitemaps and pages without hints', () => {
    expect(isSeedCandidate('https://other.test/products/beta', 'https://shop.test')).toBe(false);
    expect(isSeedCandidate('https://shop.test/sitemap_products_1.xml', 'https://shop.test')).toBe(false);
    expect(isSeedCandidate('https://shop.test/pages/contact', 'https://shop.test')).toBe(false);
  });
});

describe('discoverSitemapSeeds', () => {
  it('should probe the conventional paths and keep matching URLs', async () => {
    const source = fakeSource({
      'https://shop.test/sitemap.xml': INDEX,
      'https://shop.test/product-sitemap.xml': URLSET,
    });

    const seeds = await discoverSitemapSeeds('https://shop.test', source, { timeoutMs: 1000 });

    expect(seeds).toEqual(['https://shop.test/products/alpha', 'https://shop.test/collections/mice']);
    expect(source.calls).toEqual([
      'https://shop.test/sitemap.xml',
      'https://shop.test/sitemap_index.xml',
      'https://shop.test/product-sitemap.xml',
      'https://shop.test/sitemap_products_1.xml',
      'https://shop.test/sitemap-products.xml',
    ]);
  });

  it('should ignore malformed sitemaps', async () => {
    const source = fakeSource({
      'https://shop.test/sitemap.xml': '<urlset><url><loc>broken',
      'https://shop.test/sitemap-products.xml': URLSET,
    });

    const seeds = await discoverSitemapSeeds('https://shop.test', source, { timeoutMs: 1000 });

    expect(seeds).toEqual(['https://shop.test/products/alpha', 'https://shop.test/collections/mice']);
  });

  it('should keep at most ten seeds', async () => {
    const entries = Array.from({ length: 30 }, (_, i) => `<url><loc>https://shop.test/products/p${i}</loc></url>`);
    const source = fakeSource({ 'https://shop.test/sitemap.xml': `<urlset>${entries.join('')}</urlset>` });

    const seeds = await discoverSitemapSeeds('https://shop.test', source, { timeoutMs: 1000 });

    expect(seeds).toHaveLength(10);
    expect(seeds[0]).toBe('https://shop.test/products/p0');
  });

  it('should stop probing once aborted', async () => {
    const source = fakeSource({});
    const controller = new AbortController();
    controller.abort();

    const seeds = await discoverSitemapSeeds('https://shop.test', source, { timeoutMs: 1000, signal: controller.signal });

    expect(seeds).toEqual([]);
    expect(source.calls).toEqual([]);
  });
});
