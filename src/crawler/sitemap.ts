/**
 * Sitemap Seeder
 * Probes conventional sitemap locations and picks product/category URLs to seed a crawl
 */

import { XMLParser } from 'fast-xml-parser';
import type { FetchOptions } from '../types/index.js';
import { isHttpUrl, isSameSite, resolveUrl } from '../utils/canonicalize.js';
import { getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { SITEMAP_PATH_HINTS, SITEMAP_PATHS } from '../scraper/catalog-selectors.js';

export const MAX_SITEMAP_CANDIDATES = 50;
export const MAX_SITEMAP_SEEDS = 10;

/** Anything that can GET a URL as text (the static HTTP client in production) */
export interface TextSource {
  getText(url: string, options: FetchOptions & { accept?: string; maxAttempts?: number }): Promise<string>;
}

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: true,
});

function collectLocs(node: unknown, out: string[]): void {
  if (Array.isArray(node)) {
    for (const item of node) {
      collectLocs(item, out);
    }
    return;
  }
  if (typeof node !== 'object' || node === null) {
    return;
  }

  for (const [key, value] of Object.entries(node)) {
    if (key === 'loc' && typeof value === 'string') {
      out.push(value.trim());
    } else {
      collectLocs(value, out);
    }
  }
}

/**
 * All <loc> values of a urlset or sitemapindex document; throws on malformed XML
 */
export function parseSitemapLocs(xml: string): string[] {
  const parsed: unknown = parser.parse(xml, true);
  const locs: string[] = [];
  collectLocs(parsed, locs);
  return locs;
}

export function isSeedCandidate(loc: string, siteUrl: string): boolean {
  if (!isHttpUrl(loc) || !isSameSite(loc, siteUrl)) {
    return false;
  }

  const path = new URL(loc).pathname.toLowerCase();
  if (/\.xml(\.gz)?$/.test(path)) {
    return false;
  }

  return SITEMAP_PATH_HINTS.some((hint) => path.includes(hint));
}

export async function discoverSitemapSeeds(
  siteUrl: string,
  source: TextSource,
  options: FetchOptions
): Promise<string[]> {
  const candidates: string[] = [];

  for (const path of SITEMAP_PATHS) {
    if (candidates.length >= MAX_SITEMAP_CANDIDATES || options.signal?.aborted) {
      break;
    }

    const sitemapUrl = resolveUrl(siteUrl, path);
    try {
      const xml = await source.getText(sitemapUrl, {
        ...options,
        accept: 'application/xml,text/xml;q=0.9,*/*;q=0.8',
        maxAttempts: 1,
      });

      for (const loc of parseSitemapLocs(xml)) {
        if (candidates.length >= MAX_SITEMAP_CANDIDATES) {
          break;
        }
        if (!candidates.includes(loc) && isSeedCandidate(loc, siteUrl)) {
          candidates.push(loc);
        }
      }
    } catch (error) {
      logger.debug('Sitemap probe failed', { sitemapUrl, error: getErrorMessage(error) });
    }
  }

  const seeds = candidates.slice(0, MAX_SITEMAP_SEEDS);
  if (seeds.length > 0) {
    logger.info('Seeded from sitemaps', { siteUrl, candidates: candidates.length, seeds: seeds.length });
  }
  return seeds;
}
