/**
 * Link Discoverer
 * Finds category and pagination links on a visited page and feeds them to the frontier
 */

import type { CheerioAPI } from 'cheerio';
import { isHttpUrl, isSameSite, resolveUrl } from '../utils/canonicalize.js';
import { safeSelect } from '../scraper/card-locator.js';
import { CATEGORY_KEYWORDS, PAGINATION_SELECTORS } from '../scraper/catalog-selectors.js';
import { enqueue, type CrawlState } from './frontier.js';

/** Category discovery runs only on the first pages of a site */
export const CATEGORY_DISCOVERY_PAGES = 3;
export const MAX_CATEGORY_LINKS_PER_PAGE = 12;
export const MAX_PAGINATION_LINKS_PER_PAGE = 20;

function acceptLink(href: string | undefined, pageUrl: string): string | null {
  if (!href) {
    return null;
  }
  const absolute = resolveUrl(pageUrl, href);
  if (!absolute || !isHttpUrl(absolute) || !isSameSite(absolute, pageUrl)) {
    return null;
  }
  return absolute;
}

export function discoverPaginationLinks(
  $: CheerioAPI,
  pageUrl: string,
  cap: number = MAX_PAGINATION_LINKS_PER_PAGE
): string[] {
  const links: string[] = [];

  for (const selector of PAGINATION_SELECTORS) {
    for (const element of safeSelect($, selector)) {
      if (links.length >= cap) {
        return links;
      }
      const link = acceptLink(element.attribs.href || element.attribs.content, pageUrl);
      if (link && !links.includes(link)) {
        links.push(link);
      }
    }
  }

  return links;
}

export function discoverCategoryLinks(
  $: CheerioAPI,
  pageUrl: string,
  includeKeywords: string[],
  cap: number = MAX_CATEGORY_LINKS_PER_PAGE
): string[] {
  const keywords = [...includeKeywords, ...CATEGORY_KEYWORDS]
    .map((keyword) => keyword.toLowerCase())
    .filter((keyword) => keyword.length > 0);
  const links: string[] = [];

  for (const element of $('a[href]').toArray()) {
    if (links.length >= cap) {
      break;
    }

    const href = element.attribs.href ?? '';
    const text = $(element).text().toLowerCase();
    const hrefL = href.toLowerCase();
    if (!keywords.some((keyword) => text.includes(keyword) || hrefL.includes(keyword))) {
      continue;
    }

    const link = acceptLink(href, pageUrl);
    if (link && !links.includes(link)) {
      links.push(link);
    }
  }

  return links;
}

export interface LinkExpansion {
  state: CrawlState;
  categories: string[];
  pagination: string[];
}

/**
 * Run category discovery (first pages only) and pagination discovery
 * (while budget remains). Each page that runs pagination discovery spends
 * one unit of the page budget.
 */
export function expandLinks(
  state: CrawlState,
  $: CheerioAPI,
  pageUrl: string,
  includeKeywords: string[]
): LinkExpansion {
  let categories: string[] = [];
  let pagination: string[] = [];

  if (state.visited.size <= CATEGORY_DISCOVERY_PAGES) {
    categories = enqueue(state, discoverCategoryLinks($, pageUrl, includeKeywords)).added;
  }

  if (state.pageBudget > 0) {
    pagination = enqueue(state, discoverPaginationLinks($, pageUrl)).added;
    state.pageBudget -= 1;
  }

  return { state, categories, pagination };
}
