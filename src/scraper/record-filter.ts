/**
 * Record Filter
 * Accept/reject decision for a candidate listing. Pure: the same inputs always
 * give the same decision.
 */

import type { FilterConfig } from '../types/index.js';
import { ACCESSORY_PATH_ALLOWLIST } from './catalog-selectors.js';

export type FilterRejection = 'excluded-keyword' | 'below-min' | 'above-max' | 'unverifiable-price' | 'no-include-match';

export type FilterDecision = { accepted: true } | { accepted: false; reason: FilterRejection };

function lowered(keywords: string[]): string[] {
  return keywords.map((keyword) => keyword.toLowerCase()).filter((keyword) => keyword.length > 0);
}

export function filterCandidate(
  name: string,
  url: string,
  price: number | null,
  filters: FilterConfig
): FilterDecision {
  const nameL = (name || '').toLowerCase();
  const urlL = (url || '').toLowerCase();
  const hits = (keyword: string): boolean => nameL.includes(keyword) || urlL.includes(keyword);

  if (lowered(filters.excludeKeywords).some(hits)) {
    return { accepted: false, reason: 'excluded-keyword' };
  }

  if (price === null) {
    if (filters.priceMin !== null) {
      return { accepted: false, reason: 'unverifiable-price' };
    }
  } else {
    if (filters.priceMin !== null && price < filters.priceMin) {
      return { accepted: false, reason: 'below-min' };
    }
    if (filters.priceMax !== null && price > filters.priceMax) {
      return { accepted: false, reason: 'above-max' };
    }
  }

  const include = lowered(filters.includeKeywords);
  if (include.length > 0) {
    const matched = include.some(hits) || ACCESSORY_PATH_ALLOWLIST.some((fragment) => urlL.includes(fragment));
    if (!matched) {
      return { accepted: false, reason: 'no-include-match' };
    }
  }

  return { accepted: true };
}
