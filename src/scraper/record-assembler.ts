import type { ExtractedFields, ProductRecord } from '../types/index.js';
import { DEFAULT_CURRENCY } from './catalog-selectors.js';

/**
 * A nameless, priceless card that links back to its own page is layout, not a listing
 */
export function isNoiseCard(fields: ExtractedFields, pageUrl: string): boolean {
  return !fields.name && fields.price === null && fields.url === pageUrl;
}

/**
 * Build the immutable output record for an accepted card, or null for a noise card
 */
export function assembleRecord(
  fields: ExtractedFields,
  siteLabel: string,
  pageUrl: string,
  now: Date = new Date()
): ProductRecord | null {
  if (isNoiseCard(fields, pageUrl)) {
    return null;
  }

  return Object.freeze({
    timestamp_iso: now.toISOString(),
    site_name: siteLabel,
    product_name: fields.name,
    sku: '',
    product_url: fields.url,
    status: fields.status,
    price_value: fields.price ?? '',
    currency: fields.currency || DEFAULT_CURRENCY,
    raw_price_text: fields.rawPriceText,
    source_url: pageUrl,
    notes: fields.method,
  });
}
