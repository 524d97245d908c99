/**
 * Currency-aware price parsing
 *
 * A price is the first numeric group written directly before or after a
 * recognized currency token, in either position:
 *   "EGP 1,234.50"  -> 1234.5
 *   "1.234.50 ج.م"  -> 1234.5
 * Parsing never throws; an unusable number leaves the value null and keeps the raw text.
 */

import type { ParsedPrice } from '../types/index.js';
import { DEFAULT_CURRENCY } from './catalog-selectors.js';

// Latin tokens must not be glued to other letters ("Sale 250" is not "LE 250")
const CURRENCY_TOKEN =
  '(?:(?<![A-Za-z])EGP(?![A-Za-z])|(?<![A-Za-z])L\\.E\\.?|(?<![A-Za-z])LE(?![A-Za-z])|E£|£E|ج\\.م|جنيه(?:\\s*مصري)?)';

const PRICE_PATTERN = new RegExp(
  `${CURRENCY_TOKEN}\\s*([\\d.,]+)|([\\d.,]+)\\s*${CURRENCY_TOKEN}`,
  'i'
);

const CURRENCY_PATTERN = new RegExp(CURRENCY_TOKEN, 'i');

const CURRENCY_NEAR_NUMBER = new RegExp(
  `${CURRENCY_TOKEN}\\s*[\\d.,]+|[\\d.,]+\\s*${CURRENCY_TOKEN}`,
  'gi'
);

const PRICE_LINE = /^(regular|sale)\s+price\b/i;

/**
 * Turn a captured numeric group into a number.
 * Thousands separators are dropped and repeated dots collapse to the last one.
 */
export function normalizeNumber(numeric: string): number | null {
  let clean = numeric.replace(/[,\s]/g, '');

  const dots = clean.split('.').length - 1;
  if (dots > 1) {
    const last = clean.lastIndexOf('.');
    clean = clean.slice(0, last).replace(/\./g, '') + clean.slice(last);
  }

  if (!/\d/.test(clean)) {
    return null;
  }

  const value = Number(clean);
  return Number.isFinite(value) ? value : null;
}

export function parsePrice(text: string | null | undefined): ParsedPrice {
  const raw = (text || '').trim();
  if (!raw) {
    return { value: null, raw: '' };
  }

  const match = PRICE_PATTERN.exec(raw);
  const numeric = match ? match[1] ?? match[2] : undefined;
  if (!numeric) {
    return { value: null, raw };
  }

  return { value: normalizeNumber(numeric), raw };
}

/**
 * Currency code for a price text, or '' when no marker is present
 */
export function detectCurrency(text: string | null | undefined): string {
  if (!text) return '';
  return CURRENCY_PATTERN.test(text) ? DEFAULT_CURRENCY : '';
}

/**
 * Clean text read from a name element: drop "Regular price ..." / "Sale price ..."
 * lines, remove currency-adjacent numbers and collapse whitespace.
 */
export function stripPriceFragments(text: string): string {
  if (!text) return '';

  const parts = text
    .split(/\s{2,}|\n/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0 && !PRICE_LINE.test(part));

  return parts
    .join(' ')
    .replace(CURRENCY_NEAR_NUMBER, '')
    .replace(/\s+/g, ' ')
    .replace(/^[\s\-–—]+|[\s\-–—]+$/g, '')
    .trim();
}
