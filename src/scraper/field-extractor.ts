/**
 * Field Extractor
 * Pulls name, URL, price, currency and availability out of a single product card
 */

import type * as cheerio from 'cheerio';
import { isTag, isText, type AnyNode, type Element } from 'domhandler';
import type { ExtractedFields, ExtractionMethod, StockStatus } from '../types/index.js';
import { canonUrl, resolveUrl } from '../utils/canonicalize.js';
import { logger } from '../utils/logger.js';
import type { Card } from './card-locator.js';
import {
  NAME_ATTRIBUTES,
  NAME_SELECTORS,
  OUT_OF_STOCK_MARKERS,
  PRICE_NOISE_SELECTORS,
  PRICE_SELECTORS,
  URL_SELECTORS,
} from './catalog-selectors.js';
import { detectCurrency, parsePrice, stripPriceFragments } from './price-parser.js';

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template', 'svg']);

export interface ExtractionContext {
  /** URL of the page the cards came from */
  pageUrl: string;
  nameSelectors: string[];
  urlSelectors: string[];
  /** canonUrl -> name, from the page's structured data */
  structuredNames: Map<string, string>;
}

/**
 * Text nodes under a node, one per line, skipping script-like elements
 */
export function textLines(node: AnyNode): string[] {
  const lines: string[] = [];

  const walk = (current: AnyNode): void => {
    if (isText(current)) {
      const text = current.data.replace(/\s+/g, ' ').trim();
      if (text) lines.push(text);
    } else if (isTag(current) && !SKIPPED_TAGS.has(current.name)) {
      current.children.forEach(walk);
    }
  };

  walk(node);
  return lines;
}

/**
 * Visible text of a card or element with a single space between text nodes
 */
export function spacedText(el: cheerio.Cheerio<Element>): string {
  return el
    .toArray()
    .flatMap((node) => textLines(node))
    .join(' ');
}

function findFirst(card: Card, selector: string): Card | null {
  try {
    const found = card.find(selector).first();
    return found.length > 0 ? found : null;
  } catch (error) {
    logger.debug('Skipping invalid selector', {
      selector,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Name text from the first selector whose element still has text once
 * nested prices are removed
 */
function nameFromSelectors(card: Card, selectors: string[]): string {
  for (const selector of selectors) {
    const el = findFirst(card, selector);
    if (!el) continue;

    const clone = el.clone();
    clone.find(PRICE_NOISE_SELECTORS.join(', ')).remove();

    const name = stripPriceFragments(clone.toArray().flatMap((node) => textLines(node)).join('\n'));
    if (name) {
      return name;
    }
  }
  return '';
}

function nameFromAttributes(card: Card): string {
  const elements: Element[] = [
    ...card.toArray(),
    ...card.find('a, [data-product-title], [title], [aria-label]').toArray(),
  ];
  for (const element of elements) {
    for (const attr of NAME_ATTRIBUTES) {
      const value = (element.attribs[attr] || '').trim();
      if (value) return value;
    }
  }

  return (card.find('img[alt]').first().attr('alt') || '').trim();
}

export function extractName(card: Card, productUrl: string, ctx: ExtractionContext): string {
  return (
    nameFromSelectors(card, ctx.nameSelectors) ||
    nameFromSelectors(card, NAME_SELECTORS) ||
    (productUrl ? ctx.structuredNames.get(canonUrl(productUrl)) ?? '' : '') ||
    nameFromAttributes(card)
  );
}

function hrefFromSelectors(card: Card, selectors: string[]): string {
  for (const selector of selectors) {
    const href = (findFirst(card, selector)?.attr('href') || '').trim();
    if (href) return href;
  }
  return '';
}

/**
 * Absolute product URL; an anchor card links to itself, and a card without
 * any link resolves to the page URL
 */
export function extractUrl(card: Card, ctx: ExtractionContext): string {
  let href = hrefFromSelectors(card, ctx.urlSelectors) || hrefFromSelectors(card, URL_SELECTORS);
  if (!href && card.is('a[href]')) {
    href = (card.attr('href') || '').trim();
  }
  return resolveUrl(ctx.pageUrl, href);
}

/**
 * Text the price is read from: the first non-empty price element, else the whole card
 */
export function priceText(card: Card): string {
  for (const selector of PRICE_SELECTORS) {
    const el = findFirst(card, selector);
    const text = el ? spacedText(el) : '';
    if (text) return text;
  }
  return spacedText(card);
}

export function extractAvailability(cardText: string): StockStatus {
  const lowered = cardText.toLowerCase();
  return OUT_OF_STOCK_MARKERS.some((marker) => lowered.includes(marker)) ? 'Out of Stock' : 'Available';
}

export function extractFields(card: Card, method: ExtractionMethod, ctx: ExtractionContext): ExtractedFields {
  const url = extractUrl(card, ctx);
  const name = extractName(card, url, ctx);
  const text = priceText(card);
  const { value, raw } = parsePrice(text);

  return {
    name,
    url,
    rawPriceText: raw,
    price: value,
    currency: detectCurrency(text),
    status: extractAvailability(spacedText(card)),
    method,
  };
}
