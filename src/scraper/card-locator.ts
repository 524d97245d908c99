/**
 * Card Locator
 * Finds the repeated DOM nodes that represent product listings on a catalog page
 *
 * Strategies are tried in order and the first that yields cards wins:
 *   1. site override selectors (>= MIN_CARD_MATCHES matches)
 *   2. generic product-card selectors (>= MIN_CARD_MATCHES matches)
 *   3. parents of anchors pointing at product paths
 */

import type * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { ExtractionMethod } from '../types/index.js';
import { logger } from '../utils/logger.js';
import {
  CARD_SELECTORS,
  MAX_CARDS_PER_PAGE,
  MIN_CARD_MATCHES,
  PRODUCT_PATH_MARKERS,
} from './catalog-selectors.js';

/** One product listing subtree */
export type Card = cheerio.Cheerio<Element>;

export interface CardMatch {
  cards: Card[];
  method: ExtractionMethod;
  selector: string | null;
}

export interface CardStrategy {
  method: ExtractionMethod;
  locate($: cheerio.CheerioAPI): { elements: Element[]; selector: string | null } | null;
}

/**
 * Select elements, treating an invalid selector as no match
 */
export function safeSelect($: cheerio.CheerioAPI, selector: string): Element[] {
  try {
    return $<Element, string>(selector).toArray();
  } catch (error) {
    logger.debug('Skipping invalid selector', {
      selector,
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }
}

/**
 * Strategy that takes the first selector in a list matching enough elements
 */
export function selectorListStrategy(method: ExtractionMethod, selectors: string[]): CardStrategy {
  return {
    method,
    locate($) {
      for (const selector of selectors) {
        const elements = safeSelect($, selector);
        if (elements.length >= MIN_CARD_MATCHES) {
          return { elements, selector };
        }
      }
      return null;
    },
  };
}

/**
 * Strategy that treats the parent of every product-path anchor as a card
 */
export const anchorParentStrategy: CardStrategy = {
  method: 'anchor-parent',
  locate($) {
    const parents: Element[] = [];
    const seen = new Set<Element>();

    $('a[href]').each((_, anchor) => {
      const href = ($(anchor).attr('href') || '').toLowerCase();
      if (!PRODUCT_PATH_MARKERS.some((marker) => href.includes(marker))) {
        return;
      }
      const parent = $(anchor).parent().get(0);
      if (parent && !seen.has(parent)) {
        seen.add(parent);
        parents.push(parent);
      }
    });

    return parents.length > 0 ? { elements: parents, selector: null } : null;
  },
};

/**
 * Build the ordered strategy list for a site
 */
export function cardStrategies(overrideSelectors: string[]): CardStrategy[] {
  const strategies: CardStrategy[] = [];
  if (overrideSelectors.length > 0) {
    strategies.push(selectorListStrategy('override', overrideSelectors));
  }
  strategies.push(selectorListStrategy('heuristic', CARD_SELECTORS));
  strategies.push(anchorParentStrategy);
  return strategies;
}

/**
 * Locate product cards on a parsed page, never returning more than `cap` cards
 */
export function locateCards(
  $: cheerio.CheerioAPI,
  overrideSelectors: string[] = [],
  cap: number = MAX_CARDS_PER_PAGE
): CardMatch {
  const limit = Math.max(0, cap);

  for (const strategy of cardStrategies(overrideSelectors)) {
    const found = strategy.locate($);
    if (found && found.elements.length > 0) {
      return {
        cards: found.elements.slice(0, limit).map((element) => $(element)),
        method: strategy.method,
        selector: found.selector,
      };
    }
  }

  return { cards: [], method: 'heuristic', selector: null };
}
