import { describe, it, expect, vi } from 'vitest';
import * as cheerio from 'cheerio';
import { locateCards } from './card-locator.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

function grid(count: number, className = 'product-card'): string {
  const cards = Array.from(
    { length: count },
    (_, i) => `<div class="${className}"><a href="/products/p${i}">Product ${i}</a></div>`
  );
  return `<html><body>${cards.join('')}</body></html>`;
}

describe('locateCards', () => {
  it('should never return more cards than the cap', () => {
    const $ = cheerio.load(grid(400));

    const match = locateCards($);

    expect(match.cards).toHaveLength(300);
    expect(match.method).toBe('heuristic');
    expect(match.selector).toBe('.product-card');
  });

  it('should honor a custom cap', () => {
    const $ = cheerio.load(grid(10));
    expect(locateCards($, [], 5).cards).toHaveLength(5);
  });

  it('should prefer override selectors', () => {
    const $ = cheerio.load(grid(3, 'tile') + grid(3));

    const match = locateCards($, ['.tile']);

    expect(match.method).toBe('override');
    expect(match.selector).toBe('.tile');
    expect(match.cards).toHaveLength(3);
  });

  it('should fall back to generic selectors when an override matches too few nodes', () => {
    const $ = cheerio.load(grid(2, 'tile') + grid(4));

    const match = locateCards($, ['.tile']);

    expect(match.method).toBe('heuristic');
    expect(match.cards).toHaveLength(4);
  });

  it('should skip invalid override selectors', () => {
    const $ = cheerio.load(grid(3));

    const match = locateCards($, ['[[not-a-selector']);

    expect(match.method).toBe('heuristic');
    expect(match.selector).toBe('.product-card');
  });

  it('should use parents of product anchors when no selector matches', () => {
    const $ = cheerio.load(`
      <ul>
        <li><a href="/p/1">Alpha</a></li>
        <li><a href="/p/2">Beta</a></li>
        <li><a href="/about">About us</a></li>
      </ul>
    `);

    const match = locateCards($);

    expect(match.method).toBe('anchor-parent');
    expect(match.selector).toBeNull();
    expect(match.cards.map((card) => card.text())).toEqual(['Alpha', 'Beta']);
  });

  it('should count a shared parent once', () => {
    const $ = cheerio.load('<div><a href="/item/1">One</a><a href="/item/2">Two</a></div>');

    expect(locateCards($).cards).toHaveLength(1);
  });

  it('should return no cards for a page without listings', () => {
    const $ = cheerio.load('<html><body><p>Nothing here</p></body></html>');

    expect(locateCards($)).toEqual({ cards: [], method: 'heuristic', selector: null });
  });
});
