import { describe, it, expect } from 'vitest';
import { detectCurrency, normalizeNumber, parsePrice, stripPriceFragments } from './price-parser.js';

describe('parsePrice', () => {
  it('should parse a price with the currency before the number', () => {
    expect(parsePrice('EGP 1,234.50')).toEqual({ value: 1234.5, raw: 'EGP 1,234.50' });
  });

  it('should parse a price with the currency after the number', () => {
    expect(parsePrice('1234.50 EGP')).toEqual({ value: 1234.5, raw: '1234.50 EGP' });
  });

  it('should parse Arabic currency markers', () => {
    expect(parsePrice('1.234.50 ج.م').value).toBe(1234.5);
    expect(parsePrice('750 جنيه مصري').value).toBe(750);
  });

  it('should parse L.E, LE and E£ tokens', () => {
    expect(parsePrice('L.E 99').value).toBe(99);
    expect(parsePrice('250 LE').value).toBe(250);
    expect(parsePrice('E£ 1,100').value).toBe(1100);
  });

  it('should not treat letters inside words as a currency token', () => {
    expect(parsePrice('Sale 250')).toEqual({ value: null, raw: 'Sale 250' });
  });

  it('should keep the raw text when no number can be read', () => {
    expect(parsePrice('  EGP ,  ')).toEqual({ value: null, raw: 'EGP ,' });
    expect(parsePrice('Call for price')).toEqual({ value: null, raw: 'Call for price' });
  });

  it('should return an empty result for empty input', () => {
    expect(parsePrice('')).toEqual({ value: null, raw: '' });
    expect(parsePrice(null)).toEqual({ value: null, raw: '' });
    expect(parsePrice(undefined)).toEqual({ value: null, raw: '' });
  });

  it('should take the first price when several are present', () => {
    expect(parsePrice('EGP 300 EGP 250').value).toBe(300);
  });
});

describe('normalizeNumber', () => {
  it('should drop thousands separators', () => {
    expect(normalizeNumber('1,234,567')).toBe(1234567);
  });

  it('should keep only the last dot as the decimal point', () => {
    expect(normalizeNumber('1.234.50')).toBe(1234.5);
  });

  it('should return null without digits', () => {
    expect(normalizeNumber('.,')).toBeNull();
  });
});

describe('detectCurrency', () => {
  it('should report EGP for any recognized token', () => {
    expect(detectCurrency('Price: 100 جنيه')).toBe('EGP');
    expect(detectCurrency('egp 100')).toBe('EGP');
  });

  it('should return an empty string without a token', () => {
    expect(detectCurrency('$100')).toBe('');
    expect(detectCurrency('')).toBe('');
  });
});

describe('stripPriceFragments', () => {
  it('should drop regular and sale price lines', () => {
    expect(stripPriceFragments('Widget Pro\nRegular price EGP 300\nSale price EGP 250')).toBe('Widget Pro');
  });

  it('should remove currency-adjacent numbers', () => {
    expect(stripPriceFragments('Gaming Mouse EGP 450')).toBe('Gaming Mouse');
  });

  it('should trim dangling dashes left behind', () => {
    expect(stripPriceFragments('Headset - 1,200 LE')).toBe('Headset');
  });

  it('should collapse whitespace', () => {
    expect(stripPriceFragments('  Mechanical   Keyboard  ')).toBe('Mechanical Keyboard');
  });
});
