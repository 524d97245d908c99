import type * as cheerio from 'cheerio';
import { canonUrl, resolveUrl } from '../utils/canonicalize.js';
import { logger } from '../utils/logger.js';

const LISTING_TYPES = new Set(['Product', 'ListItem']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function hasListingType(node: Record<string, unknown>): boolean {
  const type = node['@type'] ?? node.type;
  if (Array.isArray(type)) {
    return type.some((t) => typeof t === 'string' && LISTING_TYPES.has(t));
  }
  return typeof type === 'string' && LISTING_TYPES.has(type);
}

/**
 * Build a canonical-URL -> product-name map from the page's JSON-LD blocks.
 * Product and ListItem nodes are collected at any depth; for a ListItem the
 * url/name may live on its nested `item`. Relative URLs resolve against the page;
 * malformed blocks are skipped.
 */
export function buildStructuredNameMap($: cheerio.CheerioAPI, pageUrl: string): Map<string, string> {
  const names = new Map<string, string>();

  const visit = (node: unknown): void => {
    if (Array.isArray(node)) {
      node.forEach(visit);
      return;
    }
    if (!isRecord(node)) {
      return;
    }

    if (hasListingType(node)) {
      const item: Record<string, unknown> = isRecord(node.item) ? node.item : {};
      const url = asString(node.url) || asString(item['@id']) || asString(item.url);
      const name = asString(node.name) || asString(item.name);
      if (url && name) {
        names.set(canonUrl(resolveUrl(pageUrl, url)), name);
      }
    }

    Object.values(node).forEach(visit);
  };

  $('script[type="application/ld+json"]').each((_, script) => {
    const raw = $(script).html() || '';
    if (!raw.trim()) {
      return;
    }
    try {
      visit(JSON.parse(raw));
    } catch (error) {
      logger.debug('Ignoring malformed JSON-LD block', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });

  return names;
}
