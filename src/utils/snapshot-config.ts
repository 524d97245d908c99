/**
 * Snapshot configuration file loading
 *
 * The file is JSON that tolerates comments and trailing commas. Every key is
 * optional: a missing or malformed value falls back to its default, and an
 * unreadable file yields the full default configuration.
 */

import * as fs from 'fs';
import { z } from 'zod';
import type { SiteOverride, SiteTask, SnapshotConfig } from '../types/index.js';
import { hostOf, registrableDomain, resolveUrl } from './canonicalize.js';
import { logger } from './logger.js';

export const DEFAULT_RENDER_TIMEOUT_MS = 60000;
export const DEFAULT_STATIC_TIMEOUT_SEC = 12;
export const DEFAULT_PAGE_BUDGET = 10;
export const MAX_SEEDS = 10;

const stringList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const optionalNumber = z
  .preprocess(
    (value) => (value === null || value === undefined || value === '' ? null : Number(value)),
    z.number().finite().nullable()
  )
  .catch(null);

const positiveInt = z.number().int().positive().optional().catch(undefined);
const nonNegativeInt = z.number().int().nonnegative().optional().catch(undefined);

const overrideFields = z.object({
  product_card: stringList,
  name: stringList,
  url: stringList,
  seeds: stringList,
  dynamic_timeout_ms: positiveInt,
  static_timeout_sec: positiveInt,
  render: z.boolean().optional().catch(undefined),
  per_site_pages: nonNegativeInt,
});

const overrideSchema = overrideFields.catch(() => overrideFields.parse({}));

const configSchema = z.object({
  filters: z
    .object({
      include_keywords: stringList,
      exclude_keywords: stringList,
    })
    .catch({ include_keywords: [], exclude_keywords: [] }),
  price_filter: z
    .object({
      min: optionalNumber,
      max: optionalNumber,
    })
    .catch({ min: null, max: null }),
  limits: z
    .object({
      timeout_ms: z.number().int().positive().catch(DEFAULT_RENDER_TIMEOUT_MS),
      per_site_pages: z.number().int().nonnegative().catch(DEFAULT_PAGE_BUDGET),
    })
    .catch({ timeout_ms: DEFAULT_RENDER_TIMEOUT_MS, per_site_pages: DEFAULT_PAGE_BUDGET }),
  overrides: z.record(z.string(), overrideSchema).catch({}),
});

type RawOverride = z.infer<typeof overrideFields>;

/**
 * Remove line and block comments outside of string literals
 */
export function stripJsonComments(raw: string): string {
  let out = '';
  let inString = false;

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    const next = raw[i + 1];

    if (inString) {
      out += ch;
      if (ch === '\\' && next !== undefined) {
        out += next;
        i++;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
    } else if (ch === '/' && next === '/') {
      while (i < raw.length && raw[i] !== '\n') i++;
      out += '\n';
    } else if (ch === '/' && next === '*') {
      const end = raw.indexOf('*/', i + 2);
      i = end === -1 ? raw.length : end + 1;
    } else {
      out += ch;
    }
  }

  return out;
}

function toOverride(raw: RawOverride): SiteOverride {
  return {
    productCard: raw.product_card,
    name: raw.name,
    url: raw.url,
    seeds: raw.seeds,
    dynamicTimeoutMs: raw.dynamic_timeout_ms,
    staticTimeoutSec: raw.static_timeout_sec,
    render: raw.render,
    perSitePages: raw.per_site_pages,
  };
}

/**
 * Parse configuration text into a SnapshotConfig, defaulting anything unusable
 */
export function parseSnapshotConfig(text: string): SnapshotConfig {
  let data: unknown = {};

  const cleaned = stripJsonComments(text).trim().replace(/,(\s*[}\]])/g, '$1');
  if (cleaned) {
    try {
      data = JSON.parse(cleaned);
    } catch (error) {
      logger.warn('Snapshot config is not valid JSON, using defaults', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  const parsed = configSchema.catch(() => configSchema.parse({})).parse(data);

  const overrides: Record<string, SiteOverride> = {};
  for (const [domain, raw] of Object.entries(parsed.overrides)) {
    overrides[domain.toLowerCase()] = toOverride(raw);
  }

  return {
    filters: {
      includeKeywords: parsed.filters.include_keywords,
      excludeKeywords: parsed.filters.exclude_keywords,
      priceMin: parsed.price_filter.min,
      priceMax: parsed.price_filter.max,
    },
    limits: {
      timeoutMs: parsed.limits.timeout_ms,
      perSitePages: parsed.limits.per_site_pages,
    },
    overrides,
  };
}

/**
 * Load the snapshot configuration file; a missing file yields defaults
 */
export function loadSnapshotConfig(filePath: string): SnapshotConfig {
  if (!fs.existsSync(filePath)) {
    logger.info('No snapshot config file found, using defaults', { filePath });
    return parseSnapshotConfig('');
  }
  return parseSnapshotConfig(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Find the override for a site: registrable domain first, then the full host,
 * then the host without 'www.'
 */
export function findOverride(siteUrl: string, cfg: SnapshotConfig): SiteOverride | undefined {
  const host = hostOf(siteUrl);
  const candidates = [registrableDomain(siteUrl), host, host.replace(/^www\./, '')];
  for (const key of candidates) {
    const override = cfg.overrides[key];
    if (override) {
      return override;
    }
  }
  return undefined;
}

/**
 * Resolve everything the crawler needs to know about one site
 */
export function resolveSiteTask(siteUrl: string, cfg: SnapshotConfig, recordLimit: number): SiteTask {
  const override = findOverride(siteUrl, cfg);

  return {
    url: siteUrl,
    domain: registrableDomain(siteUrl),
    cardSelectors: override?.productCard ?? [],
    nameSelectors: override?.name ?? [],
    urlSelectors: override?.url ?? [],
    seeds: (override?.seeds ?? [])
      .slice(0, MAX_SEEDS)
      .map((seed) => resolveUrl(siteUrl, seed))
      .filter((seed) => seed.length > 0),
    renderTimeoutMs: override?.dynamicTimeoutMs ?? cfg.limits.timeoutMs,
    staticTimeoutMs: (override?.staticTimeoutSec ?? DEFAULT_STATIC_TIMEOUT_SEC) * 1000,
    preferStatic: override?.render === false,
    pageBudget: override?.perSitePages ?? cfg.limits.perSitePages,
    recordLimit: Math.max(0, recordLimit),
  };
}
