// Snapshot Records

export type StockStatus = 'Available' | 'Out of Stock';

/** How the cards of a page were located */
export type ExtractionMethod = 'override' | 'heuristic' | 'anchor-parent';

export interface ProductRecord {
  readonly timestamp_iso: string;
  readonly site_name: string;
  readonly product_name: string;
  readonly sku: string;
  readonly product_url: string;
  readonly status: StockStatus;
  readonly price_value: number | '';
  readonly currency: string;
  readonly raw_price_text: string;
  readonly source_url: string;
  readonly notes: ExtractionMethod;
}

export const RECORD_FIELDS = [
  'timestamp_iso',
  'site_name',
  'product_name',
  'sku',
  'product_url',
  'status',
  'price_value',
  'currency',
  'raw_price_text',
  'source_url',
  'notes',
] as const satisfies ReadonlyArray<keyof ProductRecord>;

// Extraction Types

export interface ParsedPrice {
  value: number | null;
  raw: string;
}

export interface ExtractedFields {
  name: string;
  url: string;
  rawPriceText: string;
  price: number | null;
  currency: string;
  status: StockStatus;
  method: ExtractionMethod;
}

// Crawl Configuration (from the snapshot config file)

export interface FilterConfig {
  includeKeywords: string[];
  excludeKeywords: string[];
  priceMin: number | null;
  priceMax: number | null;
}

export interface SiteOverride {
  productCard: string[];
  name: string[];
  url: string[];
  seeds: string[];
  dynamicTimeoutMs?: number;
  staticTimeoutSec?: number;
  render?: boolean;
  perSitePages?: number;
}

export interface SnapshotConfig {
  filters: FilterConfig;
  limits: {
    timeoutMs: number;
    perSitePages: number;
  };
  overrides: Record<string, SiteOverride>;
}

// Site Tasks

export interface SiteTask {
  /** Root URL the crawl starts from */
  url: string;
  /** Registrable domain, also used as the site label */
  domain: string;
  cardSelectors: string[];
  nameSelectors: string[];
  urlSelectors: string[];
  seeds: string[];
  renderTimeoutMs: number;
  staticTimeoutMs: number;
  preferStatic: boolean;
  pageBudget: number;
  /** Maximum records for this site, 0 for unlimited */
  recordLimit: number;
}

// Fetch Types

export type FetchStrategyName = 'rendered' | 'static';

export type FetchOutcome =
  | { ok: true; html: string; strategy: FetchStrategyName }
  | { ok: false; error: string; strategy: FetchStrategyName };

export interface FetchOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface FetchStrategy {
  readonly name: FetchStrategyName;
  fetch(url: string, options: FetchOptions): Promise<FetchOutcome>;
}

// Application Configuration (from the environment)

export interface Config {
  paths: {
    snapshotConfig: string;
    sites: string;
    outDir: string;
  };
  browser: {
    executablePath: string;
    headless: boolean;
  };
  crawl: {
    siteConcurrency: number;
    siteDeadlineMs: number;
  };
  scheduler: {
    schedule: string;
    timezone: string;
  };
  app: {
    logLevel: string;
  };
}

// Logging
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
