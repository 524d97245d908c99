import { describe, it, expect, vi } from 'vitest';
import type { FilterConfig, ProductRecord, SiteTask } from '../types/index.js';
import { SinkWriteError } from '../utils/errors.js';
import type { AcquiredPage } from '../scraper/fetcher.js';
import type { RecordSink } from '../output/snapshot-writer.js';
import { SiteCrawler } from './site-crawler.js';
import type { TextSource } from './sitemap.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const ROOT = 'https://shop.test/';
const KEYBOARDS = 'https://shop.test/collections/keyboards';
const KEYBOARDS_2 = 'https://shop.test/collections/keyboards?page=2';

const filters: FilterConfig = { includeKeywords: [], excludeKeywords: [], priceMin: null, priceMax: null };

function cards(names: string[]): string {
  return names.map((name) => `<div class="product"><h2>${name}</h2><span class="price">EGP 100</span></div>`).join('');
}

const SITE: Record<string, string> = {
  [ROOT]: '<html><body><nav><a href="/collections/keyboards">Keyboards</a></nav></body></html>',
  [KEYBOARDS]: `<html><body>${cards(['K1', 'K2', 'K3'])}<a rel="next" href="/collections/keyboards?page=2">Next</a></body></html>`,
  [KEYBOARDS_2]: `<html><body>${cards(['K4', 'K5', 'K6'])}<a rel="next" href="/collections/keyboards">Back</a></body></html>`,
};

function makeTask(overrides: Partial<SiteTask> = {}): SiteTask {
  return {
    url: ROOT,
    domain: 'shop.test',
    cardSelectors: [],
    nameSelectors: [],
    urlSelectors: [],
    seeds: [],
    renderTimeoutMs: 1000,
    staticTimeoutMs: 1000,
    preferStatic: false,
    pageBudget: 10,
    recordLimit: 0,
    ...overrides,
  };
}

function fakeFetcher(pages: Record<string, string>, rendered: Record<string, string> = {}) {
  const fetched: string[] = [];
  const recovered: string[] = [];
  return {
    fetched,
    recovered,
    async acquire(url: string): Promise<AcquiredPage> {
      fetched.push(url);
      if (url.endsWith('/boom')) {
        throw new Error('parser exploded');
      }
      const html = pages[url] ?? '';
      return { html, strategy: html ? 'static' : null };
    },
    async recover(url: string): Promise<AcquiredPage> {
      recovered.push(url);
      const html = rendered[url] ?? '';
      return { html, strategy: html ? 'rendered' : null };
    },
  };
}

function memorySink(): RecordSink & { batches: ProductRecord[][] } {
  const batches: ProductRecord[][] = [];
  return {
    batches,
    async append(records) {
      batches.push([...records]);
    },
  };
}

describe('SiteCrawler', () => {
  it('should follow category and pagination links and emit every product', async () => {
    const fetcher = fakeFetcher(SITE);
    const sink = memorySink();

    const summary = await new SiteCrawler({ fetcher, sink, filters }).crawl(makeTask());

    expect(fetcher.fetched).toEqual([ROOT, KEYBOARDS, KEYBOARDS_2]);
    expect(sink.batches.map((batch) => batch.map((r) => r.product_name))).toEqual([
      ['K1', 'K2', 'K3'],
      ['K4', 'K5', 'K6'],
    ]);
    expect(summary).toMatchObject({
      site: 'shop.test',
      pagesVisited: 3,
      pagesFailed: 0,
      recordsEmitted: 6,
      aborted: false,
    });
  });

  it('should truncate records to the site limit and stop', async () => {
    const fetcher = fakeFetcher(SITE);
    const sink = memorySink();

    const summary = await new SiteCrawler({ fetcher, sink, filters }).crawl(makeTask({ recordLimit: 4 }));

    expect(sink.batches.map((batch) => batch.length)).toEqual([3, 1]);
    expect(summary.recordsEmitted).toBe(4);
  });

  it('should log a failing page and continue with the next one', async () => {
    const fetcher = fakeFetcher(SITE);
    const sink = memorySink();

    const summary = await new SiteCrawler({ fetcher, sink, filters }).crawl(
      makeTask({ seeds: ['https://shop.test/boom', KEYBOARDS], pageBudget: 0 })
    );

    expect(fetcher.fetched).toEqual([ROOT, 'https://shop.test/boom', KEYBOARDS, KEYBOARDS_2]);
    expect(summary.pagesFailed).toBe(1);
    expect(summary.recordsEmitted).toBe(6);
  });

  it('should propagate sink failures', async () => {
    const fetcher = fakeFetcher(SITE);
    const sink: RecordSink = {
      append: async () => {
        throw new SinkWriteError('disk full', null);
      },
    };

    await expect(new SiteCrawler({ fetcher, sink, filters }).crawl(makeTask())).rejects.toBeInstanceOf(SinkWriteError);
  });

  it('should re-extract from the rendered page when a static-first page yields nothing', async () => {
    const fetcher = fakeFetcher(
      { [ROOT]: '<html><body><div id="app"></div></body></html>' },
      { [ROOT]: `<html><body>${cards(['R1', 'R2', 'R3'])}</body></html>` }
    );
    const sink = memorySink();

    const summary = await new SiteCrawler({ fetcher, sink, filters }).crawl(makeTask({ preferStatic: true }));

    expect(fetcher.recovered).toEqual([ROOT]);
    expect(summary.recordsEmitted).toBe(3);
    expect(sink.batches[0].map((r) => r.product_name)).toEqual(['R1', 'R2', 'R3']);
  });

  it('should not recover pages for sites that render first', async () => {
    const fetcher = fakeFetcher({ [ROOT]: '<html><body></body></html>' });

    await new SiteCrawler({ fetcher, sink: memorySink(), filters }).crawl(makeTask());

    expect(fetcher.recovered).toEqual([]);
  });

  it('should stop immediately when aborted', async () => {
    const fetcher = fakeFetcher(SITE);
    const controller = new AbortController();
    controller.abort();

    const summary = await new SiteCrawler({ fetcher, sink: memorySink(), filters }).crawl(makeTask(), controller.signal);

    expect(fetcher.fetched).toEqual([]);
    expect(summary.aborted).toBe(true);
    expect(summary.pagesVisited).toBe(0);
  });

  it('should seed the queue from sitemaps', async () => {
    const fetcher = fakeFetcher(SITE);
    const sitemaps: TextSource = {
      async getText(url) {
        if (url === 'https://shop.test/sitemap.xml') {
          return '<urlset><url><loc>https://shop.test/products/mouse-m1</loc></url></urlset>';
        }
        throw new Error('Request failed with status code 404');
      },
    };

    await new SiteCrawler({ fetcher, sink: memorySink(), filters, sitemaps }).crawl(makeTask({ pageBudget: 0 }));

    expect(fetcher.fetched.slice(0, 2)).toEqual([ROOT, 'https://shop.test/products/mouse-m1']);
  });
});
