/**
 * Site Crawler
 * Drives one site from its root to completion:
 * seed -> (fetch -> extract -> emit -> expand links)* -> done
 *
 * Stops when the queue empties, the record limit is reached, the visited
 * ceiling is hit, or the signal aborts. A failing page is logged and skipped.
 */

import * as cheerio from 'cheerio';
import type { FilterConfig, SiteTask } from '../types/index.js';
import { getErrorMessage, SinkWriteError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Fetcher } from '../scraper/fetcher.js';
import { extractProducts } from '../scraper/page-extractor.js';
import type { RecordSink } from '../output/snapshot-writer.js';
import { canContinue, createCrawlState, enqueue, nextUrl, remainingRecords, type CrawlState } from './frontier.js';
import { expandLinks } from './link-discoverer.js';
import { discoverSitemapSeeds, type TextSource } from './sitemap.js';

export interface SiteCrawlerDeps {
  fetcher: Pick<Fetcher, 'acquire' | 'recover'>;
  sink: RecordSink;
  filters: FilterConfig;
  /** Source for sitemap probes; sitemap seeding is skipped without one */
  sitemaps?: TextSource;
}

export interface SiteCrawlSummary {
  site: string;
  pagesVisited: number;
  pagesFailed: number;
  recordsEmitted: number;
  aborted: boolean;
  durationMs: number;
}

export class SiteCrawler {
  constructor(private readonly deps: SiteCrawlerDeps) {}

  async crawl(task: SiteTask, signal?: AbortSignal): Promise<SiteCrawlSummary> {
    const startTime = Date.now();
    const state = createCrawlState(task.pageBudget);
    let pagesFailed = 0;

    logger.info('Starting site crawl', {
      site: task.domain,
      url: task.url,
      seeds: task.seeds.length,
      preferStatic: task.preferStatic,
      pageBudget: task.pageBudget,
      recordLimit: task.recordLimit,
    });

    enqueue(state, [task.url, ...task.seeds]);

    if (this.deps.sitemaps && !signal?.aborted) {
      const sitemapSeeds = await discoverSitemapSeeds(task.url, this.deps.sitemaps, {
        timeoutMs: task.staticTimeoutMs,
        signal,
      });
      enqueue(state, sitemapSeeds);
    }

    while (canContinue(state, task.recordLimit)) {
      if (signal?.aborted) {
        break;
      }

      const { url } = nextUrl(state);
      if (!url) {
        break;
      }

      try {
        await this.visitPage(url, task, state, signal);
      } catch (error) {
        if (error instanceof SinkWriteError) {
          throw error;
        }
        pagesFailed++;
        logger.warn('Page failed', { site: task.domain, url, error: getErrorMessage(error) });
      }
    }

    const summary: SiteCrawlSummary = {
      site: task.domain,
      pagesVisited: state.visited.size,
      pagesFailed,
      recordsEmitted: state.recordsEmitted,
      aborted: signal?.aborted ?? false,
      durationMs: Date.now() - startTime,
    };

    logger.info('Site crawl completed', { ...summary });
    return summary;
  }

  private async visitPage(url: string, task: SiteTask, state: CrawlState, signal?: AbortSignal): Promise<void> {
    const acquired = await this.deps.fetcher.acquire(url, task, signal);
    if (!acquired.html) {
      return;
    }

    let html = acquired.html;
    let extraction = extractProducts(html, url, task, this.deps.filters);

    if (task.preferStatic && acquired.strategy === 'static' && extraction.records.length === 0) {
      const recovered = await this.deps.fetcher.recover(url, task, signal);
      if (recovered.html && recovered.html !== html) {
        logger.debug('Retrying extraction on rendered page', { url });
        html = recovered.html;
        extraction = extractProducts(html, url, task, this.deps.filters);
      }
    }

    const records = extraction.records.slice(0, remainingRecords(state, task.recordLimit));
    if (records.length > 0) {
      await this.deps.sink.append(records);
      state.recordsEmitted += records.length;
    }

    logger.info('Page processed', {
      site: task.domain,
      url,
      strategy: acquired.strategy,
      method: extraction.method,
      cards: extraction.cardCount,
      records: records.length,
      totalRecords: state.recordsEmitted,
    });

    const expansion = expandLinks(state, cheerio.load(html), url, this.deps.filters.includeKeywords);
    if (expansion.categories.length > 0 || expansion.pagination.length > 0) {
      logger.debug('Links discovered', {
        url,
        categories: expansion.categories.length,
        pagination: expansion.pagination.length,
        queueSize: state.queue.length,
        pageBudget: state.pageBudget,
      });
    }
  }
}
