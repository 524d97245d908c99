/**
 * Snapshot Orchestrator
 * Runs every configured site through the SiteCrawler with bounded concurrency
 * and writes one snapshot per run.
 *
 * A failing site is logged and reported; the other sites carry on.
 * A failing write ends the run.
 */

import pLimit from 'p-limit';
import type { SnapshotConfig } from '../types/index.js';
import { CrawlAbortedError, getErrorMessage, SinkWriteError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { captureError } from '../utils/sentry.js';
import { resolveSiteTask } from '../utils/snapshot-config.js';
import type { RecordSink } from '../output/snapshot-writer.js';
import { SiteCrawler, type SiteCrawlerDeps, type SiteCrawlSummary } from './site-crawler.js';

export interface SnapshotSink extends RecordSink {
  reset(): Promise<void>;
  finalize(): Promise<void>;
}

export interface SnapshotRunOptions {
  /** Per-site record limit, 0 for unlimited */
  limit: number;
  /** Sites crawled at once (default: 1) */
  concurrency?: number;
  /** Per-site wall clock limit in ms, 0 for none */
  siteDeadlineMs?: number;
  /** Aborts every site crawl still running */
  signal?: AbortSignal;
}

export interface SiteFailure {
  site: string;
  error: string;
}

export interface SnapshotRunResult {
  sites: SiteCrawlSummary[];
  failures: SiteFailure[];
  totalRecords: number;
  durationMs: number;
}

export class SnapshotOrchestrator {
  constructor(private readonly deps: Omit<SiteCrawlerDeps, 'sink' | 'filters'> & { sink: SnapshotSink }) {}

  async run(siteUrls: string[], cfg: SnapshotConfig, options: SnapshotRunOptions): Promise<SnapshotRunResult> {
    const startTime = Date.now();
    const concurrency = Math.max(1, options.concurrency ?? 1);

    logger.info('=== Snapshot run started ===', {
      sites: siteUrls.length,
      limit: options.limit,
      concurrency,
    });

    await this.deps.sink.reset();

    const crawler = new SiteCrawler({ ...this.deps, filters: cfg.filters });
    const runController = new AbortController();
    const onExternalAbort = (): void => runController.abort(new CrawlAbortedError('Snapshot run aborted'));
    if (options.signal?.aborted) {
      onExternalAbort();
    }
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });

    const sites: SiteCrawlSummary[] = [];
    const failures: SiteFailure[] = [];
    const writeFailures: SinkWriteError[] = [];

    const limit = pLimit(concurrency);

    try {
      await Promise.all(
        siteUrls.map((siteUrl) =>
          limit(async () => {
            if (runController.signal.aborted) {
              return;
            }
            try {
              sites.push(await this.runSite(crawler, siteUrl, cfg, options, runController.signal));
            } catch (error) {
              if (error instanceof SinkWriteError) {
                writeFailures.push(error);
                runController.abort(error);
                return;
              }
              const message = getErrorMessage(error);
              logger.error('Site crawl failed', { siteUrl, error: message });
              captureError(error, { siteUrl });
              failures.push({ site: siteUrl, error: message });
            }
          })
        )
      );
    } finally {
      options.signal?.removeEventListener('abort', onExternalAbort);
    }

    if (writeFailures.length > 0) {
      throw writeFailures[0];
    }

    await this.deps.sink.finalize();

    const result: SnapshotRunResult = {
      sites,
      failures,
      totalRecords: sites.reduce((sum, site) => sum + site.recordsEmitted, 0),
      durationMs: Date.now() - startTime,
    };

    logger.info('=== Snapshot run completed ===', {
      sitesCompleted: sites.length,
      sitesFailed: failures.length,
      totalRecords: result.totalRecords,
      duration: `${(result.durationMs / 1000).toFixed(1)}s`,
    });

    return result;
  }

  private async runSite(
    crawler: SiteCrawler,
    siteUrl: string,
    cfg: SnapshotConfig,
    options: SnapshotRunOptions,
    runSignal: AbortSignal
  ): Promise<SiteCrawlSummary> {
    const task = resolveSiteTask(siteUrl, cfg, options.limit);
    const controller = new AbortController();
    const onRunAbort = (): void => controller.abort(runSignal.reason);
    runSignal.addEventListener('abort', onRunAbort, { once: true });

    const deadlineMs = options.siteDeadlineMs ?? 0;
    const timer =
      deadlineMs > 0
        ? setTimeout(() => {
            logger.warn('Site deadline reached, stopping crawl', { site: task.domain, deadlineMs });
            controller.abort(new CrawlAbortedError(`Site deadline of ${deadlineMs}ms exceeded`));
          }, deadlineMs)
        : null;

    try {
      return await crawler.crawl(task, controller.signal);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      runSignal.removeEventListener('abort', onRunAbort);
    }
  }
}
