#!/usr/bin/env node

import { SnapshotOrchestrator, type SnapshotRunResult } from './crawler/snapshot-orchestrator.js';
import { SnapshotWriter } from './output/snapshot-writer.js';
import { Fetcher } from './scraper/fetcher.js';
import { HttpClient } from './scraper/http-client.js';
import { PuppeteerClient } from './scraper/puppeteer-client.js';
import { config } from './utils/config.js';
import { getErrorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { captureError } from './utils/sentry.js';
import { loadSiteList } from './utils/site-list.js';
import { loadSnapshotConfig } from './utils/snapshot-config.js';
import { parseArgs, type CliOptions } from './utils/cli-args.js';

/**
 * One full snapshot: load configuration, crawl every site, write the output files
 */
export async function runSnapshot(
  options: Pick<CliOptions, 'limit' | 'sites'>,
  signal?: AbortSignal
): Promise<SnapshotRunResult> {
  const snapshotConfig = loadSnapshotConfig(config.paths.snapshotConfig);
  const allSites = loadSiteList(config.paths.sites);
  const sites =
    options.sites.length > 0
      ? allSites.filter((site) => options.sites.some((filter) => site.toLowerCase().includes(filter)))
      : allSites;

  if (sites.length === 0) {
    logger.warn('No sites to crawl', { sitesPath: config.paths.sites, filter: options.sites });
  }

  const httpClient = new HttpClient();
  const browser = new PuppeteerClient();
  if (!browser.isConfigured()) {
    logger.warn('CHROME_PATH not set, rendered fetching disabled');
  }

  const orchestrator = new SnapshotOrchestrator({
    fetcher: new Fetcher(browser, httpClient),
    sitemaps: httpClient,
    sink: new SnapshotWriter(config.paths.outDir),
  });

  try {
    return await orchestrator.run(sites, snapshotConfig, {
      limit: options.limit,
      concurrency: config.crawl.siteConcurrency,
      siteDeadlineMs: config.crawl.siteDeadlineMs,
      signal,
    });
  } finally {
    await browser.close();
  }
}

/**
 * Start scheduler mode (keeps the process running)
 */
async function startScheduler(options: CliOptions): Promise<void> {
  logger.info('Starting in scheduler mode');

  const { JobScheduler } = await import('./scheduler/scheduler.js');
  const controller = new AbortController();

  const scheduler = new JobScheduler(
    async () => {
      await runSnapshot(options, controller.signal);
    },
    {
      schedule: options.schedule,
      timezone: config.scheduler.timezone,
      runOnStart: options.runNow,
    }
  );

  const shutdown = (signalName: string): void => {
    logger.info(`Received ${signalName}, shutting down gracefully`);
    scheduler.stop();
    controller.abort();
    process.exitCode = 0;
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await scheduler.start();
}

async function runOnce(options: CliOptions): Promise<void> {
  const controller = new AbortController();
  const onSignal = (): void => {
    logger.info('Interrupted, stopping crawl');
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const result = await runSnapshot(options, controller.signal);
    logger.info('Job completed successfully', {
      records: result.totalRecords,
      sitesFailed: result.failures.length,
    });
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

// Run if called directly
// Check if this is the main module (works with both node and tsx)
const isMainModule = process.argv[1]?.includes('index.ts') || process.argv[1]?.includes('index.js');

if (isMainModule) {
  const options = parseArgs(process.argv.slice(2));
  const job = options.mode === 'scheduler' ? startScheduler(options) : runOnce(options);

  job.catch((error: unknown) => {
    logger.error('Job failed', {
      error: getErrorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    captureError(error, { mode: options.mode });
    process.exitCode = 1;
  });
}
