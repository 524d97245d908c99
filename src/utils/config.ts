import { config as dotenvConfig } from 'dotenv';
import type { Config } from '../types/index.js';

dotenvConfig();

function getEnvVar(key: string, required = false): string {
  const value = process.env[key];
  if (required && !value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value || '';
}

function getIntEnvVar(key: string, fallback: number): number {
  const parsed = parseInt(getEnvVar(key), 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export const config: Config = {
  paths: {
    snapshotConfig: getEnvVar('SNAPSHOT_CONFIG_PATH') || 'scraper/config.json',
    sites: getEnvVar('SITES_PATH') || 'scraper/sites.txt',
    outDir: getEnvVar('OUT_DIR') || 'out',
  },
  browser: {
    executablePath: getEnvVar('CHROME_PATH'),
    headless: getEnvVar('BROWSER_HEADLESS') !== 'false',
  },
  crawl: {
    siteConcurrency: Math.max(1, getIntEnvVar('SITE_CONCURRENCY', 2)),
    // 0 disables the per-site deadline
    siteDeadlineMs: getIntEnvVar('SITE_DEADLINE_MS', 0),
  },
  scheduler: {
    schedule: getEnvVar('SNAPSHOT_SCHEDULE') || '0 3 * * *',
    timezone: getEnvVar('TIMEZONE') || 'Africa/Cairo',
  },
  app: {
    logLevel: getEnvVar('LOG_LEVEL') || 'info',
  },
};
