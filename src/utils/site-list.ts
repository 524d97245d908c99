import * as fs from 'fs';
import { logger } from './logger.js';

/**
 * Parse the site list: one URL per line, '#' comments and blank lines skipped,
 * list bullets stripped, bare hostnames promoted to https://
 */
export function parseSiteList(text: string): string[] {
  const sites: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const site = trimmed.replace(/^[-•*\s]+/, '').trim();
    if (!site) {
      continue;
    }

    sites.push(/^https?:\/\//i.test(site) ? site : `https://${site}`);
  }

  return sites;
}

export function loadSiteList(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    logger.warn('Site list not found', { filePath });
    return [];
  }
  return parseSiteList(fs.readFileSync(filePath, 'utf-8'));
}
