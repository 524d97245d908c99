/**
 * Page Extractor
 * Runs the extraction pipeline over one fetched page:
 * locate cards -> extract fields -> filter -> assemble records
 */

import * as cheerio from 'cheerio';
import type { ExtractionMethod, FilterConfig, ProductRecord, SiteTask } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { locateCards } from './card-locator.js';
import { extractFields, type ExtractionContext } from './field-extractor.js';
import { filterCandidate, type FilterRejection } from './record-filter.js';
import { assembleRecord } from './record-assembler.js';
import { buildStructuredNameMap } from './structured-data.js';

export interface PageExtraction {
  records: ProductRecord[];
  method: ExtractionMethod;
  cardCount: number;
  rejected: Partial<Record<FilterRejection | 'noise', number>>;
}

export function extractProducts(
  html: string,
  pageUrl: string,
  task: Pick<SiteTask, 'domain' | 'cardSelectors' | 'nameSelectors' | 'urlSelectors'>,
  filters: FilterConfig,
  now: Date = new Date()
): PageExtraction {
  const $ = cheerio.load(html);
  const { cards, method, selector } = locateCards($, task.cardSelectors);

  const ctx: ExtractionContext = {
    pageUrl,
    nameSelectors: task.nameSelectors,
    urlSelectors: task.urlSelectors,
    structuredNames: buildStructuredNameMap($, pageUrl),
  };

  const records: ProductRecord[] = [];
  const rejected: PageExtraction['rejected'] = {};

  for (const card of cards) {
    const fields = extractFields(card, method, ctx);

    const decision = filterCandidate(fields.name, fields.url, fields.price, filters);
    if (!decision.accepted) {
      rejected[decision.reason] = (rejected[decision.reason] ?? 0) + 1;
      continue;
    }

    const record = assembleRecord(fields, task.domain, pageUrl, now);
    if (!record) {
      rejected.noise = (rejected.noise ?? 0) + 1;
      continue;
    }

    records.push(record);
  }

  logger.debug('Extracted page', {
    pageUrl,
    method,
    selector,
    cards: cards.length,
    records: records.length,
    rejected,
  });

  return { records, method, cardCount: cards.length, rejected };
}
