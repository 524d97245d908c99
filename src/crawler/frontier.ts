/**
 * Frontier
 * Per-site BFS worklist: FIFO queue, visited set and budgets.
 *
 * A CrawlState belongs to exactly one site crawl. The operations here update
 * it in place and hand it back so callers thread one value through the loop.
 */

import { isHttpUrl, visitKey } from '../utils/canonicalize.js';

/** Maximum URLs waiting in the queue at once */
export const MAX_QUEUE_SIZE = 60;

/** Hard ceiling on pages visited per site */
export const MAX_VISITED_PER_SITE = 5000;

export interface CrawlState {
  queue: string[];
  /** visitKey of everything queued or visited */
  seen: Set<string>;
  visited: Set<string>;
  recordsEmitted: number;
  /** Remaining pagination expansions */
  pageBudget: number;
}

export interface EnqueueResult {
  state: CrawlState;
  added: string[];
}

export function createCrawlState(pageBudget: number): CrawlState {
  return {
    queue: [],
    seen: new Set(),
    visited: new Set(),
    recordsEmitted: 0,
    pageBudget: Math.max(0, pageBudget),
  };
}

/**
 * Append URLs that are http(s), not yet seen, and fit under the queue cap
 */
export function enqueue(state: CrawlState, urls: string[], maxQueue: number = MAX_QUEUE_SIZE): EnqueueResult {
  const added: string[] = [];

  for (const url of urls) {
    if (state.queue.length >= maxQueue) {
      break;
    }
    if (!isHttpUrl(url)) {
      continue;
    }

    const key = visitKey(url);
    if (state.seen.has(key)) {
      continue;
    }

    state.seen.add(key);
    state.queue.push(url);
    added.push(url);
  }

  return { state, added };
}

/**
 * Pop the next URL and mark it visited
 */
export function nextUrl(state: CrawlState): { state: CrawlState; url: string | null } {
  while (state.queue.length > 0) {
    const url = state.queue.shift();
    if (url === undefined) {
      break;
    }

    const key = visitKey(url);
    if (state.visited.has(key)) {
      continue;
    }

    state.visited.add(key);
    return { state, url };
  }

  return { state, url: null };
}

export function recordLimitReached(state: CrawlState, recordLimit: number): boolean {
  return recordLimit > 0 && state.recordsEmitted >= recordLimit;
}

/**
 * How many more records this site may emit (Infinity when unlimited)
 */
export function remainingRecords(state: CrawlState, recordLimit: number): number {
  return recordLimit > 0 ? Math.max(0, recordLimit - state.recordsEmitted) : Infinity;
}

export function canContinue(state: CrawlState, recordLimit: number, maxVisited: number = MAX_VISITED_PER_SITE): boolean {
  return state.queue.length > 0 && !recordLimitReached(state, recordLimit) && state.visited.size < maxVisited;
}
