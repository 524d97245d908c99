/**
 * Fetcher
 * Acquires page HTML by walking an ordered chain of fetch strategies
 * until one returns content.
 */

import type { FetchOutcome, FetchStrategy, FetchStrategyName, SiteTask } from '../types/index.js';
import { logger } from '../utils/logger.js';

export interface FetchStep {
  strategy: FetchStrategy;
  timeoutMs: number;
}

export interface AcquiredPage {
  /** Empty when every strategy failed */
  html: string;
  strategy: FetchStrategyName | null;
}

/**
 * Try each step in order; the first non-empty HTML wins.
 * Returns the last failure when nothing succeeds.
 */
export async function runStrategyChain(
  steps: FetchStep[],
  url: string,
  signal?: AbortSignal
): Promise<FetchOutcome | null> {
  let last: FetchOutcome | null = null;

  for (const step of steps) {
    if (signal?.aborted) {
      break;
    }

    const outcome = await step.strategy.fetch(url, { timeoutMs: step.timeoutMs, signal });
    if (outcome.ok && outcome.html.length > 0) {
      return outcome;
    }

    last = outcome.ok ? { ok: false, error: 'empty response', strategy: outcome.strategy } : outcome;
    logger.debug('Fetch strategy failed', { url, strategy: step.strategy.name, error: last.error });
  }

  return last;
}

export type FetchTaskSettings = Pick<SiteTask, 'preferStatic' | 'renderTimeoutMs' | 'staticTimeoutMs'>;

export class Fetcher {
  constructor(
    private readonly rendered: FetchStrategy,
    private readonly staticStrategy: FetchStrategy
  ) {}

  /**
   * Rendered first, unless the site prefers static fetching
   */
  plan(task: FetchTaskSettings): FetchStep[] {
    const rendered = { strategy: this.rendered, timeoutMs: task.renderTimeoutMs };
    const staticStep = { strategy: this.staticStrategy, timeoutMs: task.staticTimeoutMs };
    return task.preferStatic ? [staticStep, rendered] : [rendered, staticStep];
  }

  async acquire(url: string, task: FetchTaskSettings, signal?: AbortSignal): Promise<AcquiredPage> {
    return this.toPage(url, await runStrategyChain(this.plan(task), url, signal));
  }

  /**
   * Second pass for a static-first page that produced nothing: render it
   */
  async recover(url: string, task: FetchTaskSettings, signal?: AbortSignal): Promise<AcquiredPage> {
    const steps: FetchStep[] = [
      { strategy: this.rendered, timeoutMs: task.renderTimeoutMs },
      { strategy: this.staticStrategy, timeoutMs: task.staticTimeoutMs },
    ];
    return this.toPage(url, await runStrategyChain(steps, url, signal));
  }

  private toPage(url: string, outcome: FetchOutcome | null): AcquiredPage {
    if (outcome?.ok) {
      return { html: outcome.html, strategy: outcome.strategy };
    }

    logger.warn('All fetch strategies failed', { url, error: outcome?.error ?? 'aborted' });
    return { html: '', strategy: null };
  }
}
