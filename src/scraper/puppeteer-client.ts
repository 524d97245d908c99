import puppeteer, { type Browser, type BrowserContext, type Page } from 'puppeteer-core';
import type { FetchOptions, FetchOutcome, FetchStrategy } from '../types/index.js';
import { config } from '../utils/config.js';
import { CrawlAbortedError, getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import { LOAD_MORE_TEXTS } from './catalog-selectors.js';
import { ACCEPT_LANGUAGE, BROWSER_USER_AGENT } from './http-client.js';

/**
 * Masks the usual headless-automation tells before any page script runs
 */
const STEALTH_SCRIPT = `
Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
window.chrome = window.chrome || { runtime: {} };
Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en', 'ar'] });
Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5] });
`;

/** Elements that can act as a load-more control */
const LOAD_MORE_CONTROLS = 'button, a, [role="button"]';

const LOAD_MORE_LABELS = LOAD_MORE_TEXTS.map((text) => text.toLowerCase());

/**
 * Case-insensitive match of a control's text against the load-more list
 */
export function isLoadMoreLabel(label: string): boolean {
  const normalized = label.replace(/\s+/g, ' ').trim().toLowerCase();
  return normalized.length > 0 && LOAD_MORE_LABELS.some((text) => normalized.includes(text));
}

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-blink-features=AutomationControlled',
];

export interface PuppeteerClientOptions {
  executablePath?: string;
  headless?: boolean;
  /** Load-more/scroll rounds per page (default: 4) */
  rounds?: number;
  /** Scroll distance per round in px (default: 1500) */
  scrollStepPx?: number;
  /** Pause after each click or scroll in ms (default: 900) */
  settleMs?: number;
}

/**
 * Rendered page acquisition through a local headless Chrome.
 *
 * One browser process is shared by every site; each fetch gets its own
 * incognito context, which is always closed afterwards.
 */
export class PuppeteerClient implements FetchStrategy {
  readonly name = 'rendered' as const;

  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;
  private readonly executablePath: string;
  private readonly headless: boolean;
  private readonly rounds: number;
  private readonly scrollStepPx: number;
  private readonly settleMs: number;

  constructor(options: PuppeteerClientOptions = {}) {
    this.executablePath = options.executablePath ?? config.browser.executablePath;
    this.headless = options.headless ?? config.browser.headless;
    this.rounds = options.rounds ?? 4;
    this.scrollStepPx = options.scrollStepPx ?? 1500;
    this.settleMs = options.settleMs ?? 900;
  }

  isConfigured(): boolean {
    return this.executablePath.length > 0;
  }

  /**
   * Render a page, expand lazy listings, and return the resulting DOM; never throws
   */
  async fetch(url: string, options: FetchOptions): Promise<FetchOutcome> {
    if (!this.isConfigured()) {
      return { ok: false, error: 'CHROME_PATH not configured', strategy: this.name };
    }
    if (options.signal?.aborted) {
      return { ok: false, error: 'aborted', strategy: this.name };
    }

    const deadline = Date.now() + options.timeoutMs;
    const signal = options.signal;
    let context: BrowserContext | null = null;
    let closing: Promise<void> | null = null;

    // Closing the context rejects any pending navigation or evaluation
    const closeContext = (): Promise<void> => {
      if (!context) {
        return Promise.resolve();
      }
      if (!closing) {
        closing = context.close().catch((closeError: unknown) => {
          logger.debug('Failed to close browser context', { url, error: getErrorMessage(closeError) });
        });
      }
      return closing;
    };
    const onAbort = (): void => {
      void closeContext();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const browser = await this.getBrowser();
      context = await browser.createBrowserContext();
      if (signal?.aborted) {
        throw new CrawlAbortedError();
      }

      const page = await context.newPage();
      await this.preparePage(page, options.timeoutMs);

      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: options.timeoutMs });
      await this.expandListing(page, deadline, signal);

      const html = await page.content();
      logger.debug('Rendered page', { url, htmlLength: html.length });

      return { ok: true, html, strategy: this.name };
    } catch (error) {
      const message = getErrorMessage(error);
      logger.debug('Rendered fetch failed', { url, error: message });
      return { ok: false, error: message, strategy: this.name };
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await closeContext();
    }
  }

  /**
   * Close the shared browser process
   */
  async close(): Promise<void> {
    const pending = this.launching;
    this.launching = null;

    const browser = this.browser ?? (pending ? await pending.catch(() => null) : null);
    this.browser = null;

    if (browser) {
      await browser.close();
      logger.info('Browser closed');
    }
  }

  private getBrowser(): Promise<Browser> {
    if (this.browser?.connected) {
      return Promise.resolve(this.browser);
    }

    if (!this.launching) {
      logger.info('Launching browser', { executablePath: this.executablePath, headless: this.headless });

      this.launching = puppeteer
        .launch({
          executablePath: this.executablePath,
          headless: this.headless,
          args: LAUNCH_ARGS,
        })
        .then((browser) => {
          this.browser = browser;
          this.launching = null;
          return browser;
        })
        .catch((error: unknown) => {
          this.launching = null;
          throw error;
        });
    }

    return this.launching;
  }

  private async preparePage(page: Page, timeoutMs: number): Promise<void> {
    page.setDefaultTimeout(timeoutMs);
    page.setDefaultNavigationTimeout(timeoutMs);
    await page.setViewport({ width: 1366, height: 900 });
    await page.setUserAgent(BROWSER_USER_AGENT);
    await page.setExtraHTTPHeaders({ 'Accept-Language': ACCEPT_LANGUAGE });
    await page.evaluateOnNewDocument(STEALTH_SCRIPT);
  }

  /**
   * Click any load-more control and scroll, a bounded number of rounds
   */
  private async expandListing(page: Page, deadline: number, signal?: AbortSignal): Promise<void> {
    for (let round = 0; round < this.rounds; round++) {
      if (signal?.aborted || Date.now() >= deadline) {
        return;
      }

      const clicked = await this.clickLoadMore(page, signal);
      logger.debug('Expanded listing', { round: round + 1, clicked });

      await page.mouse.wheel({ deltaY: this.scrollStepPx });
      await sleep(this.settleMs, signal);
    }
  }

  /**
   * Click every visible control whose label matches a load-more text; returns the click count
   */
  private async clickLoadMore(page: Page, signal?: AbortSignal): Promise<number> {
    const handles = await page.$$(LOAD_MORE_CONTROLS);
    let clicked = 0;

    try {
      for (const handle of handles) {
        if (signal?.aborted) {
          break;
        }
        try {
          const label = await handle.evaluate((element) => element.textContent ?? '');
          if (!isLoadMoreLabel(label)) {
            continue;
          }
          await handle.click();
          clicked++;
          await sleep(this.settleMs, signal);
        } catch (error) {
          // Controls detach when the listing re-renders
          logger.debug('Load-more click failed', { error: getErrorMessage(error) });
        }
      }
    } finally {
      await Promise.all(handles.map((handle) => handle.dispose()));
    }

    return clicked;
  }
}
