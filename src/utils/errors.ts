/**
 * Raised when a site crawl is cancelled through its AbortSignal
 * (run shutdown or per-site deadline)
 */
export class CrawlAbortedError extends Error {
  constructor(message = 'Crawl aborted') {
    super(message);
    this.name = 'CrawlAbortedError';
  }
}

/**
 * Raised when records cannot be appended to the snapshot output.
 * Unlike page and site failures this ends the whole run.
 */
export class SinkWriteError extends Error {
  readonly cause: unknown;

  constructor(message: string, cause: unknown) {
    super(message);
    this.name = 'SinkWriteError';
    this.cause = cause;
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
