// src/core/orchestrator.ts
import type { CrawlerConfig } from './config/crawler-config.js';
import { CrawlError, ErrorCode, FetchError, describeError, toCrawlFailure } from './errors.js';
import { extractPage } from './extract/index.js';
import { locationFromUrl } from './extract/location.js';
import type { FetchStrategy } from './fetch/types.js';
import { cleanInputUrl, forceEnglishPath } from './fetch/utils.js';
import type { Log } from './logger.js';
import type { CrawlResult, PageDocument } from './types/index.js';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

type FetchOutcome =
  | { ok: true; document: PageDocument; attempts: number }
  | { ok: false; error: FetchError; attempts: number };

/**
 * Per-URL state machine: pending -> fetching -> extracting -> success | error.
 * crawl() always resolves with exactly one record.
 */
export class CrawlOrchestrator {
  constructor(
    private strategy: FetchStrategy,
    private config: CrawlerConfig,
    private log: Log,
    private wait: Sleep = sleep,
    private clock: () => Date = () => new Date()
  ) {}

  prepareUrl(raw: string): string {
    const url = cleanInputUrl(raw);
    return this.config.forceEnglish ? forceEnglishPath(url) : url;
  }

  async crawl(rawUrl: string): Promise<CrawlResult> {
    const url = this.prepareUrl(rawUrl);
    this.log.debug(`${url}: pending`);

    const outcome = await this.fetchWithRetry(url);
    if (!outcome.ok) {
      this.log.debug(`${url}: error`);
      return this.failed(url, outcome.error, outcome.attempts);
    }

    this.log.debug(`${url}: extracting`);
    const { document } = outcome;
    try {
      const extraction = extractPage(document, this.log);
      this.log.debug(`${url}: success`);
      return {
        url,
        timestamp: this.clock().toISOString(),
        method: document.method,
        status: 'success',
        attempts: outcome.attempts,
        pageInfo: extraction.pageInfo,
        location: extraction.location,
        streams: extraction.streams,
        maps: extraction.maps,
        ...(document.screenshotPath ? { screenshotPath: document.screenshotPath } : {}),
        warnings: extraction.warnings,
      };
    } catch (error) {
      const failure = new CrawlError(
        ErrorCode.PARSE_FAILED,
        `Extraction failed for ${url}: ${describeError(error)}`
      );
      this.log.error(failure.message);
      return this.failed(url, failure, outcome.attempts);
    }
  }

  /** Record for a URL that ends without a document, e.g. after cancellation. */
  failed(rawUrl: string, error: CrawlError, attempts = 0): CrawlResult {
    const url = this.prepareUrl(rawUrl);
    return {
      url,
      timestamp: this.clock().toISOString(),
      method: this.strategy.method,
      status: 'error',
      attempts,
      location: {
        breadcrumbs: [],
        locationFromUrl: locationFromUrl(url),
        coordinates: { source: 'none' },
      },
      error: toCrawlFailure(error),
      warnings: [],
    };
  }

  private async fetchWithRetry(url: string): Promise<FetchOutcome> {
    const maxAttempts = this.config.maxRetries + 1;
    let lastError: FetchError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      this.log.debug(`${url}: fetching (attempt ${attempt}/${maxAttempts})`);
      try {
        const document = await this.strategy.fetch(url, this.config);
        return { ok: true, document, attempts: attempt };
      } catch (error) {
        lastError = asFetchError(url, error);
        if (lastError.kind === 'permanent') {
          this.log.warn(`${url}: ${lastError.message}`);
          return { ok: false, error: lastError, attempts: attempt };
        }
        if (attempt < maxAttempts) {
          this.log.warn(
            `Attempt ${attempt}/${maxAttempts} failed for ${url}: ${lastError.message}; retrying in ${this.config.retryDelay}s`
          );
          await this.wait(this.config.retryDelay * 1000);
        }
      }
    }

    const error =
      lastError ?? FetchError.transient(ErrorCode.NETWORK_ERROR, `No attempt made for ${url}`, { url });
    this.log.error(`Giving up on ${url} after ${maxAttempts} attempt(s): ${error.message}`);
    return { ok: false, error, attempts: maxAttempts };
  }
}

function asFetchError(url: string, error: unknown): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  return FetchError.transient(ErrorCode.NETWORK_ERROR, `Fetch failed for ${url}: ${describeError(error)}`, { url });
}
