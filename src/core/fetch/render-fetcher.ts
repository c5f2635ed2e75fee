// src/core/fetch/render-fetcher.ts
import { mkdir } from 'fs/promises';
import * as path from 'path';
import type { CrawlerConfig } from '../config/crawler-config.js';
import { ErrorCode, FetchError, describeError } from '../errors.js';
import type { Log } from '../logger.js';
import type { PageDocument } from '../types/index.js';
import type { Clock, FetchStrategy } from './types.js';
import { isValidUrl, screenshotPathFor } from './utils.js';

// The parts of a Playwright Page and BrowserContext the fetcher drives.
export interface RenderPage {
  goto(url: string, options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<unknown>;
  waitForTimeout(timeout: number): Promise<void>;
  content(): Promise<string>;
  screenshot(options: { path: string; fullPage: boolean }): Promise<unknown>;
  close(): Promise<void>;
}

export interface PageSource {
  newPage(): Promise<RenderPage>;
}

export interface PageHost {
  launch(): Promise<PageSource>;
  close(): Promise<void>;
}

export class RenderFetcher implements FetchStrategy {
  readonly method = 'browser' as const;

  constructor(
    private host: PageHost,
    private log: Log,
    private now: Clock = Date.now
  ) {}

  async fetch(url: string, config: CrawlerConfig): Promise<PageDocument> {
    if (!isValidUrl(url)) {
      throw FetchError.permanent(ErrorCode.INVALID_URL, `Invalid URL: ${url}`, { url });
    }

    const started = this.now();
    let page: RenderPage | undefined;
    try {
      const source = await this.host.launch();
      page = await source.newPage();

      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: config.timeout * 1000 });
      if (config.settleDelay > 0) {
        await page.waitForTimeout(config.settleDelay * 1000);
      }
      const html = await page.content();
      const screenshotPath = config.screenshot
        ? await this.capture(page, url, config.screenshotDir)
        : undefined;

      return {
        url,
        html,
        method: this.method,
        elapsedMs: this.now() - started,
        byteLength: Buffer.byteLength(html, 'utf8'),
        screenshotPath,
      };
    } catch (error) {
      throw classifyNavigationError(url, error);
    } finally {
      if (page) {
        await this.closePage(page, url);
      }
      if (config.browserSession === 'url') {
        await this.releaseSession(url);
      }
    }
  }

  async close(): Promise<void> {
    await this.host.close();
  }

  private async capture(page: RenderPage, url: string, dir: string): Promise<string | undefined> {
    const target = screenshotPathFor(url, dir);
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await page.screenshot({ path: target, fullPage: true });
      this.log.info(`Screenshot saved: ${target}`);
      return target;
    } catch (error) {
      this.log.warn(`Screenshot failed for ${url}: ${describeError(error)}`);
      return undefined;
    }
  }

  private async releaseSession(url: string): Promise<void> {
    try {
      await this.host.close();
    } catch (error) {
      this.log.warn(`Failed to close browser after ${url}: ${describeError(error)}`);
    }
  }

  private async closePage(page: RenderPage, url: string): Promise<void> {
    try {
      await page.close();
    } catch (error) {
      this.log.warn(`Failed to close page for ${url}: ${describeError(error)}`);
    }
  }
}

export function classifyNavigationError(url: string, error: unknown): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return FetchError.transient(ErrorCode.TIMEOUT, `Timed out loading ${url}`, { url });
  }
  return FetchError.transient(
    ErrorCode.NAVIGATION_FAILED,
    `Navigation failed for ${url}: ${describeError(error)}`,
    { url }
  );
}
