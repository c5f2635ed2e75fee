// src/core/fetch/index.ts
import type { CrawlerConfig } from '../config/crawler-config.js';
import { USER_AGENTS } from '../config/constants.js';
import type { Log } from '../logger.js';
import { BrowserManager } from './browser.js';
import { HttpFetcher } from './http-fetcher.js';
import { RenderFetcher } from './render-fetcher.js';
import type { FetchStrategy } from './types.js';

export { BrowserManager } from './browser.js';
export { HttpFetcher, type HttpClient, type HttpResponse } from './http-fetcher.js';
export { RenderFetcher, type PageHost, type PageSource, type RenderPage } from './render-fetcher.js';
export type { Clock, FetchStrategy } from './types.js';
export * from './utils.js';

export function createFetchStrategy(render: boolean, config: CrawlerConfig, log: Log): FetchStrategy {
  if (!render) {
    return new HttpFetcher(log);
  }
  const browser = new BrowserManager(log, { headless: config.headless, userAgent: USER_AGENTS[0] });
  return new RenderFetcher(browser, log);
}
