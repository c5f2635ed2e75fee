// src/core/fetch/types.ts
import type { CrawlerConfig } from '../config/crawler-config.js';
import type { FetchMethod, PageDocument } from '../types/index.js';

/**
 * One way of turning a URL into a PageDocument. Rejections are always
 * `FetchError`s tagged transient or permanent.
 */
export interface FetchStrategy {
  readonly method: FetchMethod;
  fetch(url: string, config: CrawlerConfig): Promise<PageDocument>;
  close(): Promise<void>;
}

export type Clock = () => number;
