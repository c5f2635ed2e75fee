// src/core/fetch/http-fetcher.ts
import axios, { type AxiosRequestConfig } from 'axios';
import type { CrawlerConfig } from '../config/crawler-config.js';
import { DEFAULT_HEADERS, USER_AGENTS } from '../config/constants.js';
import { ErrorCode, FetchError, describeError } from '../errors.js';
import type { Log } from '../logger.js';
import type { PageDocument } from '../types/index.js';
import type { Clock, FetchStrategy } from './types.js';
import { isValidUrl } from './utils.js';

export interface HttpResponse {
  status: number;
  data: unknown;
}

// The slice of an AxiosInstance the fetcher needs.
export interface HttpClient {
  get(url: string, config?: AxiosRequestConfig): Promise<HttpResponse>;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Plain GET fetch. Script-driven content is not executed, so pages that build
 * their map or player client-side need the RenderFetcher instead.
 */
export class HttpFetcher implements FetchStrategy {
  readonly method = 'http' as const;
  private agentIndex = 0;

  constructor(
    private log: Log,
    private client: HttpClient = axios.create({ maxRedirects: 5 }),
    private now: Clock = Date.now
  ) {}

  async fetch(url: string, config: CrawlerConfig): Promise<PageDocument> {
    if (!isValidUrl(url)) {
      throw FetchError.permanent(ErrorCode.INVALID_URL, `Invalid URL: ${url}`, { url });
    }

    const userAgent = this.nextUserAgent();
    this.log.debug(`GET ${url} (${userAgent.slice(0, 40)}...)`);

    const started = this.now();
    let response: HttpResponse;
    try {
      response = await this.client.get(url, {
        headers: { ...DEFAULT_HEADERS, 'User-Agent': userAgent },
        timeout: config.timeout * 1000,
        responseType: 'text',
        validateStatus: () => true,
      });
    } catch (error) {
      throw classifyRequestError(url, error);
    }

    if (response.status < 200 || response.status >= 300) {
      throw FetchError.transient(ErrorCode.HTTP_STATUS, `HTTP ${response.status} for ${url}`, {
        url,
        status: response.status,
      });
    }

    const html = bodyText(response.data);
    return {
      url,
      html,
      method: this.method,
      elapsedMs: this.now() - started,
      byteLength: Buffer.byteLength(html, 'utf8'),
    };
  }

  async close(): Promise<void> {
    // No pooled resources.
  }

  private nextUserAgent(): string {
    const agent = USER_AGENTS[this.agentIndex % USER_AGENTS.length] ?? USER_AGENTS[0] ?? '';
    this.agentIndex += 1;
    return agent;
  }
}

export function classifyRequestError(url: string, error: unknown): FetchError {
  if (axios.isAxiosError(error) && error.code && TIMEOUT_CODES.has(error.code)) {
    return FetchError.transient(ErrorCode.TIMEOUT, `Timed out fetching ${url}`, { url });
  }
  return FetchError.transient(
    ErrorCode.NETWORK_ERROR,
    `Request to ${url} failed: ${describeError(error)}`,
    { url }
  );
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (data === undefined || data === null) {
    return '';
  }
  return Buffer.isBuffer(data) ? data.toString('utf8') : JSON.stringify(data);
}
