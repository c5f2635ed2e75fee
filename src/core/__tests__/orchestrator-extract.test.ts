// src/core/__tests__/orchestrator-extract.test.ts
import { describe, it, expect, jest } from '@jest/globals';
import { defaultConfig } from '../config/crawler-config.js';
import { extractPage } from '../extract/index.js';
import type { FetchStrategy } from '../fetch/types.js';
import type { Log } from '../logger.js';
import { CrawlOrchestrator } from '../orchestrator.js';

jest.mock('../extract/index.js', () => ({
  extractPage: jest.fn(),
}));

const silentLog: Log = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

describe('CrawlOrchestrator extraction failures', () => {
  it('turns an extraction crash into a parse_failed record', async () => {
    (extractPage as unknown as jest.Mock).mockImplementation(() => {
      throw new Error('unexpected markup');
    });
    const url = 'https://www.example.com/camera/vietnam/x/';
    const strategy: FetchStrategy = {
      method: 'browser',
      fetch: jest.fn<FetchStrategy['fetch']>().mockResolvedValue({
        url,
        html: '<html></html>',
        method: 'browser',
        elapsedMs: 1,
        byteLength: 13,
      }),
      close: jest.fn<FetchStrategy['close']>().mockResolvedValue(undefined),
    };
    const orchestrator = new CrawlOrchestrator(strategy, defaultConfig().crawler, silentLog);

    const result = await orchestrator.crawl(url);

    expect(result.status).toBe('error');
    expect(result.method).toBe('browser');
    expect(result.attempts).toBe(1);
    expect(result.error).toEqual({
      code: 'parse_failed',
      message: `Extraction failed for ${url}: unexpected markup`,
      retryable: false,
    });
  });
});
