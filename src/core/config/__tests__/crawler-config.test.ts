// src/core/config/__tests__/crawler-config.test.ts
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { defaultConfig, loadConfig, parseConfig, withOverrides } from '../crawler-config.js';
import { CrawlError, ErrorCode } from '../../errors.js';

describe('parseConfig', () => {
  it('fills every missing key with its default', () => {
    expect(parseConfig({})).toEqual({
      crawler: {
        requestDelay: 2,
        timeout: 30,
        maxRetries: 3,
        retryDelay: 2,
        settleDelay: 2,
        headless: true,
        screenshot: false,
        screenshotDir: 'screenshots',
        browserSession: 'run',
        forceEnglish: false,
      },
      output: { defaultFormat: 'json', encoding: 'utf-8', indent: 2, outputDir: '.' },
      logging: { level: 'info', file: undefined },
    });
  });

  it('maps snake_case keys onto the config', () => {
    const config = parseConfig({
      crawler: { request_delay: 0.5, browser_session: 'url', force_english: true },
      output: { default_format: 'excel' },
      logging: { level: 'debug', file: 'crawl.log' },
    });

    expect(config.crawler.requestDelay).toBe(0.5);
    expect(config.crawler.browserSession).toBe('url');
    expect(config.crawler.forceEnglish).toBe(true);
    expect(config.output.defaultFormat).toBe('excel');
    expect(config.logging).toEqual({ level: 'debug', file: 'crawl.log' });
  });

  it('rejects unknown keys with their path', () => {
    expect(() => parseConfig({ crawler: { retries: 2 } })).toThrow(/crawler: Unrecognized key\(s\) in object: 'retries'/);
  });

  it('rejects values of the wrong type', () => {
    expect.assertions(3);
    try {
      parseConfig({ crawler: { timeout: 'slow' }, output: { indent: -1 } });
    } catch (error) {
      expect(error).toBeInstanceOf(CrawlError);
      expect(error).toMatchObject({ code: ErrorCode.INVALID_CONFIG });
      expect(error instanceof Error ? error.message : '').toMatch(/crawler\.timeout: .*; output\.indent: /);
    }
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'webcam-crawler-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads an explicit file', async () => {
    const file = path.join(dir, 'config.json');
    await writeFile(file, JSON.stringify({ crawler: { max_retries: 0 } }), 'utf-8');

    const config = await loadConfig(file);

    expect(config.crawler.maxRetries).toBe(0);
    expect(config.crawler.timeout).toBe(30);
  });

  it('fails when an explicit file is missing', async () => {
    await expect(loadConfig(path.join(dir, 'missing.json'))).rejects.toMatchObject({
      code: ErrorCode.INVALID_CONFIG,
    });
  });

  it('fails on malformed JSON', async () => {
    const file = path.join(dir, 'config.json');
    await writeFile(file, '{ "crawler": ', 'utf-8');

    await expect(loadConfig(file)).rejects.toThrow(`Config file ${file} is not valid JSON`);
  });
});

describe('withOverrides', () => {
  it('ignores undefined values', () => {
    const config = withOverrides(defaultConfig(), {
      crawler: { timeout: 5, maxRetries: undefined },
      output: { outputDir: undefined },
    });

    expect(config.crawler.timeout).toBe(5);
    expect(config.crawler.maxRetries).toBe(3);
    expect(config.output.outputDir).toBe('.');
  });
});
