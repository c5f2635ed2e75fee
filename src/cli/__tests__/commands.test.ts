// src/cli/__tests__/commands.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { Command, InvalidArgumentError } from 'commander';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { applyCrawlFlags, registerCrawlCommand, type CrawlCommandOptions } from '../commands/crawl.js';
import { registerExtractCommand, runExtract } from '../commands/extract.js';
import { collectFormat, parseCount, parsePositiveSeconds, parseSeconds } from '../commands/options.js';
import { defaultConfig } from '../../core/config/crawler-config.js';
import { CrawlError, ErrorCode } from '../../core/errors.js';

const baseOptions: CrawlCommandOptions = {
  urls: 'urls.txt',
  render: false,
  headless: true,
  screenshot: false,
  english: false,
  minimal: false,
  jsonl: false,
  verbose: false,
};

describe('CLI option parsers', () => {
  it('collects output formats without duplicates', () => {
    expect(collectFormat('csv')).toEqual(['csv']);
    expect(collectFormat('EXCEL', ['csv'])).toEqual(['csv', 'excel']);
    expect(collectFormat('csv', ['csv'])).toEqual(['csv']);
  });

  it('rejects unknown formats', () => {
    expect(() => collectFormat('xml')).toThrow(InvalidArgumentError);
  });

  it('parses seconds and counts', () => {
    expect(parseSeconds('1.5')).toBe(1.5);
    expect(parseCount('3')).toBe(3);
    expect(() => parseSeconds('-1')).toThrow(InvalidArgumentError);
    expect(() => parseSeconds('')).toThrow(InvalidArgumentError);
    expect(() => parseCount('2.5')).toThrow(InvalidArgumentError);
  });

  it('requires a positive timeout', () => {
    expect(parsePositiveSeconds('0.5')).toBe(0.5);
    expect(parseSeconds('0')).toBe(0);
    expect(() => parsePositiveSeconds('0')).toThrow('Expected a positive number of seconds.');
    expect(() => parsePositiveSeconds('-2')).toThrow(InvalidArgumentError);
  });
});

describe('applyCrawlFlags', () => {
  it('leaves the config alone when no flag is given', () => {
    const config = defaultConfig();

    expect(applyCrawlFlags(config, baseOptions)).toEqual(config);
  });

  it('lets flags override config values', () => {
    const config = applyCrawlFlags(defaultConfig(), {
      ...baseOptions,
      delay: 0,
      timeout: 10,
      retries: 1,
      headless: false,
      screenshot: true,
      english: true,
      out: 'results',
      verbose: true,
    });

    expect(config.crawler).toMatchObject({
      requestDelay: 0,
      timeout: 10,
      maxRetries: 1,
      headless: false,
      screenshot: true,
      forceEnglish: true,
    });
    expect(config.output.outputDir).toBe('results');
    expect(config.logging.level).toBe('debug');
  });

  it('does not switch off settings enabled in the config file', () => {
    const fromFile = defaultConfig();
    fromFile.crawler.screenshot = true;
    fromFile.crawler.headless = false;

    const config = applyCrawlFlags(fromFile, baseOptions);

    expect(config.crawler.screenshot).toBe(true);
    expect(config.crawler.headless).toBe(false);
  });
});

describe('command registration', () => {
  it('registers crawl with its flags', () => {
    const program = new Command();
    registerCrawlCommand(program);

    const command = program.commands.find((cmd) => cmd.name() === 'crawl');
    const flags = command?.options.map((option) => option.long);
    expect(flags).toEqual(expect.arrayContaining(['--urls', '--render', '--format', '--minimal', '--no-headless']));
  });

  it('rejects --timeout 0 before crawling', async () => {
    const program = new Command().exitOverride().configureOutput({ writeErr: () => undefined });
    registerCrawlCommand(program);

    await expect(program.parseAsync(['crawl', '--timeout', '0'], { from: 'user' })).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
  });

  it('registers extract with a required --url', () => {
    const program = new Command();
    registerExtractCommand(program);

    const command = program.commands.find((cmd) => cmd.name() === 'extract');
    expect(command?.options.find((option) => option.long === '--url')?.mandatory).toBe(true);
  });
});

describe('runExtract', () => {
  let dir: string;
  let errorSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'webcam-crawler-cli-'));
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    errorSpy.mockRestore();
    await rm(dir, { recursive: true, force: true });
  });

  it('prints the record for a saved page', async () => {
    const htmlFile = path.join(dir, 'page.html');
    const configFile = path.join(dir, 'config.json');
    await writeFile(htmlFile, '<html><head><title>Saved Cam</title></head><body></body></html>', 'utf-8');
    await writeFile(configFile, JSON.stringify({ output: { indent: 4 } }), 'utf-8');

    const output = await runExtract(htmlFile, {
      url: 'https://www.example.com/camera/vietnam/saved-cam/',
      config: configFile,
      verbose: false,
    });

    const record = JSON.parse(output);
    expect(output.split('\n')[1]).toBe('    "url": "https://www.example.com/camera/vietnam/saved-cam/",');
    expect(record.status).toBe('success');
    expect(record.pageInfo.title).toBe('Saved Cam');
    expect(record.location.locationFromUrl).toBe('Vietnam');
  });

  it('raises INVALID_CONFIG when an explicit config file is missing', async () => {
    const attempt = runExtract(path.join(dir, 'page.html'), {
      url: 'https://www.example.com/camera/x/',
      config: path.join(dir, 'absent.json'),
      verbose: false,
    });

    await expect(attempt).rejects.toBeInstanceOf(CrawlError);
    await expect(attempt).rejects.toMatchObject({ code: ErrorCode.INVALID_CONFIG });
  });

  it('raises READ_FAILED for a missing page file', async () => {
    const configFile = path.join(dir, 'config.json');
    await writeFile(configFile, '{}', 'utf-8');

    await expect(
      runExtract(path.join(dir, 'missing.html'), { url: 'https://www.example.com/camera/x/', config: configFile, verbose: false })
    ).rejects.toMatchObject({ code: ErrorCode.READ_FAILED });
  });
});
