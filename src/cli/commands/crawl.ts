// src/cli/commands/crawl.ts
import { Command } from 'commander';
import { BatchRunner } from '../../core/batch/runner.js';
import { DEFAULT_URLS_FILE } from '../../core/config/constants.js';
import { loadConfig, withOverrides, type AppConfig } from '../../core/config/crawler-config.js';
import { Logger } from '../../core/logger.js';
import type { OutputFormat } from '../../core/types/index.js';
import { collectFormat, parseCount, parsePositiveSeconds, parseSeconds, reportFailure } from './options.js';

export interface CrawlCommandOptions {
  urls: string;
  config?: string;
  render: boolean;
  format?: OutputFormat[];
  out?: string;
  delay?: number;
  timeout?: number;
  retries?: number;
  headless: boolean;
  screenshot: boolean;
  english: boolean;
  minimal: boolean;
  jsonl: boolean;
  verbose: boolean;
}

/** Flags win over the config file; boolean flags only ever switch a setting on (or headless off). */
export function applyCrawlFlags(config: AppConfig, options: CrawlCommandOptions): AppConfig {
  return withOverrides(config, {
    crawler: {
      requestDelay: options.delay,
      timeout: options.timeout,
      maxRetries: options.retries,
      headless: options.headless ? undefined : false,
      screenshot: options.screenshot || undefined,
      forceEnglish: options.english || undefined,
    },
    output: { outputDir: options.out },
    logging: { level: options.verbose ? 'debug' : undefined },
  });
}

export async function runCrawl(options: CrawlCommandOptions): Promise<void> {
  const config = applyCrawlFlags(await loadConfig(options.config), options);
  const log = new Logger(config.logging.level, config.logging.file);

  const controller = new AbortController();
  const onInterrupt = () => {
    log.warn('Interrupted; remaining URLs will be recorded as cancelled');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const runner = new BatchRunner(config, log);
    await runner.run({
      urlsFile: options.urls,
      render: options.render,
      formats: options.format ?? [config.output.defaultFormat],
      minimal: options.minimal,
      jsonl: options.jsonl,
      signal: controller.signal,
    });
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

export function registerCrawlCommand(program: Command): void {
  program
    .command('crawl')
    .description('Crawl every URL in a list and write the results')
    .option('--urls <file>', 'File with one URL per line', DEFAULT_URLS_FILE)
    .option('--config <file>', 'JSON config file (default: crawler.config.json when present)')
    .option('--render', 'Render pages in a headless browser', false)
    .option('--format <fmt...>', 'Output formats (json|csv|excel)', collectFormat)
    .option('--out <dir>', 'Output directory')
    .option('--delay <seconds>', 'Delay between URLs', parseSeconds)
    .option('--timeout <seconds>', 'Per-request timeout', parsePositiveSeconds)
    .option('--retries <n>', 'Retries after a transient failure', parseCount)
    .option('--no-headless', 'Show the browser window')
    .option('--screenshot', 'Save a full-page screenshot per URL (with --render)', false)
    .option('--english', 'Rewrite /vi/ paths to /en/ before fetching', false)
    .option('--minimal', 'Also write per-country files with YouTube streams', false)
    .option('--jsonl', 'Print one JSON record per line', false)
    .option('--verbose', 'Verbose output', false)
    .action(async (options: CrawlCommandOptions) => {
      try {
        await runCrawl(options);
      } catch (error) {
        reportFailure(error);
        process.exit(1);
      }
    });
}
