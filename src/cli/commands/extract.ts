// src/cli/commands/extract.ts
import { Command } from 'commander';
import { readFile } from 'fs/promises';
import { loadConfig } from '../../core/config/crawler-config.js';
import { CrawlError, ErrorCode, describeError } from '../../core/errors.js';
import type { FetchStrategy } from '../../core/fetch/types.js';
import { Logger } from '../../core/logger.js';
import { CrawlOrchestrator } from '../../core/orchestrator.js';
import type { PageDocument } from '../../core/types/index.js';
import { reportFailure } from './options.js';

export interface ExtractCommandOptions {
  url: string;
  config?: string;
  verbose: boolean;
}

// Serves one saved page instead of going to the network.
class SavedPage implements FetchStrategy {
  readonly method = 'http';

  constructor(private html: string) {}

  async fetch(url: string): Promise<PageDocument> {
    return {
      url,
      html: this.html,
      method: this.method,
      elapsedMs: 0,
      byteLength: Buffer.byteLength(this.html, 'utf8'),
    };
  }

  async close(): Promise<void> {}
}

/** Returns the record for the saved page as indented JSON. */
export async function runExtract(htmlFile: string, options: ExtractCommandOptions): Promise<string> {
  const config = await loadConfig(options.config);
  const log = new Logger(options.verbose ? 'debug' : config.logging.level, config.logging.file);

  let html: string;
  try {
    html = await readFile(htmlFile, 'utf-8');
  } catch (error) {
    throw new CrawlError(ErrorCode.READ_FAILED, `Cannot read ${htmlFile}: ${describeError(error)}`);
  }

  const crawler = { ...config.crawler, forceEnglish: false };
  const orchestrator = new CrawlOrchestrator(new SavedPage(html), crawler, log);
  const result = await orchestrator.crawl(options.url);
  return JSON.stringify(result, null, config.output.indent);
}

export function registerExtractCommand(program: Command): void {
  program
    .command('extract <htmlFile>')
    .description('Run the extraction pipeline on a saved page')
    .requiredOption('--url <url>', 'URL the page was saved from')
    .option('--config <file>', 'JSON config file')
    .option('--verbose', 'Verbose output', false)
    .action(async (htmlFile: string, options: ExtractCommandOptions) => {
      try {
        console.log(await runExtract(htmlFile, options));
      } catch (error) {
        reportFailure(error);
        process.exit(1);
      }
    });
}
