// src/core/batch/runner.ts
import { readFile } from 'node:fs/promises';
import type { AppConfig, CrawlerConfig } from '../config/crawler-config.js';
import { CrawlError, ErrorCode, describeError } from '../errors.js';
import { formatJsonLine, writeOutputs } from '../export/index.js';
import { createFetchStrategy } from '../fetch/index.js';
import type { FetchStrategy } from '../fetch/types.js';
import type { Log } from '../logger.js';
import { CrawlOrchestrator, sleep, type Sleep } from '../orchestrator.js';
import type { CrawlResult, OutputFormat } from '../types/index.js';

export interface BatchOptions {
  urlsFile: string;
  render: boolean;
  formats: readonly OutputFormat[];
  minimal: boolean;
  jsonl: boolean;
  signal?: AbortSignal;
}

export interface BatchSummary {
  total: number;
  success: number;
  failed: number;
  duration: number;
  failures: Array<{ url: string; error: string }>;
  results: CrawlResult[];
  outputs: string[];
}

export interface BatchDependencies {
  createStrategy: (render: boolean, config: CrawlerConfig, log: Log) => FetchStrategy;
  sleep: Sleep;
  clock: () => Date;
}

export class BatchRunner {
  private deps: BatchDependencies;

  constructor(
    private config: AppConfig,
    private log: Log,
    deps: Partial<BatchDependencies> = {}
  ) {
    this.deps = {
      createStrategy: createFetchStrategy,
      sleep,
      clock: () => new Date(),
      ...deps,
    };
  }

  async run(options: BatchOptions): Promise<BatchSummary> {
    const urls = await this.parseUrls(options.urlsFile);
    if (urls.length === 0) {
      this.log.warn(`No URLs found in ${options.urlsFile}`);
    }
    return this.crawlAll(urls, options);
  }

  async crawlAll(urls: readonly string[], options: BatchOptions): Promise<BatchSummary> {
    const startTime = this.deps.clock().getTime();
    const results: CrawlResult[] = [];
    const failures: Array<{ url: string; error: string }> = [];

    if (urls.length > 0) {
      const strategy = this.deps.createStrategy(options.render, this.config.crawler, this.log);
      const orchestrator = new CrawlOrchestrator(
        strategy,
        this.config.crawler,
        this.log,
        this.deps.sleep,
        this.deps.clock
      );

      try {
        for (const [index, url] of urls.entries()) {
          const result = options.signal?.aborted
            ? orchestrator.failed(url, new CrawlError(ErrorCode.CANCELLED, 'Run cancelled before this URL was visited'))
            : await orchestrator.crawl(url);
          results.push(result);
          this.report(result, failures, options.jsonl);

          const isLast = index === urls.length - 1;
          if (!isLast && !options.signal?.aborted && this.config.crawler.requestDelay > 0) {
            await this.deps.sleep(this.config.crawler.requestDelay * 1000);
          }
        }
      } finally {
        await strategy.close();
      }
    }

    const success = results.filter((result) => result.status === 'success').length;
    const outputs = results.length > 0
      ? await writeOutputs(
          results,
          {
            formats: options.formats,
            minimal: options.minimal,
            outputDir: this.config.output.outputDir,
            encoding: this.config.output.encoding,
            indent: this.config.output.indent,
            date: this.deps.clock(),
          },
          this.log
        )
      : [];

    const summary: BatchSummary = {
      total: urls.length,
      success,
      failed: results.length - success,
      duration: this.deps.clock().getTime() - startTime,
      failures,
      results,
      outputs,
    };

    this.printSummary(summary);
    return summary;
  }

  async parseUrls(filePath: string): Promise<string[]> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw new CrawlError(
        ErrorCode.READ_FAILED,
        `Cannot read URL file ${filePath}: ${describeError(error)}`,
        false,
        'Pass an existing file with --urls'
      );
    }

    return content
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('#'));
  }

  private report(
    result: CrawlResult,
    failures: Array<{ url: string; error: string }>,
    jsonl: boolean
  ): void {
    if (jsonl) {
      console.log(formatJsonLine(result));
    }
    if (result.status === 'success') {
      console.log(`✓ ${result.url}`);
      return;
    }
    failures.push({ url: result.url, error: result.error?.message ?? 'Unknown error' });
    console.log(`✗ ${result.url} (${result.error?.code ?? 'unknown'})`);
  }

  private printSummary(summary: BatchSummary): void {
    console.log('\n' + '━'.repeat(50));
    console.log(
      `Summary: ${summary.success} success, ${summary.failed} failed, ${(summary.duration / 1000).toFixed(1)}s`
    );

    if (summary.failures.length > 0) {
      console.log('\nFailed URLs:');
      summary.failures.forEach(({ url, error }) => {
        console.log(`  - ${url}: ${error}`);
      });
    }

    if (summary.outputs.length > 0) {
      console.log('\nOutputs:');
      summary.outputs.forEach((output) => console.log(`  - ${output}`));
    }
  }
}
