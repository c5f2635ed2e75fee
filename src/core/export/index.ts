// src/core/export/index.ts
import { mkdir } from 'fs/promises';
import { CrawlError, ErrorCode, describeError } from '../errors.js';
import type { Log } from '../logger.js';
import type { CrawlResult, OutputFormat } from '../types/index.js';
import { writeJson } from './json.js';
import { writeMinimal } from './minimal.js';
import { resultsPath } from './path.js';
import { writeTable } from './tabular.js';
import type { OutputOptions } from './types.js';

export * from './json.js';
export * from './minimal.js';
export * from './path.js';
export * from './tabular.js';
export type * from './types.js';

async function writeFormat(
  results: readonly CrawlResult[],
  format: OutputFormat,
  options: OutputOptions
): Promise<string> {
  const filePath = resultsPath(options.outputDir, format, options.date);
  if (format === 'json') {
    await writeJson(results, filePath, options.indent, options.encoding);
  } else {
    await writeTable(results, filePath, format, options.encoding);
  }
  return filePath;
}

/**
 * Writes the batch in every requested format, then the per-country minimal
 * files when enabled. Returns the paths written.
 */
export async function writeOutputs(
  results: readonly CrawlResult[],
  options: OutputOptions,
  log: Log
): Promise<string[]> {
  try {
    await mkdir(options.outputDir, { recursive: true });

    const written: string[] = [];
    for (const format of new Set(options.formats)) {
      const filePath = await writeFormat(results, format, options);
      log.info(`Saved ${results.length} result(s) to ${filePath}`);
      written.push(filePath);
    }

    if (options.minimal) {
      written.push(...(await writeMinimal(results, options.outputDir, options.indent, log)));
    }
    return written;
  } catch (error) {
    throw new CrawlError(
      ErrorCode.EXPORT_FAILED,
      `Failed to write results: ${describeError(error)}`,
      false,
      'Check that the output directory is writable'
    );
  }
}
