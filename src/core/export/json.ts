// src/core/export/json.ts
import { writeFile } from 'fs/promises';
import type { CrawlResult } from '../types/index.js';

export function formatJsonOutput(results: readonly CrawlResult[], indent: number): string {
  return JSON.stringify(results, null, indent);
}

export function formatJsonLine(result: CrawlResult): string {
  return JSON.stringify(result);
}

export async function writeJson(
  results: readonly CrawlResult[],
  filePath: string,
  indent: number,
  encoding: BufferEncoding
): Promise<void> {
  await writeFile(filePath, formatJsonOutput(results, indent), encoding);
}
