// src/core/export/minimal.ts
import { readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import { describeError } from '../errors.js';
import type { Log } from '../logger.js';
import type { CrawlResult } from '../types/index.js';
import { countryFileName } from './path.js';
import type { MinimalRecord } from './types.js';

const YOUTUBE = /youtube(?:-nocookie)?\.com|youtu\.be/i;

type Entry = Record<string, unknown>;

export function toMinimalRecord(result: CrawlResult): MinimalRecord | undefined {
  const primary = result.streams?.primary;
  if (result.status !== 'success' || !primary) {
    return undefined;
  }
  const embedUrl = primary.embedUrl ?? '';
  const contentUrl = primary.contentUrl ?? '';
  if (!YOUTUBE.test(contentUrl) && !YOUTUBE.test(embedUrl)) {
    return undefined;
  }

  const country = result.location.country ?? '';
  return {
    url: result.url,
    embedUrl,
    contentUrl,
    thumbnailUrl: primary.thumbnailUrl ?? result.streams?.thumbnails[0]?.url ?? '',
    country,
    city: result.location.city ?? country,
    title: result.pageInfo?.h1 || result.pageInfo?.title || '',
    coordinates: result.location.coordinates,
  };
}

function isEntry(value: unknown): value is Entry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasStream(entry: Entry): boolean {
  return Boolean(entry.embedUrl) || Boolean(entry.contentUrl);
}

function entryKey(entry: Entry): string {
  return `${String(entry.embedUrl ?? '')}\u0000${String(entry.title ?? '')}`;
}

/**
 * Merges new records into an existing per-country file body. Entries without
 * any stream URL are dropped; records are keyed by embedUrl + title.
 */
export function mergeMinimal(existing: unknown, incoming: readonly MinimalRecord[]): Entry[] {
  const previous = Array.isArray(existing) ? existing : existing === undefined ? [] : [existing];
  const merged: Entry[] = previous.filter(isEntry).filter(hasStream);
  const keys = new Set(merged.map(entryKey));

  for (const record of incoming) {
    const entry: Entry = { ...record };
    const key = entryKey(entry);
    if (hasStream(entry) && !keys.has(key)) {
      keys.add(key);
      merged.push(entry);
    }
  }
  return merged;
}

async function readExisting(filePath: string, log: Log): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    log.warn(`Replacing unreadable ${filePath}: ${describeError(error)}`);
    return undefined;
  }
}

export async function writeMinimal(
  results: readonly CrawlResult[],
  outputDir: string,
  indent: number,
  log: Log
): Promise<string[]> {
  const byFile = new Map<string, MinimalRecord[]>();
  for (const result of results) {
    const record = toMinimalRecord(result);
    if (!record) {
      continue;
    }
    const file = path.join(outputDir, countryFileName(record.country));
    byFile.set(file, [...(byFile.get(file) ?? []), record]);
  }

  const written: string[] = [];
  for (const [file, records] of byFile) {
    const merged = mergeMinimal(await readExisting(file, log), records);
    await writeFile(file, JSON.stringify(merged, null, indent), 'utf-8');
    log.info(`Saved ${records.length} record(s) to ${file}`);
    written.push(file);
  }
  return written;
}
