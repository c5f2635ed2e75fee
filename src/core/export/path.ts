// src/core/export/path.ts
import * as path from 'path';
import type { OutputFormat } from '../types/index.js';

const EXTENSIONS: Record<OutputFormat, string> = {
  json: 'json',
  csv: 'csv',
  excel: 'xlsx',
};

/** Local time as YYYYMMDD_HHMMSS. */
export function timestampLabel(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function resultsPath(outputDir: string, format: OutputFormat, date: Date): string {
  return path.join(outputDir, `crawl_results_${timestampLabel(date)}.${EXTENSIONS[format]}`);
}

export function countryFileName(country: string | undefined): string {
  const safe = (country ?? '')
    .trim()
    .replace(/[\\/:*?"<>|]+/g, '')
    .replace(/\s+/g, '_');
  return `${safe || 'Unknown'}.json`;
}
