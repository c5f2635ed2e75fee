import * as cheerio from 'cheerio';
import type { Log } from '../../logger.js';
import type { PageDocument, StructuredBlock } from '../../types/index.js';
import { parseStructuredData } from '../structured-data.js';

export const silentLog: Log = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function parse(html: string): { $: cheerio.CheerioAPI; blocks: StructuredBlock[] } {
  const $ = cheerio.load(html);
  return { $, blocks: parseStructuredData($, silentLog) };
}

export function ldJson(value: unknown): string {
  return `<script type="application/ld+json">${JSON.stringify(value)}</script>`;
}

export function pageDocument(url: string, html: string): PageDocument {
  return {
    url,
    html,
    method: 'http',
    elapsedMs: 0,
    byteLength: Buffer.byteLength(html, 'utf8'),
  };
}
