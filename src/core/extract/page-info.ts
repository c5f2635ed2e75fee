// src/core/extract/page-info.ts
import type * as cheerio from 'cheerio';
import type { PageDocument, PageInfo, StructuredBlock } from '../types/index.js';
import { fieldText, items } from './tree.js';

const TITLE_SELECTORS = [
  '.page-title',
  '.main-title',
  '.title',
  '[class*="title"]',
  '.heading',
  '.header-title',
  '.page-heading',
];

const DESCRIPTION_SELECTORS = ['.description', '.desc', '.summary', '.intro', '.content-summary'];

function collapse(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function pickText(candidates: readonly (string | undefined)[]): string {
  return candidates.find((candidate): candidate is string => Boolean(candidate)) ?? '';
}

function longer(value: string | undefined, min: number): string | undefined {
  const collapsed = collapse(value ?? '');
  return collapsed.length > min ? collapsed : undefined;
}

function firstSelected($: cheerio.CheerioAPI, selectors: readonly string[], min: number): string | undefined {
  for (const selector of selectors) {
    for (const el of $(selector).toArray()) {
      const value = longer($(el).text(), min);
      if (value) {
        return value;
      }
    }
  }
  return undefined;
}

/** Top-level JSON-LD field, looking into the items of a block that is an array. */
function structuredField(blocks: readonly StructuredBlock[], key: string): string | undefined {
  for (const block of blocks) {
    if (block.kind !== 'json_ld') {
      continue;
    }
    for (const root of items(block.tree)) {
      const value = fieldText(root, key)?.trim();
      if (value) {
        return value;
      }
    }
  }
  return undefined;
}

export function extractPageInfo(
  $: cheerio.CheerioAPI,
  document: PageDocument,
  blocks: readonly StructuredBlock[]
): PageInfo {
  const h1 = collapse($('h1').first().text());
  const title = pickText([
    collapse($('title').first().text()),
    longer(h1, 5),
    firstSelected($, TITLE_SELECTORS, 5),
    structuredField(blocks, 'name'),
  ]);

  const description = pickText([
    longer($('meta[name="description"]').attr('content'), 10),
    longer($('meta[property="og:description"]').attr('content'), 10),
    structuredField(blocks, 'description'),
    $('p')
      .slice(0, 3)
      .toArray()
      .map((el) => longer($(el).text(), 20))
      .find(Boolean),
    firstSelected($, DESCRIPTION_SELECTORS, 20),
  ]);

  return { title, h1, description, contentLength: document.byteLength };
}
