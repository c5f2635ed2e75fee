// src/core/extract/structured-data.ts
import type * as cheerio from 'cheerio';
import { isText, type Element } from 'domhandler';
import { parse } from 'lossless-json';
import { ParseSoftError, describeError } from '../errors.js';
import type { Log } from '../logger.js';
import type { StructuredBlock, TreeValue } from '../types/index.js';
import { fromParsed, stringMapping } from './tree.js';
import {
  detectIframeWidget,
  detectMarkupWidget,
  detectScriptWidgets,
  type WidgetFields,
} from './widgets.js';

const LD_JSON = 'application/ld+json';

/**
 * Collects JSON-LD islands and map-widget initializers in document order.
 * A malformed block is reported through `warnings` and skipped.
 */
export function parseStructuredData(
  $: cheerio.CheerioAPI,
  log: Log,
  warnings: string[] = []
): StructuredBlock[] {
  const blocks: StructuredBlock[] = [];
  let ldIndex = 0;

  const pushWidget = (fields: WidgetFields) => {
    blocks.push({ kind: 'map_widget', index: blocks.length, tree: stringMapping(fields) });
  };

  $('script, iframe, [data-lat], [data-latitude]').each((_, el) => {
    if (el.tagName === 'script') {
      const type = ($(el).attr('type') ?? '').trim().toLowerCase();
      if (type === LD_JSON) {
        const body = stripWrappers(scriptBody(el));
        const position = ldIndex++;
        if (!body) {
          return;
        }
        try {
          blocks.push({ kind: 'json_ld', index: blocks.length, tree: parseJsonLd(body, log) });
        } catch (error) {
          const soft = new ParseSoftError(
            `Skipping malformed JSON-LD block #${position}: ${describeError(error)}`,
            position
          );
          log.warn(soft.message);
          warnings.push(soft.message);
        }
        return;
      }
      if (!$(el).attr('src')) {
        detectScriptWidgets(scriptBody(el)).forEach(pushWidget);
      }
      return;
    }

    if (el.tagName === 'iframe') {
      const widget = detectIframeWidget($(el).attr('src') ?? '');
      if (widget) {
        pushWidget(widget);
      }
      return;
    }

    const widget = detectMarkupWidget(el.attribs);
    if (widget) {
      pushWidget(widget);
    }
  });

  log.debug(`Structured data: ${blocks.length} block(s)`);
  return blocks;
}

/**
 * Numbers keep their source text. lossless-json rejects repeated keys with
 * different values, which JSON.parse accepts (last one wins); such blocks are
 * read with JSON.parse and lose only numeric precision.
 */
export function parseJsonLd(body: string, log: Log): TreeValue {
  try {
    return fromParsed(parse(body));
  } catch (error) {
    const tree = fromParsed(JSON.parse(body));
    log.debug(`Read JSON-LD block without exact numbers: ${describeError(error)}`);
    return tree;
  }
}

/** Bodies of inline scripts other than JSON-LD, with `\/` unescaped. */
export function inlineScripts($: cheerio.CheerioAPI): string[] {
  return $('script')
    .toArray()
    .filter((el) => !$(el).attr('src') && ($(el).attr('type') ?? '').trim().toLowerCase() !== LD_JSON)
    .map((el) => scriptBody(el).replace(/\\\//g, '/'));
}

function scriptBody(el: Element): string {
  return el.children.map((child) => (isText(child) ? child.data : '')).join('');
}

export function stripWrappers(raw: string): string {
  return raw
    .trim()
    .replace(/^(?:\/\/\s*)?<!\[CDATA\[/, '')
    .replace(/(?:\/\/\s*)?\]\]>$/, '')
    .trim()
    .replace(/^<!--/, '')
    .replace(/(?:\/\/\s*)?-->$/, '')
    .trim();
}
