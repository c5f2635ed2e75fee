// src/core/extract/streams.ts
import type * as cheerio from 'cheerio';
import type {
  EmbedCode,
  OtherStream,
  PrimaryStream,
  StreamInfo,
  StreamKind,
  StructuredBlock,
  Thumbnail,
  TreeMapping,
} from '../types/index.js';
import { firstMatch, type PrecedenceRule } from './precedence.js';
import { inlineScripts } from './structured-data.js';
import { fieldText, firstText, hasType, items, text, walkMappings } from './tree.js';

interface StreamProvider {
  name: string;
  pattern: RegExp;
}

export const STREAM_PROVIDERS: readonly StreamProvider[] = [
  { name: 'youtube', pattern: /youtube(?:-nocookie)?\.com|youtu\.be/i },
  { name: 'vimeo', pattern: /vimeo\.com/i },
  { name: 'twitch', pattern: /twitch\.tv/i },
  { name: 'dailymotion', pattern: /dailymotion\.com|dai\.ly/i },
  { name: 'ipcamlive', pattern: /ipcamlive\.com/i },
  { name: 'rtsp.me', pattern: /rtsp\.me/i },
  { name: 'angelcam', pattern: /angelcam\.com/i },
  { name: 'livestream', pattern: /livestream\.com/i },
  { name: 'ustream', pattern: /ustream\.tv/i },
];

const STREAM_PATTERNS: ReadonlyArray<readonly [StreamKind, RegExp]> = [
  ['realtime', /^(?:rtmps?|rtsp|srt):\/\//i],
  ['hls', /\.m3u8(?![a-z0-9])/i],
  ['dash', /\.mpd(?![a-z0-9])/i],
  ['progressive', /\.(?:mp4|webm|flv|mov|avi|m4v)(?![a-z0-9])/i],
];

const THUMBNAIL_META = new Set([
  'og:image',
  'og:image:url',
  'og:image:secure_url',
  'twitter:image',
  'thumbnail',
  'image',
]);

export function classifyStream(url: string): StreamKind | undefined {
  const rest = url.replace(/^[a-z][a-z0-9+.-]*:\/\/[^/?#]*/i, '');
  for (const [kind, pattern] of STREAM_PATTERNS) {
    if (pattern.test(kind === 'realtime' ? url : rest)) {
      return kind;
    }
  }
  return undefined;
}

function isVideoDescriptor(node: TreeMapping): boolean {
  return hasType(node, 'VideoObject') || node.entries.has('embedUrl') || node.entries.has('contentUrl');
}

function primaryFromStructuredData(blocks: readonly StructuredBlock[]): PrimaryStream | undefined {
  for (const block of blocks) {
    if (block.kind !== 'json_ld') {
      continue;
    }
    for (const node of walkMappings(block.tree)) {
      if (!isVideoDescriptor(node)) {
        continue;
      }
      const embedUrl = fieldText(node, 'embedUrl');
      const contentUrl = fieldText(node, 'contentUrl');
      const thumbnailUrl = firstText(node.entries.get('thumbnailUrl'));
      if (embedUrl || contentUrl || thumbnailUrl) {
        return { embedUrl, contentUrl, thumbnailUrl, source: 'json_ld' };
      }
    }
  }
  return undefined;
}

export function youtubeWatchUrl(src: string): string | undefined {
  const id = /(?:\/embed\/|youtu\.be\/)([A-Za-z0-9_-]+)/.exec(src)?.[1];
  return id ? `https://www.youtube.com/watch?v=${id}` : undefined;
}

function primaryFromIframe($: cheerio.CheerioAPI): PrimaryStream | undefined {
  const src = $('iframe')
    .toArray()
    .map((el) => $(el).attr('src')?.trim() ?? '')
    .find((value) => /youtube(?:-nocookie)?\.com\/embed\/|youtu\.be\//i.test(value));
  if (!src) {
    return undefined;
  }
  return { embedUrl: src, contentUrl: youtubeWatchUrl(src), source: 'iframe' };
}

const YOUTUBE_ID = /youtube\.com\/watch\?v=([\w-]+)|youtu\.be\/([\w-]+)|youtube\.com\/embed\/([\w-]+)/;

function scriptField(script: string, key: string): string | undefined {
  return new RegExp(String.raw`${key}["']?\s*:\s*["']([^"']+)["']`).exec(script)?.[1];
}

function primaryFromScripts($: cheerio.CheerioAPI): PrimaryStream | undefined {
  for (const script of inlineScripts($)) {
    let embedUrl = scriptField(script, 'embedUrl');
    let contentUrl = scriptField(script, 'contentUrl');
    const thumbnailUrl = scriptField(script, 'thumbnailUrl');

    const id = YOUTUBE_ID.exec(script)?.slice(1).find(Boolean);
    if (id) {
      embedUrl ??= `https://www.youtube.com/embed/${id}`;
      contentUrl ??= `https://www.youtube.com/watch?v=${id}`;
    }
    if (embedUrl || contentUrl) {
      return {
        embedUrl,
        contentUrl,
        ...(thumbnailUrl ? { thumbnailUrl } : {}),
        source: 'script',
      };
    }
  }
  return undefined;
}

const VIDEO_META = [
  'meta[property="og:video"]',
  'meta[property="og:video:url"]',
  'meta[property="og:video:secure_url"]',
  'meta[name="twitter:player"]',
  'meta[name="twitter:player:stream"]',
];

function primaryFromMetaTags($: cheerio.CheerioAPI): PrimaryStream | undefined {
  let embedUrl: string | undefined;
  let contentUrl: string | undefined;
  for (const selector of VIDEO_META) {
    const content = ($(selector).first().attr('content') ?? '').trim();
    if (!/youtube\.com|youtu\.be/i.test(content)) {
      continue;
    }
    if (content.includes('/embed/')) {
      embedUrl ??= content;
    } else {
      contentUrl ??= content;
    }
  }
  if (!embedUrl && !contentUrl) {
    return undefined;
  }
  return { embedUrl, contentUrl: contentUrl ?? (embedUrl ? youtubeWatchUrl(embedUrl) : undefined), source: 'meta_tag' };
}

interface StreamInput {
  blocks: readonly StructuredBlock[];
  $: cheerio.CheerioAPI;
}

const primaryRule = (
  source: PrimaryStream['source'],
  find: (input: StreamInput) => PrimaryStream | undefined
): PrecedenceRule<StreamInput, PrimaryStream | undefined> => ({
  source,
  applies: (input) => find(input) !== undefined,
  extract: find,
});

export const PRIMARY_STREAM_RULES: readonly PrecedenceRule<StreamInput, PrimaryStream | undefined>[] = [
  primaryRule('json_ld', ({ blocks }) => primaryFromStructuredData(blocks)),
  primaryRule('iframe', ({ $ }) => primaryFromIframe($)),
  primaryRule('script', ({ $ }) => primaryFromScripts($)),
  primaryRule('meta_tag', ({ $ }) => primaryFromMetaTags($)),
];

function structuredThumbnails(blocks: readonly StructuredBlock[]): Thumbnail[] {
  const thumbnails: Thumbnail[] = [];
  const add = (url: string | undefined, source: string) => {
    if (url) {
      thumbnails.push({ type: 'json_ld', url, source });
    }
  };

  for (const block of blocks) {
    if (block.kind !== 'json_ld') {
      continue;
    }
    for (const node of walkMappings(block.tree)) {
      for (const item of items(node.entries.get('thumbnailUrl'))) {
        add(text(item), 'thumbnailUrl');
      }

      const image = node.entries.get('image');
      if (image?.kind === 'sequence') {
        for (const item of image.items) {
          add(text(item), 'image[]');
          add(fieldText(item, 'url'), 'image[].url');
        }
      } else {
        add(text(image), 'image');
        add(fieldText(image, 'url'), 'image.url');
      }
    }
  }
  return thumbnails;
}

function metaThumbnails($: cheerio.CheerioAPI): Thumbnail[] {
  const thumbnails: Thumbnail[] = [];
  $('meta').each((_, el) => {
    const key = ($(el).attr('property') ?? $(el).attr('name') ?? '').trim();
    const content = ($(el).attr('content') ?? '').trim();
    if (THUMBNAIL_META.has(key.toLowerCase()) && /^https?:\/\//i.test(content)) {
      thumbnails.push({ type: 'meta_tag', url: content, source: key });
    }
  });
  return thumbnails;
}

function imageThumbnails($: cheerio.CheerioAPI): Thumbnail[] {
  const thumbnails: Thumbnail[] = [];
  $('img').each((_, el) => {
    const src = $(el).attr('src')?.trim();
    const dataSrc = $(el).attr('data-src')?.trim();
    const url = src || dataSrc;
    const source = src ? 'src' : 'data-src';
    if (!url || url.startsWith('data:')) {
      return;
    }
    const hint = `${$(el).attr('class') ?? ''} ${$(el).attr('alt') ?? ''}`;
    if (/thumb|preview/i.test(hint) || /\/thumbnail/i.test(url)) {
      thumbnails.push({ type: 'img_tag', url, source });
    }
  });
  return thumbnails;
}

const SCRIPT_THUMBNAIL = /(?<![\w$])["']?(thumbnailUrl|thumbnail|image|preview)["']?\s*:\s*["'](https?:[^"']+)["']/g;

function scriptThumbnails($: cheerio.CheerioAPI): Thumbnail[] {
  const thumbnails: Thumbnail[] = [];
  const seen = new Set<string>();
  for (const script of inlineScripts($)) {
    for (const [, key, url] of script.matchAll(SCRIPT_THUMBNAIL)) {
      if (key && url && !seen.has(url)) {
        seen.add(url);
        thumbnails.push({ type: 'script', url, source: key });
      }
    }
  }
  return thumbnails;
}

const CAMERA_TEXT_SELECTORS = [
  '.camera-info',
  '.stream-info',
  '[class*="camera"]',
  '[class*="stream"]',
  '.webcam-info',
  '.live-info',
  '.status-info',
];

export function findCameraText($: cheerio.CheerioAPI): string[] {
  const texts: string[] = [];
  for (const selector of CAMERA_TEXT_SELECTORS) {
    $(selector).each((_, el) => {
      const value = $(el).text().replace(/\s+/g, ' ').trim();
      if (value.length > 5 && !texts.includes(value)) {
        texts.push(value);
      }
    });
  }
  return texts;
}

export function findOtherStreams(html: string, exclude: ReadonlySet<string>): OtherStream[] {
  const document = html.replace(/&amp;/g, '&').replace(/\\\//g, '/');
  const seen = new Set<string>();
  const streams: OtherStream[] = [];

  for (const match of document.matchAll(/\b(?:https?|rtmps?|rtsp|srt):\/\/[^\s"'<>()\\`]+/gi)) {
    const url = match[0].replace(/[.,;]+$/, '');
    if (seen.has(url) || exclude.has(url)) {
      continue;
    }
    const kind = classifyStream(url);
    if (kind) {
      seen.add(url);
      streams.push({ url, kind });
    }
  }
  return streams;
}

function absoluteUrl(value: string, baseUrl: string): string | undefined {
  try {
    return new URL(value, baseUrl).toString();
  } catch {
    return undefined;
  }
}

/**
 * Relative media references in player and link attributes, resolved against the page.
 * Absolute ones are left to the text scan.
 */
export function findLinkedStreams($: cheerio.CheerioAPI, baseUrl: string): OtherStream[] {
  const streams: OtherStream[] = [];
  const seen = new Set<string>();
  $('video[src], source[src], embed[src], a[href]').each((_, el) => {
    const value = ($(el).attr('src') ?? $(el).attr('href') ?? '').trim();
    const url = value && !/^[a-z][a-z0-9+.-]*:/i.test(value) ? absoluteUrl(value, baseUrl) : undefined;
    const kind = url ? classifyStream(url) : undefined;
    if (url && kind && !seen.has(url)) {
      seen.add(url);
      streams.push({ url, kind });
    }
  });
  return streams;
}

function attributeValue(tag: string, name: string): string | undefined {
  const match = new RegExp(String.raw`\s${name}\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))`, 'i').exec(tag);
  return match ? match[1] ?? match[2] ?? match[3] : undefined;
}

function embedTag(code: string): EmbedCode['tag'] {
  const lower = code.toLowerCase();
  return lower.startsWith('<iframe') ? 'iframe' : lower.startsWith('<object') ? 'object' : 'embed';
}

/** Player markup copied verbatim from the raw HTML. */
export function findEmbedCodes(html: string): EmbedCode[] {
  const codes: EmbedCode[] = [];
  const markup = /<iframe\b[^>]*>[\s\S]*?<\/iframe\s*>|<object\b[^>]*>[\s\S]*?<\/object\s*>|<embed\b[^>]*>/gi;
  for (const match of html.matchAll(markup)) {
    const code = match[0];
    const tag = embedTag(code);
    const src = attributeValue(code.slice(0, code.indexOf('>') + 1), tag === 'object' ? 'data' : 'src');
    if (!src) {
      continue;
    }
    const provider = STREAM_PROVIDERS.find((candidate) => candidate.pattern.test(src))?.name ?? classifyStream(src);
    if (provider) {
      codes.push({ tag, provider, src, code });
    }
  }
  return codes;
}

export function resolveStreams(
  blocks: readonly StructuredBlock[],
  $: cheerio.CheerioAPI,
  html: string,
  baseUrl: string
): StreamInfo {
  const primary = firstMatch(PRIMARY_STREAM_RULES, { blocks, $ });
  const exclude = new Set([primary?.embedUrl, primary?.contentUrl].filter((url): url is string => Boolean(url)));

  const otherStreams = findOtherStreams(html, exclude);
  const known = new Set(otherStreams.map((stream) => stream.url));
  for (const stream of findLinkedStreams($, baseUrl)) {
    if (!known.has(stream.url) && !exclude.has(stream.url)) {
      known.add(stream.url);
      otherStreams.push(stream);
    }
  }

  return {
    ...(primary ? { primary } : {}),
    thumbnails: [
      ...structuredThumbnails(blocks),
      ...metaThumbnails($),
      ...imageThumbnails($),
      ...scriptThumbnails($),
    ],
    otherStreams,
    embedCodes: findEmbedCodes(html),
    cameraText: findCameraText($),
  };
}
