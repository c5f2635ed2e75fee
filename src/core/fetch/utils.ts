// src/core/fetch/utils.ts
import * as path from 'path';

export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

// URL lists pasted from chat tools often carry a leading `@` or quotes.
export function cleanInputUrl(raw: string): string {
  let url = raw.trim();
  if (url.startsWith('@')) {
    url = url.slice(1);
  }
  return url.replace(/^['"]+|['"]+$/g, '').trim();
}

export function forceEnglishPath(url: string): string {
  return url.replace('/vi/', '/en/');
}

export function screenshotPathFor(url: string, dir: string): string {
  const parsed = new URL(url);
  const slug = parsed.pathname.replace(/[^A-Za-z0-9]+/g, '_').replace(/^_+|_+$/g, '') || 'index';
  return path.join(dir, `${parsed.hostname}_${slug}.png`);
}
