// src/core/extract/location.ts
import type * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type {
  BreadcrumbItem,
  BreadcrumbTrail,
  LocationInfo,
  StructuredBlock,
  TreeValue,
} from '../types/index.js';
import { field, fieldText, hasType, items, text, walkMappings } from './tree.js';

const LOCATION_MARKERS = new Set(['camera', 'cameras', 'webcam', 'webcams', 'countries']);

export type PlaceInfo = Omit<LocationInfo, 'coordinates'>;

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export function titleCase(slug: string): string | undefined {
  const words = decodeSegment(slug).split(/[-_\s]+/).filter(Boolean);
  if (words.length === 0) {
    return undefined;
  }
  return words.map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()).join(' ');
}

/** Place name from the first path segment after a location marker. Pure. */
export function locationFromUrl(url: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return undefined;
  }
  const segments = pathname.split('/').filter(Boolean);
  const marker = segments.findIndex((segment) => LOCATION_MARKERS.has(segment.toLowerCase()));
  const next = marker === -1 ? undefined : segments[marker + 1];
  return next ? titleCase(next) : undefined;
}

function collapse(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function isBreadcrumbContainer($: cheerio.CheerioAPI, el: Element): boolean {
  const cssClass = ($(el).attr('class') ?? '').toLowerCase();
  const label = ($(el).attr('aria-label') ?? '').trim().toLowerCase();
  return cssClass.includes('breadcrumb') || label === 'breadcrumb' || label === 'breadcrumbs';
}

export function breadcrumbsFromMarkup($: cheerio.CheerioAPI): BreadcrumbTrail[] {
  const matched = new Set<Element>();
  const trails: BreadcrumbTrail[] = [];

  $('nav, ol, ul').each((_, el) => {
    if (!isBreadcrumbContainer($, el)) {
      return;
    }
    if ($(el).parents().toArray().some((parent) => matched.has(parent))) {
      return;
    }
    matched.add(el);

    const trail: BreadcrumbTrail = [];
    $(el)
      .find('a')
      .each((__, anchor) => {
        const title = $(anchor).attr('title')?.trim();
        const label = collapse($(anchor).text()) || title;
        if (!label) {
          return;
        }
        const item: BreadcrumbItem = { label, path: $(anchor).attr('href')?.trim() ?? '' };
        if (title) {
          item.title = title;
        }
        trail.push(item);
      });

    if (trail.length > 0) {
      trails.push(trail);
    }
  });

  return trails;
}

function crumbFromListItem(entry: TreeValue): BreadcrumbItem | undefined {
  const target = field(entry, 'item');
  const label = fieldText(entry, 'name') ?? fieldText(target, 'name');
  if (!label) {
    return undefined;
  }
  const path = text(target) ?? fieldText(target, '@id') ?? fieldText(target, 'url') ?? '';
  return { label, path };
}

export function breadcrumbsFromStructuredData(blocks: readonly StructuredBlock[]): BreadcrumbTrail[] {
  const trails: BreadcrumbTrail[] = [];
  for (const block of blocks) {
    if (block.kind !== 'json_ld') {
      continue;
    }
    for (const node of walkMappings(block.tree)) {
      if (!hasType(node, 'BreadcrumbList')) {
        continue;
      }
      const trail = items(node.entries.get('itemListElement'))
        .map(crumbFromListItem)
        .filter((item): item is BreadcrumbItem => item !== undefined);
      if (trail.length > 0) {
        trails.push(trail);
      }
    }
  }
  return trails;
}

export function locationFromPage($: cheerio.CheerioAPI, trails: readonly BreadcrumbTrail[]): string | undefined {
  const heading = collapse($('h1.page-heading').first().text());
  if (heading) {
    return heading;
  }
  const h1 = collapse($('h1').first().text());
  if (h1) {
    return h1;
  }
  const description = collapse($('meta[name="description"]').attr('content') ?? '');
  if (description) {
    return description;
  }

  let longest: BreadcrumbTrail | undefined;
  for (const trail of trails) {
    if (!longest || trail.length > longest.length) {
      longest = trail;
    }
  }
  return longest?.[longest.length - 1]?.label;
}

function pathOf(href: string, base: string): string | undefined {
  try {
    return new URL(href, base).pathname;
  } catch {
    return undefined;
  }
}

const COUNTRY_PATH = /\/countries\/([^/]+)\/?$/;
const CITY_PATH = /\/countries\/[^/]+\/([^/]+)\/?$/;

export function countryAndCity(
  url: string,
  trails: readonly BreadcrumbTrail[],
  blocks: readonly StructuredBlock[]
): { country?: string; city?: string } {
  let country: string | undefined;
  let city: string | undefined;

  for (const crumb of trails.flat()) {
    const path = pathOf(crumb.path, url);
    if (!path) {
      continue;
    }
    const countrySlug = COUNTRY_PATH.exec(path)?.[1];
    if (!country && countrySlug) {
      country = crumb.title ?? titleCase(countrySlug);
    }
    const citySlug = CITY_PATH.exec(path)?.[1];
    if (!city && citySlug) {
      city = crumb.title ?? titleCase(citySlug);
    }
  }

  const fromUrl = /\/countries\/([^/]+)(?:\/([^/]+))?/.exec(pathOf(url, url) ?? '');
  if (!country && fromUrl?.[1]) {
    country = titleCase(fromUrl[1]);
  }
  if (!city && fromUrl?.[2]) {
    city = titleCase(fromUrl[2]);
  }

  const address = postalAddress(blocks);
  country = address.country ?? country;
  city = address.city ?? city ?? country;

  return { country, city };
}

function postalAddress(blocks: readonly StructuredBlock[]): { country?: string; city?: string } {
  for (const block of blocks) {
    if (block.kind !== 'json_ld') {
      continue;
    }
    for (const node of walkMappings(block.tree)) {
      const countryField = node.entries.get('addressCountry');
      const country = text(countryField) ?? fieldText(countryField, 'name');
      const city = fieldText(node, 'addressLocality');
      if (country || city) {
        return { country, city };
      }
    }
  }
  return {};
}

export function resolveLocation(
  url: string,
  $: cheerio.CheerioAPI,
  blocks: readonly StructuredBlock[]
): PlaceInfo {
  const markup = breadcrumbsFromMarkup($);
  const breadcrumbs = markup.length > 0 ? markup : breadcrumbsFromStructuredData(blocks);
  const { country, city } = countryAndCity(url, breadcrumbs, blocks);

  return {
    breadcrumbs,
    locationFromUrl: locationFromUrl(url),
    locationFromPage: locationFromPage($, breadcrumbs),
    country,
    city,
  };
}
