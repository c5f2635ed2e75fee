// src/core/extract/coordinates.ts
import type * as cheerio from 'cheerio';
import type { CoordinateInfo, StructuredBlock, TreeMapping } from '../types/index.js';
import { firstMatch, type PrecedenceRule } from './precedence.js';
import { fieldText, stringFields, walkMappings } from './tree.js';
import { classifyWidget } from './widgets.js';

export interface CoordinateInput {
  blocks: readonly StructuredBlock[];
  /** Lower-cased meta `name`/`property` to content, first occurrence kept. */
  metaTags: ReadonlyMap<string, string>;
}

const NUMBER = /^-?\d+(?:\.\d+)?$/;

function geoMapping(input: CoordinateInput): TreeMapping | undefined {
  for (const block of input.blocks) {
    if (block.kind !== 'json_ld') {
      continue;
    }
    for (const node of walkMappings(block.tree)) {
      if (fieldText(node, 'latitude') && fieldText(node, 'longitude')) {
        return node;
      }
    }
  }
  return undefined;
}

function widgetCenter(input: CoordinateInput): Record<string, string> | undefined {
  for (const block of input.blocks) {
    if (block.kind !== 'map_widget') {
      continue;
    }
    const fields = stringFields(block.tree);
    if (fields.center_lat && fields.center_lon) {
      return fields;
    }
  }
  return undefined;
}

function metaPair(input: CoordinateInput): [string, string] | undefined {
  const split = (value: string | undefined, separator: string): [string, string] | undefined => {
    const parts = value?.split(separator).map((part) => part.trim());
    const [lat, lon] = parts ?? [];
    return parts?.length === 2 && lat && lon && NUMBER.test(lat) && NUMBER.test(lon) ? [lat, lon] : undefined;
  };

  const placeLat = input.metaTags.get('place:location:latitude')?.trim();
  const placeLon = input.metaTags.get('place:location:longitude')?.trim();
  const place: [string, string] | undefined =
    placeLat && placeLon && NUMBER.test(placeLat) && NUMBER.test(placeLon) ? [placeLat, placeLon] : undefined;

  return split(input.metaTags.get('geo.position'), ';') ?? split(input.metaTags.get('icbm'), ',') ?? place;
}

export const COORDINATE_RULES: readonly PrecedenceRule<CoordinateInput, CoordinateInfo>[] = [
  {
    source: 'json_ld',
    applies: (input) => geoMapping(input) !== undefined,
    extract: (input) => {
      const geo = geoMapping(input);
      return {
        latitude: fieldText(geo, 'latitude'),
        longitude: fieldText(geo, 'longitude'),
        source: 'json_ld',
      };
    },
  },
  {
    source: 'map_widget',
    applies: (input) => widgetCenter(input) !== undefined,
    extract: (input) => {
      const fields = widgetCenter(input) ?? {};
      const info: CoordinateInfo = {
        latitude: fields.center_lat,
        longitude: fields.center_lon,
        source: classifyWidget(fields) === 'openstreetmap' ? 'openstreetmap_center' : 'map_widget_init',
      };
      if (fields.zoom) {
        info.zoom = fields.zoom;
      }
      return info;
    },
  },
  {
    source: 'meta_tags',
    applies: (input) => metaPair(input) !== undefined,
    extract: (input) => {
      const [latitude, longitude] = metaPair(input) ?? [];
      return { latitude, longitude, source: 'meta_tags' };
    },
  },
];

export function collectMetaTags($: cheerio.CheerioAPI): Map<string, string> {
  const tags = new Map<string, string>();
  $('meta').each((_, el) => {
    const key = ($(el).attr('name') ?? $(el).attr('property') ?? '').trim().toLowerCase();
    const content = $(el).attr('content');
    if (key && content !== undefined && !tags.has(key)) {
      tags.set(key, content);
    }
  });
  return tags;
}

export function resolveCoordinates(
  blocks: readonly StructuredBlock[],
  $: cheerio.CheerioAPI
): CoordinateInfo {
  const input: CoordinateInput = { blocks, metaTags: collectMetaTags($) };
  return firstMatch(COORDINATE_RULES, input) ?? { source: 'none' };
}
