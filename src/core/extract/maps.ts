// src/core/extract/maps.ts
import type {
  GoogleMapsConfig,
  MapInfo,
  OpenStreetMapConfig,
  StructuredBlock,
} from '../types/index.js';
import { stringFields } from './tree.js';
import { classifyWidget, type WidgetFields } from './widgets.js';

// Target field -> widget field. Earlier blocks win per field.
const OSM_FIELDS: ReadonlyArray<readonly [keyof OpenStreetMapConfig, string]> = [
  ['type', 'type'],
  ['centerLat', 'center_lat'],
  ['centerLon', 'center_lon'],
  ['zoom', 'zoom'],
  ['tileUrl', 'tile_url'],
  ['container', 'container'],
  ['iframeSrc', 'iframe_src'],
];

const GOOGLE_FIELDS: ReadonlyArray<readonly [keyof GoogleMapsConfig, string]> = [
  ['type', 'type'],
  ['lat', 'center_lat'],
  ['lng', 'center_lon'],
  ['zoom', 'zoom'],
  ['mapTypeId', 'map_type_id'],
  ['iframeSrc', 'iframe_src'],
];

function fold<K extends string>(
  widgets: readonly WidgetFields[],
  mapping: ReadonlyArray<readonly [K, string]>
): Partial<Record<K, string>> | undefined {
  const result: Partial<Record<K, string>> = {};
  let found = false;
  for (const widget of widgets) {
    for (const [target, source] of mapping) {
      const value = widget[source];
      if (result[target] === undefined && value) {
        result[target] = value;
        found = true;
      }
    }
  }
  return found ? result : undefined;
}

export function resolveMaps(blocks: readonly StructuredBlock[]): MapInfo {
  const osm: WidgetFields[] = [];
  const google: WidgetFields[] = [];
  const other: WidgetFields[] = [];

  for (const block of blocks) {
    if (block.kind !== 'map_widget') {
      continue;
    }
    const fields = stringFields(block.tree);
    const technology = classifyWidget(fields);
    if (technology === 'openstreetmap') {
      osm.push(fields);
    } else if (technology === 'google_maps') {
      google.push(fields);
    } else {
      other.push(fields);
    }
  }

  const info: MapInfo = {};
  const openstreetmap = fold(osm, OSM_FIELDS);
  if (openstreetmap) {
    info.openstreetmap = openstreetmap;
  }
  const googleMaps = fold(google, GOOGLE_FIELDS);
  if (googleMaps) {
    info.googleMaps = googleMaps;
  }
  if (other.length > 0) {
    const fields: Record<string, string> = {};
    for (const widget of other) {
      for (const [key, value] of Object.entries(widget)) {
        fields[key] ??= value;
      }
    }
    info.other = { fields };
  }
  return info;
}
