// src/core/extract/widgets.ts
/**
 * Map-widget detection. Every detector returns flat string records with
 * normalized field names so resolvers never see library-specific syntax.
 */
export type WidgetFields = Record<string, string>;

export type MapTechnology = 'openstreetmap' | 'google_maps' | 'other';

const NUM = String.raw`-?\d+(?:\.\d+)?`;

const GOOGLE_HINT = /google|gmap/i;
const OSM_HINT = /openstreetmap|osm\.org|\bosm\b|leaflet/i;
const OTHER_HINT = /mapbox|carto|bing|here\.com/i;

export function classifyWidget(fields: Readonly<WidgetFields>): MapTechnology {
  const hints = [fields.widget, fields.type, fields.tile_url, fields.iframe_src, fields.css_class]
    .filter((hint): hint is string => Boolean(hint))
    .join(' ');

  if (GOOGLE_HINT.test(hints)) {
    return 'google_maps';
  }
  if (OSM_HINT.test(hints)) {
    return 'openstreetmap';
  }
  if (OTHER_HINT.test(hints)) {
    return 'other';
  }
  // Bare center_lat/center_lon configs and map containers are OSM-centred.
  if ((fields.widget === 'map_config' || fields.widget === 'map_markup') && !fields.type) {
    return 'openstreetmap';
  }
  return 'other';
}

interface Located {
  at: number;
  fields: WidgetFields;
}

export function unescapeScript(source: string): string {
  return source.replace(/\\"/g, '"').replace(/\\\//g, '/');
}

/** Initializer calls and config objects found in one inline script, in source order. */
export function detectScriptWidgets(source: string): WidgetFields[] {
  const script = unescapeScript(source);
  const found: Located[] = [
    ...leafletMaps(script),
    ...setViewCalls(script),
    ...googleMaps(script),
    ...centerConfigs(script),
    ...coordinatePairs(script),
  ];

  const tileUrl = /L\.tileLayer\(\s*['"]([^'"]+)['"]/.exec(script)?.[1];
  if (tileUrl) {
    for (const item of found) {
      if (item.fields.widget === 'leaflet' && !item.fields.tile_url) {
        item.fields.tile_url = tileUrl;
      }
    }
  }

  return found.sort((a, b) => a.at - b.at).map((item) => item.fields);
}

function leafletMaps(script: string): Located[] {
  const results: Located[] = [];
  const pattern = /L\.map\(\s*['"]([^'"]+)['"]\s*,\s*\{([^}]*)\}/g;
  for (const match of script.matchAll(pattern)) {
    const options = match[2] ?? '';
    const center = new RegExp(String.raw`center\s*:\s*\[\s*(${NUM})\s*,\s*(${NUM})\s*\]`).exec(options);
    if (!center?.[1] || !center[2]) {
      continue;
    }
    const fields: WidgetFields = {
      widget: 'leaflet',
      type: 'leaflet',
      container: match[1] ?? '',
      center_lat: center[1],
      center_lon: center[2],
    };
    const zoom = zoomIn(options);
    if (zoom) {
      fields.zoom = zoom;
    }
    results.push({ at: match.index ?? 0, fields });
  }
  return results;
}

function setViewCalls(script: string): Located[] {
  const results: Located[] = [];
  const pattern = new RegExp(
    String.raw`(?:L\.map\(\s*['"]([^'"]+)['"]\s*\)\s*)?\.setView\(\s*\[\s*(${NUM})\s*,\s*(${NUM})\s*\]\s*(?:,\s*(\d+(?:\.\d+)?))?`,
    'g'
  );
  for (const match of script.matchAll(pattern)) {
    if (!match[2] || !match[3]) {
      continue;
    }
    const fields: WidgetFields = {
      widget: 'leaflet',
      type: 'leaflet',
      center_lat: match[2],
      center_lon: match[3],
    };
    if (match[1]) {
      fields.container = match[1];
    }
    if (match[4]) {
      fields.zoom = match[4];
    }
    results.push({ at: match.index ?? 0, fields });
  }
  return results;
}

function googleMaps(script: string): Located[] {
  const results: Located[] = [];
  const pattern = /new\s+google\.maps\.Map\(\s*([^,]+),\s*\{([\s\S]*?)\}\s*\)/g;
  const literalCenter = new RegExp(String.raw`center\s*:\s*\{\s*lat\s*:\s*(${NUM})\s*,\s*lng\s*:\s*(${NUM})\s*\}`);
  const latLngCenter = new RegExp(
    String.raw`center\s*:\s*new\s+google\.maps\.LatLng\(\s*(${NUM})\s*,\s*(${NUM})\s*\)`
  );

  for (const match of script.matchAll(pattern)) {
    const options = match[2] ?? '';
    const center = literalCenter.exec(options) ?? latLngCenter.exec(options);
    if (!center?.[1] || !center[2]) {
      continue;
    }
    const fields: WidgetFields = {
      widget: 'google_maps',
      type: 'google_maps',
      center_lat: center[1],
      center_lon: center[2],
    };
    const zoom = zoomIn(options);
    if (zoom) {
      fields.zoom = zoom;
    }
    const mapType = /mapTypeId\s*:\s*(?:['"]([^'"]+)['"]|google\.maps\.MapTypeId\.(\w+))/.exec(options);
    const mapTypeId = mapType?.[1] ?? mapType?.[2]?.toLowerCase();
    if (mapTypeId) {
      fields.map_type_id = mapTypeId;
    }
    const container = /getElementById\(\s*['"]([^'"]+)['"]\s*\)/.exec(match[1] ?? '')?.[1];
    if (container) {
      fields.container = container;
    }
    results.push({ at: match.index ?? 0, fields });
  }
  return results;
}

function centerConfigs(script: string): Located[] {
  const results: Located[] = [];
  const latPattern = new RegExp(String.raw`["']?center_lat["']?\s*[:=]\s*["']?(${NUM})`, 'g');
  const lonPattern = new RegExp(String.raw`["']?center_lon["']?\s*[:=]\s*["']?(${NUM})`);

  for (const match of script.matchAll(latPattern)) {
    const at = match.index ?? 0;
    const body = enclosingObject(script, at);
    const lon = lonPattern.exec(body)?.[1];
    if (!match[1] || !lon) {
      continue;
    }
    const fields: WidgetFields = { widget: 'map_config', center_lat: match[1], center_lon: lon };
    const zoom = zoomIn(body);
    if (zoom) {
      fields.zoom = zoom;
    }
    const type = /["']?type["']?\s*:\s*["']([^"']+)["']/.exec(body)?.[1];
    if (type) {
      fields.type = type;
    }
    const tileUrl = /["']?(?:tile_url|tileUrl|tileLayer)["']?\s*:\s*["']([^"']+)["']/.exec(body)?.[1];
    if (tileUrl) {
      fields.tile_url = tileUrl;
    }
    results.push({ at, fields });
  }
  return results;
}

function coordinatePairs(script: string): Located[] {
  const results: Located[] = [];
  const pattern = new RegExp(
    String.raw`"lat"\s*:\s*"?(${NUM})"?\s*,\s*"(?:lng|lon)"\s*:\s*"?(${NUM})`,
    'g'
  );
  for (const match of script.matchAll(pattern)) {
    if (!match[1] || !match[2]) {
      continue;
    }
    const at = match.index ?? 0;
    const fields: WidgetFields = { widget: 'coordinates', center_lat: match[1], center_lon: match[2] };
    const zoom = zoomIn(enclosingObject(script, at));
    if (zoom) {
      fields.zoom = zoom;
    }
    results.push({ at, fields });
  }
  return results;
}

function zoomIn(body: string): string | undefined {
  return /["']?zoom["']?\s*[:=]\s*["']?(\d+(?:\.\d+)?)/.exec(body)?.[1];
}

// The innermost `{ ... }` around a position, without nesting awareness.
function enclosingObject(script: string, at: number): string {
  const open = script.lastIndexOf('{', at);
  const close = script.indexOf('}', at);
  return script.slice(open === -1 ? 0 : open + 1, close === -1 ? script.length : close);
}

const IFRAME_MAP = /openstreetmap\.org|osm\.org|google\.[a-z.]+\/maps|maps\.google\.[a-z.]+/i;

/** Centre and zoom of an embedded OpenStreetMap or Google Maps iframe. */
export function detectIframeWidget(src: string): WidgetFields | undefined {
  if (!IFRAME_MAP.test(src)) {
    return undefined;
  }

  const fields: WidgetFields = { widget: 'map_iframe', type: 'iframe', iframe_src: src };
  let params: URLSearchParams;
  try {
    params = new URL(src, 'https://localhost').searchParams;
  } catch {
    return fields;
  }

  const pair = (value: string | null): [string, string] | undefined => {
    const match = value ? new RegExp(String.raw`^\s*(${NUM})\s*,\s*(${NUM})\s*$`).exec(value) : null;
    return match?.[1] && match[2] ? [match[1], match[2]] : undefined;
  };
  const numeric = (value: string | null): string | undefined =>
    value && new RegExp(`^${NUM}$`).test(value.trim()) ? value.trim() : undefined;

  const lat = numeric(params.get('lat')) ?? numeric(params.get('mlat'));
  const lon = numeric(params.get('lon')) ?? numeric(params.get('mlon')) ?? numeric(params.get('lng'));
  const center =
    lat && lon
      ? [lat, lon]
      : pair(params.get('marker')) ?? pair(params.get('ll')) ?? pair(params.get('center')) ?? pair(params.get('q'));

  if (center?.[0] && center[1]) {
    fields.center_lat = center[0];
    fields.center_lon = center[1];
  }
  const zoom = numeric(params.get('zoom')) ?? numeric(params.get('z'));
  if (zoom) {
    fields.zoom = zoom;
  }
  return fields;
}

/** Map container carrying its centre in data attributes. */
export function detectMarkupWidget(attributes: Readonly<Record<string, string | undefined>>): WidgetFields | undefined {
  const cssClass = attributes.class ?? '';
  if (!/map/i.test(cssClass)) {
    return undefined;
  }
  const lat = attributes['data-lat'] ?? attributes['data-latitude'];
  const lon = attributes['data-lon'] ?? attributes['data-lng'] ?? attributes['data-longitude'];
  if (!lat?.trim() || !lon?.trim()) {
    return undefined;
  }

  const fields: WidgetFields = {
    widget: 'map_markup',
    center_lat: lat.trim(),
    center_lon: lon.trim(),
    css_class: cssClass,
  };
  const zoom = attributes['data-zoom']?.trim();
  if (zoom) {
    fields.zoom = zoom;
  }
  if (attributes.id) {
    fields.container = attributes.id;
  }
  return fields;
}
