// src/core/export/tabular.ts
import { Workbook } from 'exceljs';
import type { BreadcrumbTrail, CrawlResult } from '../types/index.js';
import type { TableRow } from './types.js';

export const TABLE_COLUMNS = [
  'url',
  'timestamp',
  'method',
  'status',
  'attempts',
  'title',
  'h1',
  'description',
  'content_length',
  'location_from_url',
  'location_from_page',
  'country',
  'city',
  'breadcrumbs',
  'latitude',
  'longitude',
  'zoom',
  'coordinate_source',
  'embed_url',
  'content_url',
  'thumbnail_url',
  'thumbnails',
  'other_streams',
  'embed_count',
  'camera_text',
  'osm_center_lat',
  'osm_center_lon',
  'osm_zoom',
  'google_lat',
  'google_lng',
  'google_zoom',
  'screenshot_path',
  'error_code',
  'error_message',
  'warnings',
] as const;

const LIST_SEPARATOR = ' | ';

function formatTrails(trails: readonly BreadcrumbTrail[]): string {
  return trails.map((trail) => trail.map((item) => item.label).join(' > ')).join(LIST_SEPARATOR);
}

/** One spreadsheet row per record; lists are joined with ` | `. */
export function flattenResult(result: CrawlResult): TableRow {
  const { location, streams, maps, pageInfo } = result;
  return {
    url: result.url,
    timestamp: result.timestamp,
    method: result.method,
    status: result.status,
    attempts: result.attempts,
    title: pageInfo?.title ?? '',
    h1: pageInfo?.h1 ?? '',
    description: pageInfo?.description ?? '',
    content_length: pageInfo?.contentLength ?? 0,
    location_from_url: location.locationFromUrl ?? '',
    location_from_page: location.locationFromPage ?? '',
    country: location.country ?? '',
    city: location.city ?? '',
    breadcrumbs: formatTrails(location.breadcrumbs),
    latitude: location.coordinates.latitude ?? '',
    longitude: location.coordinates.longitude ?? '',
    zoom: location.coordinates.zoom ?? '',
    coordinate_source: location.coordinates.source,
    embed_url: streams?.primary?.embedUrl ?? '',
    content_url: streams?.primary?.contentUrl ?? '',
    thumbnail_url: streams?.primary?.thumbnailUrl ?? '',
    thumbnails: (streams?.thumbnails ?? []).map((thumbnail) => thumbnail.url).join(LIST_SEPARATOR),
    other_streams: (streams?.otherStreams ?? []).map((stream) => stream.url).join(LIST_SEPARATOR),
    embed_count: streams?.embedCodes.length ?? 0,
    camera_text: (streams?.cameraText ?? []).join(LIST_SEPARATOR),
    osm_center_lat: maps?.openstreetmap?.centerLat ?? '',
    osm_center_lon: maps?.openstreetmap?.centerLon ?? '',
    osm_zoom: maps?.openstreetmap?.zoom ?? '',
    google_lat: maps?.googleMaps?.lat ?? '',
    google_lng: maps?.googleMaps?.lng ?? '',
    google_zoom: maps?.googleMaps?.zoom ?? '',
    screenshot_path: result.screenshotPath ?? '',
    error_code: result.error?.code ?? '',
    error_message: result.error?.message ?? '',
    warnings: result.warnings.join(LIST_SEPARATOR),
  };
}

export function buildWorkbook(results: readonly CrawlResult[]): Workbook {
  const workbook = new Workbook();
  const sheet = workbook.addWorksheet('Crawl results');
  sheet.columns = TABLE_COLUMNS.map((key) => ({ header: key, key, width: key === 'url' ? 60 : 20 }));
  for (const result of results) {
    sheet.addRow(flattenResult(result));
  }
  return workbook;
}

export async function writeTable(
  results: readonly CrawlResult[],
  filePath: string,
  format: 'csv' | 'excel',
  encoding: BufferEncoding
): Promise<void> {
  const workbook = buildWorkbook(results);
  if (format === 'csv') {
    await workbook.csv.writeFile(filePath, { encoding });
  } else {
    await workbook.xlsx.writeFile(filePath);
  }
}
