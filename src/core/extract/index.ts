// src/core/extract/index.ts
import * as cheerio from 'cheerio';
import { ResolverSoftError } from '../errors.js';
import type { Log } from '../logger.js';
import type { LocationInfo, MapInfo, PageDocument, PageInfo, StreamInfo } from '../types/index.js';
import { resolveCoordinates } from './coordinates.js';
import { locationFromUrl, resolveLocation } from './location.js';
import { resolveMaps } from './maps.js';
import { extractPageInfo } from './page-info.js';
import { resolveStreams } from './streams.js';
import { parseStructuredData } from './structured-data.js';

export interface PageExtraction {
  pageInfo: PageInfo;
  location: LocationInfo;
  streams: StreamInfo;
  maps: MapInfo;
  warnings: string[];
}

/**
 * Runs the structured-data parser and the four resolvers over one document.
 * A failing resolver empties only its own section and adds a warning.
 */
export function extractPage(document: PageDocument, log: Log): PageExtraction {
  const $ = cheerio.load(document.html);
  const warnings: string[] = [];
  const blocks = parseStructuredData($, log, warnings);

  const isolate = <T>(resolver: string, run: () => T, empty: () => T): T => {
    try {
      return run();
    } catch (error) {
      const soft = new ResolverSoftError(resolver, error);
      log.warn(soft.message);
      warnings.push(soft.message);
      return empty();
    }
  };

  const place = isolate(
    'location',
    () => resolveLocation(document.url, $, blocks),
    () => ({ breadcrumbs: [], locationFromUrl: locationFromUrl(document.url) })
  );
  const coordinates = isolate(
    'coordinates',
    () => resolveCoordinates(blocks, $),
    () => ({ source: 'none' as const })
  );
  const streams = isolate(
    'streams',
    () => resolveStreams(blocks, $, document.html, document.url),
    (): StreamInfo => ({ thumbnails: [], otherStreams: [], embedCodes: [], cameraText: [] })
  );
  const maps = isolate('maps', () => resolveMaps(blocks), (): MapInfo => ({}));

  return {
    pageInfo: extractPageInfo($, document, blocks),
    location: { ...place, coordinates },
    streams,
    maps,
    warnings,
  };
}

export { parseStructuredData } from './structured-data.js';
export { resolveLocation, locationFromUrl } from './location.js';
export { resolveCoordinates, COORDINATE_RULES } from './coordinates.js';
export { resolveStreams } from './streams.js';
export { resolveMaps } from './maps.js';
export { classifyWidget } from './widgets.js';
