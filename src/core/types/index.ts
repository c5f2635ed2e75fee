// src/core/types/index.ts
export type FetchMethod = 'http' | 'browser';

export type CrawlStatus = 'success' | 'error';

export type OutputFormat = 'json' | 'csv' | 'excel';

export interface PageDocument {
  readonly url: string;
  readonly html: string;
  readonly method: FetchMethod;
  readonly elapsedMs: number;
  readonly byteLength: number;
  readonly screenshotPath?: string;
}

// Structured data trees. Numeric literals keep their source text.
export type TreeValue = TreeScalar | TreeMapping | TreeSequence;

export interface TreeScalar {
  readonly kind: 'scalar';
  readonly value: string | boolean | null;
}

export interface TreeMapping {
  readonly kind: 'mapping';
  readonly entries: ReadonlyMap<string, TreeValue>;
}

export interface TreeSequence {
  readonly kind: 'sequence';
  readonly items: readonly TreeValue[];
}

export type BlockKind = 'json_ld' | 'map_widget';

export interface StructuredBlock {
  readonly kind: BlockKind;
  /** Position among all blocks of the page, in document order. */
  readonly index: number;
  readonly tree: TreeValue;
}

export interface BreadcrumbItem {
  label: string;
  path: string;
  title?: string;
}

export type BreadcrumbTrail = BreadcrumbItem[];

export type CoordinateSource =
  | 'openstreetmap_center'
  | 'json_ld'
  | 'meta_tags'
  | 'map_widget_init'
  | 'none';

export interface CoordinateInfo {
  latitude?: string;
  longitude?: string;
  zoom?: string;
  source: CoordinateSource;
}

export interface LocationInfo {
  breadcrumbs: BreadcrumbTrail[];
  locationFromUrl?: string;
  locationFromPage?: string;
  country?: string;
  city?: string;
  coordinates: CoordinateInfo;
}

export type PrimaryStreamSource = 'json_ld' | 'iframe' | 'script' | 'meta_tag';

export interface PrimaryStream {
  embedUrl?: string;
  contentUrl?: string;
  thumbnailUrl?: string;
  source: PrimaryStreamSource;
}

export type ThumbnailType = 'json_ld' | 'meta_tag' | 'img_tag' | 'script';

export interface Thumbnail {
  type: ThumbnailType;
  url: string;
  /** Field, property, attribute or script key the URL was read from. */
  source: string;
}

export type StreamKind = 'hls' | 'dash' | 'progressive' | 'realtime';

export interface OtherStream {
  url: string;
  kind: StreamKind;
}

export interface EmbedCode {
  tag: 'iframe' | 'embed' | 'object';
  provider: string;
  /** `src`, or `data` for objects. */
  src: string;
  code: string;
}

export interface StreamInfo {
  primary?: PrimaryStream;
  thumbnails: Thumbnail[];
  otherStreams: OtherStream[];
  embedCodes: EmbedCode[];
  /** Text of camera, stream and status panels. */
  cameraText: string[];
}

export interface OpenStreetMapConfig {
  type?: string;
  centerLat?: string;
  centerLon?: string;
  zoom?: string;
  tileUrl?: string;
  container?: string;
  iframeSrc?: string;
}

export interface GoogleMapsConfig {
  type?: string;
  lat?: string;
  lng?: string;
  zoom?: string;
  mapTypeId?: string;
  iframeSrc?: string;
}

export interface OtherMapConfig {
  fields: Record<string, string>;
}

export interface MapInfo {
  openstreetmap?: OpenStreetMapConfig;
  googleMaps?: GoogleMapsConfig;
  other?: OtherMapConfig;
}

export interface PageInfo {
  title: string;
  h1: string;
  description: string;
  contentLength: number;
}

export interface CrawlFailure {
  code: string;
  message: string;
  retryable: boolean;
}

export interface CrawlResult {
  url: string;
  timestamp: string;
  method: FetchMethod;
  status: CrawlStatus;
  attempts: number;
  pageInfo?: PageInfo;
  location: LocationInfo;
  streams?: StreamInfo;
  maps?: MapInfo;
  screenshotPath?: string;
  error?: CrawlFailure;
  warnings: string[];
}
