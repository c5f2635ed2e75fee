// src/core/export/types.ts
import type { CoordinateInfo, OutputFormat } from '../types/index.js';

export interface OutputOptions {
  formats: readonly OutputFormat[];
  minimal: boolean;
  outputDir: string;
  encoding: BufferEncoding;
  indent: number;
  /** Moment used for the timestamped file names. */
  date: Date;
}

// One per-country entry: just enough to embed the stream elsewhere.
export interface MinimalRecord {
  url: string;
  embedUrl: string;
  contentUrl: string;
  thumbnailUrl: string;
  country: string;
  city: string;
  title: string;
  coordinates: CoordinateInfo;
}

export type TableRow = Record<string, string | number>;
