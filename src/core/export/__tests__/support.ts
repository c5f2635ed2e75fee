import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import type { CrawlResult } from '../../types/index.js';

export const CAMERA_URL = 'https://www.example.com/camera/vietnam/quang-trung-st-cam/';

export function sampleResult(overrides: Partial<CrawlResult> = {}): CrawlResult {
  return {
    url: CAMERA_URL,
    timestamp: '2026-01-05T09:03:07.000Z',
    method: 'http',
    status: 'success',
    attempts: 1,
    pageInfo: {
      title: 'Quang Trung Street Cam',
      h1: 'Quang Trung St',
      description: 'Live view',
      contentLength: 2048,
    },
    location: {
      breadcrumbs: [
        [
          { label: 'Vietnam', path: '/countries/vietnam/' },
          { label: 'Da Nang', path: '/countries/vietnam/da-nang/' },
        ],
      ],
      locationFromUrl: 'Vietnam',
      locationFromPage: 'Quang Trung St',
      country: 'Vietnam',
      city: 'Da Nang',
      coordinates: { latitude: '16.0544', longitude: '108.2022', zoom: '15', source: 'openstreetmap_center' },
    },
    streams: {
      primary: {
        embedUrl: 'https://www.youtube.com/embed/abc123',
        contentUrl: 'https://www.youtube.com/watch?v=abc123',
        thumbnailUrl: 'https://i.ytimg.com/vi/abc123/hqdefault.jpg',
        source: 'json_ld',
      },
      thumbnails: [
        { type: 'json_ld', url: 'https://i.ytimg.com/vi/abc123/hqdefault.jpg', source: 'thumbnailUrl' },
        { type: 'meta_tag', url: 'https://www.example.com/og.jpg', source: 'og:image' },
      ],
      otherStreams: [{ url: 'https://cdn.example.com/live/cam.m3u8', kind: 'hls' }],
      embedCodes: [],
      cameraText: ['Camera online'],
    },
    maps: {
      openstreetmap: { centerLat: '16.0544', centerLon: '108.2022', zoom: '15' },
    },
    warnings: [],
    ...overrides,
  };
}

export function errorResult(url: string): CrawlResult {
  return {
    url,
    timestamp: '2026-01-05T09:03:07.000Z',
    method: 'http',
    status: 'error',
    attempts: 4,
    location: { breadcrumbs: [], coordinates: { source: 'none' } },
    error: { code: 'timeout', message: 'Request timed out', retryable: true },
    warnings: [],
  };
}

export async function withTempDir<T>(run: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), 'webcam-crawler-'));
  try {
    return await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
