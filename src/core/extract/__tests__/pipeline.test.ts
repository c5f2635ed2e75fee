import { describe, it, expect } from '@jest/globals';
import { extractPage } from '../index.js';
import { ldJson, pageDocument, silentLog } from './support.js';

const CAMERA_URL = 'https://www.example.com/camera/vietnam/quang-trung-st-cam/';

describe('extractPage', () => {
  it('derives the location from the URL alone when the page has no location markup', () => {
    const result = extractPage(pageDocument(CAMERA_URL, '<html><body><p>Nothing here</p></body></html>'), silentLog);

    expect(result.location.locationFromUrl).toBe('Vietnam');
    expect(result.location.locationFromPage).toBeUndefined();
    expect(result.location.coordinates).toEqual({ source: 'none' });
    expect(result.location.breadcrumbs).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it('assembles every section from one document', () => {
    const html = `<html><head>
      <title> Quang Trung Street Cam </title>
      <meta name="description" content="Live view of Quang Trung street">
      ${ldJson({
        '@type': 'VideoObject',
        embedUrl: 'https://www.youtube.com/embed/abc123',
        contentUrl: 'https://www.youtube.com/watch?v=abc123',
        thumbnailUrl: 'https://i.ytimg.com/vi/abc123/hqdefault.jpg',
      })}
      </head><body>
      <nav class="breadcrumb"><a href="/countries/vietnam/">Vietnam</a><a href="/countries/vietnam/da-nang/">Da Nang</a></nav>
      <h1 class="page-heading">Quang Trung St</h1>
      <script>var cam = { center_lat: 16.0544, center_lon: 108.2022, zoom: 15 };</script>
      </body></html>`;
    const document = pageDocument(CAMERA_URL, html);

    const result = extractPage(document, silentLog);

    expect(result.pageInfo).toEqual({
      title: 'Quang Trung Street Cam',
      h1: 'Quang Trung St',
      description: 'Live view of Quang Trung street',
      contentLength: document.byteLength,
    });
    expect(result.location).toEqual({
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
    });
    expect(result.streams.primary?.source).toBe('json_ld');
    expect(result.maps).toEqual({
      openstreetmap: { centerLat: '16.0544', centerLon: '108.2022', zoom: '15' },
    });
  });

  it('produces identical output for repeated runs', () => {
    const html = `${ldJson({ '@type': 'VideoObject', embedUrl: 'https://player.example.com/1' })}
      <script>L.map('m', { center: [1.25, 2.5], zoom: 3 });</script>
      <a href="https://cdn.example.com/x.m3u8">hls</a>`;
    const document = pageDocument(CAMERA_URL, html);

    expect(JSON.stringify(extractPage(document, silentLog))).toBe(JSON.stringify(extractPage(document, silentLog)));
  });

  it('records malformed structured data as a warning', () => {
    const html = '<script type="application/ld+json">{ broken</script><h1>Cam</h1>';

    const result = extractPage(pageDocument(CAMERA_URL, html), silentLog);

    expect(result.warnings).toHaveLength(1);
    expect(result.location.locationFromPage).toBe('Cam');
  });
});
