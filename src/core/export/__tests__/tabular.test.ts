import { describe, it, expect } from '@jest/globals';
import { Workbook } from 'exceljs';
import { readFile } from 'fs/promises';
import * as path from 'path';
import { TABLE_COLUMNS, flattenResult, writeTable } from '../tabular.js';
import { errorResult, sampleResult, withTempDir } from './support.js';

describe('export/tabular', () => {
  describe('flattenResult', () => {
    it('flattens a successful record', () => {
      const row = flattenResult(sampleResult());

      expect(Object.keys(row)).toEqual([...TABLE_COLUMNS]);
      expect(row).toMatchObject({
        url: 'https://www.example.com/camera/vietnam/quang-trung-st-cam/',
        status: 'success',
        title: 'Quang Trung Street Cam',
        country: 'Vietnam',
        city: 'Da Nang',
        breadcrumbs: 'Vietnam > Da Nang',
        latitude: '16.0544',
        longitude: '108.2022',
        coordinate_source: 'openstreetmap_center',
        embed_url: 'https://www.youtube.com/embed/abc123',
        thumbnails: 'https://i.ytimg.com/vi/abc123/hqdefault.jpg | https://www.example.com/og.jpg',
        other_streams: 'https://cdn.example.com/live/cam.m3u8',
        embed_count: 0,
        camera_text: 'Camera online',
        osm_zoom: '15',
        google_lat: '',
        error_code: '',
      });
    });

    it('keeps the failure on error records', () => {
      const row = flattenResult(errorResult('https://www.example.com/camera/x/'));

      expect(row.error_code).toBe('timeout');
      expect(row.error_message).toBe('Request timed out');
      expect(row.attempts).toBe(4);
      expect(row.title).toBe('');
      expect(row.coordinate_source).toBe('none');
    });
  });

  it('writes a workbook with a header row', async () => {
    await withTempDir(async (dir) => {
      const filePath = path.join(dir, 'results.xlsx');
      await writeTable([sampleResult()], filePath, 'excel', 'utf-8');

      const workbook = new Workbook();
      await workbook.xlsx.readFile(filePath);
      const sheet = workbook.getWorksheet('Crawl results');

      expect(sheet?.getRow(1).getCell(1).value).toBe('url');
      expect(sheet?.getRow(2).getCell(1).value).toBe('https://www.example.com/camera/vietnam/quang-trung-st-cam/');
      expect(sheet?.rowCount).toBe(2);
    });
  });

  it('writes CSV with the column names first', async () => {
    await withTempDir(async (dir) => {
      const filePath = path.join(dir, 'results.csv');
      await writeTable([sampleResult()], filePath, 'csv', 'utf-8');

      const content = (await readFile(filePath, 'utf-8')).replace(/^\uFEFF/, '');
      expect(content.split(/\r?\n/)[0]).toBe(TABLE_COLUMNS.join(','));
    });
  });
});
