// src/core/__tests__/logger.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { Logger } from '../logger.js';

describe('Logger', () => {
  let errorSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('prefixes each line with its level', () => {
    new Logger('debug').warn('Skipping malformed block');

    expect(errorSpy).toHaveBeenCalledWith('[WARN] Skipping malformed block');
  });

  it('drops messages below the configured level', () => {
    const log = new Logger('warn');

    log.debug('noise');
    log.info('noise');
    log.error('boom');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('[ERROR] boom');
  });

  it('appends emitted lines to the log file', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'webcam-crawler-log-'));
    try {
      const file = path.join(dir, 'crawl.log');
      const log = new Logger('info', file);

      log.info('first');
      log.debug('skipped');
      log.warn('second');

      const lines = (await readFile(file, 'utf-8')).trim().split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ \[INFO\] first$/);
      expect(lines[1]).toMatch(/\[WARN\] second$/);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('reports an unwritable log file once and keeps logging to stderr', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'webcam-crawler-log-'));
    try {
      const blocker = path.join(dir, 'not-a-dir');
      await writeFile(blocker, '');
      const file = path.join(blocker, 'crawl.log');
      const log = new Logger('info', file);

      expect(() => {
        log.info('first');
        log.warn('second');
      }).not.toThrow();

      const reports = errorSpy.mock.calls.filter(([line]) => String(line).startsWith('[ERROR] Cannot write log file'));
      expect(reports).toHaveLength(1);
      expect(errorSpy).toHaveBeenCalledWith('[INFO] first');
      expect(errorSpy).toHaveBeenCalledWith('[WARN] second');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
