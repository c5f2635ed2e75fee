import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { chromium } from 'playwright';
import { BrowserManager } from '../browser.js';
import { BROWSER_VIEWPORT, USER_AGENTS } from '../../config/constants.js';
import { ErrorCode } from '../../errors.js';
import type { Log } from '../../logger.js';

jest.mock('playwright', () => ({
  chromium: {
    launch: jest.fn(),
  },
}));

const silentLog: Log = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

describe('BrowserManager', () => {
  const launchMock = chromium.launch as unknown as jest.Mock;

  const mockResolved = <T>(value: T) => {
    return jest.fn(() => Promise.resolve(value)) as jest.Mock;
  };

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('launches one browser and reuses its context', async () => {
    const context = { close: mockResolved(undefined) };
    const browser = { newContext: mockResolved(context), close: mockResolved(undefined) };
    launchMock.mockImplementation(() => Promise.resolve(browser));

    const manager = new BrowserManager(silentLog, { headless: true });
    const first = await manager.launch();
    const second = await manager.launch();

    expect(first).toBe(context);
    expect(second).toBe(context);
    expect(launchMock).toHaveBeenCalledTimes(1);
    expect(launchMock.mock.calls[0]?.[0]).toMatchObject({ headless: true });
    expect(browser.newContext).toHaveBeenCalledWith({
      userAgent: USER_AGENTS[0],
      viewport: BROWSER_VIEWPORT,
      locale: 'en-US',
    });
  });

  it('closes context and browser and relaunches afterwards', async () => {
    const context = { close: mockResolved(undefined) };
    const browser = { newContext: mockResolved(context), close: mockResolved(undefined) };
    launchMock.mockImplementation(() => Promise.resolve(browser));

    const manager = new BrowserManager(silentLog, { headless: false });
    await manager.launch();
    await manager.close();
    await manager.close();

    expect(context.close).toHaveBeenCalledTimes(1);
    expect(browser.close).toHaveBeenCalledTimes(1);
    expect(manager.isOpen()).toBe(false);

    await manager.launch();
    expect(launchMock).toHaveBeenCalledTimes(2);
  });

  it('closes the browser even when the context fails to close', async () => {
    const context = { close: jest.fn(() => Promise.reject(new Error('Target closed'))) };
    const browser = { newContext: mockResolved(context), close: mockResolved(undefined) };
    launchMock.mockImplementation(() => Promise.resolve(browser));
    const warn = jest.fn<Log['warn']>();

    const manager = new BrowserManager({ ...silentLog, warn }, { headless: true });
    await manager.launch();
    await manager.close();

    expect(browser.close).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Failed to close browser context: Target closed');
    expect(manager.isOpen()).toBe(false);
  });

  it('logs a failed browser close instead of throwing', async () => {
    const context = { close: mockResolved(undefined) };
    const browser = { newContext: mockResolved(context), close: jest.fn(() => Promise.reject(new Error('gone'))) };
    launchMock.mockImplementation(() => Promise.resolve(browser));
    const warn = jest.fn<Log['warn']>();

    const manager = new BrowserManager({ ...silentLog, warn }, { headless: true });
    await manager.launch();

    await expect(manager.close()).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledWith('Failed to close browser: gone');
  });

  it('reports launch failures as transient fetch errors', async () => {
    launchMock.mockImplementation(() => Promise.reject(new Error('Executable does not exist')));

    const manager = new BrowserManager(silentLog, { headless: true });

    await expect(manager.launch()).rejects.toMatchObject({
      kind: 'transient',
      code: ErrorCode.BROWSER_LAUNCH_FAILED,
      message: 'Failed to launch browser: Executable does not exist',
    });
    expect(manager.isOpen()).toBe(false);
  });
});
