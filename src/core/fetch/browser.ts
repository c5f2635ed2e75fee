// src/core/fetch/browser.ts
import { chromium, type Browser, type BrowserContext } from 'playwright';
import { BROWSER_VIEWPORT, USER_AGENTS } from '../config/constants.js';
import { ErrorCode, FetchError, describeError } from '../errors.js';
import type { Log } from '../logger.js';

export interface BrowserOptions {
  headless: boolean;
  userAgent?: string;
}

/**
 * Owns one Chromium instance and its context. The context is created lazily
 * on the first launch() and reused until close().
 */
export class BrowserManager {
  private browser?: Browser;
  private context?: BrowserContext;

  constructor(
    private log: Log,
    private options: BrowserOptions
  ) {}

  async launch(): Promise<BrowserContext> {
    if (this.context) {
      return this.context;
    }

    try {
      this.log.info(`Launching Chromium (headless: ${this.options.headless})`);
      this.browser = await chromium.launch({
        headless: this.options.headless,
        args: [
          '--disable-blink-features=AutomationControlled',
          '--no-sandbox',
          '--disable-dev-shm-usage',
        ],
      });
      this.context = await this.browser.newContext({
        userAgent: this.options.userAgent ?? USER_AGENTS[0],
        viewport: BROWSER_VIEWPORT,
        locale: 'en-US',
      });
    } catch (error) {
      await this.close();
      throw FetchError.transient(
        ErrorCode.BROWSER_LAUNCH_FAILED,
        `Failed to launch browser: ${describeError(error)}`
      );
    }

    return this.context;
  }

  /** Releases the session. Close failures are logged, never thrown. */
  async close(): Promise<void> {
    const { browser, context } = this;
    this.context = undefined;
    this.browser = undefined;

    try {
      if (context) {
        await context.close();
      }
    } catch (error) {
      this.log.warn(`Failed to close browser context: ${describeError(error)}`);
    } finally {
      if (browser) {
        await this.closeBrowser(browser);
      }
    }
  }

  private async closeBrowser(browser: Browser): Promise<void> {
    try {
      await browser.close();
      this.log.debug('Browser closed');
    } catch (error) {
      this.log.warn(`Failed to close browser: ${describeError(error)}`);
    }
  }

  isOpen(): boolean {
    return this.context !== undefined;
  }
}
