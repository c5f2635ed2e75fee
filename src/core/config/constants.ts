// src/core/config/constants.ts
export const DEFAULT_REQUEST_DELAY = 2; // seconds between URLs
export const DEFAULT_TIMEOUT = 30; // seconds per fetch
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY = 2; // seconds between attempts
export const DEFAULT_SETTLE_DELAY = 2; // seconds for script-driven content
export const DEFAULT_SCREENSHOT_DIR = 'screenshots';
export const DEFAULT_CONFIG_FILE = 'crawler.config.json';
export const DEFAULT_URLS_FILE = 'urls.txt';

export const USER_AGENTS: readonly string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:121.0) Gecko/20100101 Firefox/121.0',
];

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'Accept-Encoding': 'gzip, deflate, br',
  Connection: 'keep-alive',
  'Upgrade-Insecure-Requests': '1',
  'Cache-Control': 'max-age=0',
};

export const BROWSER_VIEWPORT = { width: 1920, height: 1080 } as const;
