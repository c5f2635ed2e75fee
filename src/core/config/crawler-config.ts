// src/core/config/crawler-config.ts
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { CrawlError, ErrorCode, describeError } from '../errors.js';
import type { LogLevel } from '../logger.js';
import type { OutputFormat } from '../types/index.js';
import {
  DEFAULT_CONFIG_FILE,
  DEFAULT_MAX_RETRIES,
  DEFAULT_REQUEST_DELAY,
  DEFAULT_RETRY_DELAY,
  DEFAULT_SCREENSHOT_DIR,
  DEFAULT_SETTLE_DELAY,
  DEFAULT_TIMEOUT,
} from './constants.js';

export type BrowserSession = 'run' | 'url';

export interface CrawlerConfig {
  requestDelay: number;
  timeout: number;
  maxRetries: number;
  retryDelay: number;
  settleDelay: number;
  headless: boolean;
  screenshot: boolean;
  screenshotDir: string;
  browserSession: BrowserSession;
  forceEnglish: boolean;
}

export interface OutputConfig {
  defaultFormat: OutputFormat;
  encoding: BufferEncoding;
  indent: number;
  outputDir: string;
}

export interface LoggingConfig {
  level: LogLevel;
  file?: string;
}

export interface AppConfig {
  crawler: CrawlerConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}

export interface ConfigOverrides {
  crawler?: Partial<CrawlerConfig>;
  output?: Partial<OutputConfig>;
  logging?: Partial<LoggingConfig>;
}

const crawlerSchema = z
  .object({
    request_delay: z.number().min(0).default(DEFAULT_REQUEST_DELAY),
    timeout: z.number().positive().default(DEFAULT_TIMEOUT),
    max_retries: z.number().int().min(0).default(DEFAULT_MAX_RETRIES),
    retry_delay: z.number().min(0).default(DEFAULT_RETRY_DELAY),
    settle_delay: z.number().min(0).default(DEFAULT_SETTLE_DELAY),
    headless: z.boolean().default(true),
    screenshot: z.boolean().default(false),
    screenshot_dir: z.string().min(1).default(DEFAULT_SCREENSHOT_DIR),
    browser_session: z.enum(['run', 'url']).default('run'),
    force_english: z.boolean().default(false),
  })
  .strict();

const outputSchema = z
  .object({
    default_format: z.enum(['json', 'csv', 'excel']).default('json'),
    encoding: z.enum(['utf-8', 'utf8', 'utf16le', 'latin1', 'ascii']).default('utf-8'),
    indent: z.number().int().min(0).max(10).default(2),
    output_dir: z.string().min(1).default('.'),
  })
  .strict();

const loggingSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    file: z.string().min(1).nullable().default(null),
  })
  .strict();

export const configFileSchema = z
  .object({
    crawler: crawlerSchema.default({}),
    output: outputSchema.default({}),
    logging: loggingSchema.default({}),
  })
  .strict();

export type ConfigFile = z.input<typeof configFileSchema>;

export function parseConfig(raw: unknown): AppConfig {
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new CrawlError(
      ErrorCode.INVALID_CONFIG,
      `Invalid configuration: ${issues}`,
      false,
      'Check the keys and value types in the config file'
    );
  }

  const { crawler, output, logging } = parsed.data;
  return {
    crawler: {
      requestDelay: crawler.request_delay,
      timeout: crawler.timeout,
      maxRetries: crawler.max_retries,
      retryDelay: crawler.retry_delay,
      settleDelay: crawler.settle_delay,
      headless: crawler.headless,
      screenshot: crawler.screenshot,
      screenshotDir: crawler.screenshot_dir,
      browserSession: crawler.browser_session,
      forceEnglish: crawler.force_english,
    },
    output: {
      defaultFormat: output.default_format,
      encoding: output.encoding,
      indent: output.indent,
      outputDir: output.output_dir,
    },
    logging: {
      level: logging.level,
      file: logging.file ?? undefined,
    },
  };
}

export function defaultConfig(): AppConfig {
  return parseConfig({});
}

/**
 * Loads a config file. Without an explicit path the default file is optional
 * and its absence yields the built-in defaults.
 */
export async function loadConfig(filePath?: string): Promise<AppConfig> {
  const target = filePath ?? DEFAULT_CONFIG_FILE;

  let content: string;
  try {
    content = await readFile(target, 'utf-8');
  } catch (error) {
    if (!filePath && isMissingFile(error)) {
      return defaultConfig();
    }
    throw new CrawlError(
      ErrorCode.INVALID_CONFIG,
      `Cannot read config file ${target}: ${describeError(error)}`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new CrawlError(
      ErrorCode.INVALID_CONFIG,
      `Config file ${target} is not valid JSON: ${describeError(error)}`
    );
  }

  return parseConfig(raw);
}

export function withOverrides(config: AppConfig, overrides: ConfigOverrides): AppConfig {
  return {
    crawler: { ...config.crawler, ...definedOnly(overrides.crawler) },
    output: { ...config.output, ...definedOnly(overrides.output) },
    logging: { ...config.logging, ...definedOnly(overrides.logging) },
  };
}

function definedOnly<T extends object>(values: Partial<T> | undefined): Partial<T> {
  if (!values) {
    return {};
  }
  const result: Partial<T> = {};
  for (const key of Object.keys(values) as Array<keyof T>) {
    if (values[key] !== undefined) {
      result[key] = values[key];
    }
  }
  return result;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
