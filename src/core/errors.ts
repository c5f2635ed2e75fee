// src/core/errors.ts
import type { CrawlFailure } from './types/index.js';

export enum ErrorCode {
  NETWORK_ERROR = 'network_error',
  TIMEOUT = 'timeout',
  HTTP_STATUS = 'http_status',
  NAVIGATION_FAILED = 'navigation_failed',
  BROWSER_LAUNCH_FAILED = 'browser_launch_failed',
  INVALID_URL = 'invalid_url',
  PARSE_FAILED = 'parse_failed',
  RESOLVER_FAILED = 'resolver_failed',
  INVALID_CONFIG = 'invalid_config',
  EXPORT_FAILED = 'export_failed',
  READ_FAILED = 'read_failed',
  CANCELLED = 'cancelled',
}

export class CrawlError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CrawlError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type FetchErrorKind = 'transient' | 'permanent';

/**
 * Failure of a single page retrieval. Transient failures are retried by the
 * orchestrator; permanent ones end the URL immediately.
 */
export class FetchError extends CrawlError {
  readonly kind: FetchErrorKind;

  constructor(
    kind: FetchErrorKind,
    code: ErrorCode,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(code, message, kind === 'transient', undefined, context);
    this.name = 'FetchError';
    this.kind = kind;
  }

  static transient(code: ErrorCode, message: string, context?: Record<string, unknown>): FetchError {
    return new FetchError('transient', code, message, context);
  }

  static permanent(code: ErrorCode, message: string, context?: Record<string, unknown>): FetchError {
    return new FetchError('permanent', code, message, context);
  }
}

// A single malformed structured-data block; the rest of the page is still parsed.
export class ParseSoftError extends CrawlError {
  constructor(message: string, public readonly blockIndex: number) {
    super(ErrorCode.PARSE_FAILED, message, false, undefined, { blockIndex });
    this.name = 'ParseSoftError';
  }
}

// One resolver failed on unexpected structure; only its own section is emptied.
export class ResolverSoftError extends CrawlError {
  constructor(public readonly resolver: string, cause: unknown) {
    super(
      ErrorCode.RESOLVER_FAILED,
      `${resolver} resolver failed: ${describeError(cause)}`,
      false,
      undefined,
      { resolver }
    );
    this.name = 'ResolverSoftError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toCrawlFailure(error: CrawlError): CrawlFailure {
  return {
    code: error.code,
    message: error.message,
    retryable: error.retryable,
  };
}
