// src/cli/commands/options.ts
import { InvalidArgumentError } from 'commander';
import { CrawlError, describeError } from '../../core/errors.js';
import type { OutputFormat } from '../../core/types/index.js';

const FORMATS: readonly OutputFormat[] = ['json', 'csv', 'excel'];

function isOutputFormat(value: string): value is OutputFormat {
  return FORMATS.some((format) => format === value);
}

export function collectFormat(value: string, previous: OutputFormat[] = []): OutputFormat[] {
  const format = value.toLowerCase();
  if (!isOutputFormat(format)) {
    throw new InvalidArgumentError(`Use one of ${FORMATS.join(', ')}.`);
  }
  return previous.includes(format) ? previous : [...previous, format];
}

export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of seconds.');
  }
  return seconds;
}

export function parsePositiveSeconds(value: string): number {
  const seconds = parseSeconds(value);
  if (seconds === 0) {
    throw new InvalidArgumentError('Expected a positive number of seconds.');
  }
  return seconds;
}

export function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return count;
}

export function reportFailure(error: unknown): void {
  console.error('Error:', describeError(error));
  if (error instanceof CrawlError && error.suggestion) {
    console.error('Hint:', error.suggestion);
  }
}
