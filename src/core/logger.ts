// src/core/logger.ts
import { appendFileSync } from 'fs';
import { describeError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Log {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Writes `[LEVEL] message` lines to stderr so stdout stays free for results.
 * When a log file is configured every emitted line is also appended there.
 * The first failed append is reported on stderr and file logging stops.
 */
export class Logger implements Log {
  private fileFailed = false;

  constructor(
    private level: LogLevel = 'info',
    private file?: string
  ) {}

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  private write(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const line = `[${level.toUpperCase()}] ${message}`;
    console.error(line);

    if (this.file && !this.fileFailed) {
      try {
        appendFileSync(this.file, `${new Date().toISOString()} ${line}\n`, 'utf-8');
      } catch (error) {
        this.fileFailed = true;
        console.error(`[ERROR] Cannot write log file ${this.file}: ${describeError(error)}`);
      }
    }
  }
}
