// src/core/index.ts
export * from './types/index.js';
export * from './errors.js';
export { Logger, type Log, type LogLevel } from './logger.js';
export * from './config/crawler-config.js';
export * from './fetch/index.js';
export * from './extract/index.js';
export * from './export/index.js';
export { CrawlOrchestrator, sleep, type Sleep } from './orchestrator.js';
export { BatchRunner, type BatchDependencies, type BatchOptions, type BatchSummary } from './batch/runner.js';
