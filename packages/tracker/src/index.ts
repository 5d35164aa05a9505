/**
 * @celltrace/tracker
 *
 * Change tracking for in-memory transformation pipelines
 */

// Interfaces
export * from './interfaces/index.js';

// Loggers
export * from './loggers/index.js';

// Pipeline and lifecycle controls
export * from './pipeline/index.js';

// Sinks
export { writeCsv, formatCell } from './sinks/csv-sink.js';
export type { CsvWriteOptions } from './sinks/csv-sink.js';

// Diagnostics and configuration
export { Logger } from './logger.js';
export type { LogLevel, LogFormat } from './logger.js';
export { loadTrackerConfig, defaultDiagnostics, defaultSinkPath } from './config.js';
export type { TrackerConfig } from './config.js';
