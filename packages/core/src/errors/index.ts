/**
 * Error exports for core
 */

export { TraceError, ConfigurationError, UsageError } from './trace-error.js';
export type { TraceErrorCode, TraceErrorDetails } from './trace-error.js';
