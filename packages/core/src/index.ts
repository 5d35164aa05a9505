/**
 * @celltrace/core
 *
 * Table types, errors, option schemas and equality primitives
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
