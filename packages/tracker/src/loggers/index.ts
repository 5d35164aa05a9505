/**
 * Built-in loggers
 */

export { celldiff } from './celldiff.js';
export type { CelldiffOptions } from './celldiff.js';
export { SimpleLogger, SIMPLE_LOG_FILE } from './simple-logger.js';
export type { SimpleLogEntry } from './simple-logger.js';
export { CellwiseLogger, CELLWISE_LOG_FILE } from './cellwise-logger.js';
export type { CellwiseLogEntry } from './cellwise-logger.js';
export { FiledumpLogger, FILEDUMP_DIR } from './filedump-logger.js';
export { ExpressionLogger, EXPRESSION_LOG_FILE } from './expression-logger.js';
export type { ExpressionLogEntry } from './expression-logger.js';
export { NoLogger } from './no-logger.js';
export { requireTable } from './tabular.js';
