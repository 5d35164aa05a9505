/**
 * Utility exports for core
 */

export {
  isPlainObject,
  isCell,
  isTable,
  toTable,
  fromRecords,
  toRecords,
  columnNames,
  getColumn,
  rowCount,
  extractFieldNames,
} from './records.js';
export { isMissing, cellsEqual, deepEqual } from './equality.js';
