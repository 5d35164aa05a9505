/**
 * Type exports for core
 */

export type { Cell, Table, DataRecord, CellChange } from './table.js';
