/**
 * Utility functions for working with records and tables
 */

import type { Cell, DataRecord, Table } from '../types/index.js';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isCell(value: unknown): value is Cell {
  if (value === null || value === undefined || value instanceof Date) {
    return true;
  }
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'bigint':
      return true;
    default:
      return false;
  }
}

/**
 * Extract all unique field names from an array of records
 */
export function extractFieldNames(records: DataRecord[]): string[] {
  const fields = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      fields.add(key);
    }
  }
  return Array.from(fields);
}

/**
 * Check that a value is a column-oriented table: a plain object whose values
 * are arrays of cells, all of the same length.
 */
export function isTable(value: unknown): value is Table {
  if (!isPlainObject(value)) return false;

  let length: number | undefined;
  for (const column of Object.values(value)) {
    if (!Array.isArray(column)) return false;
    if (length === undefined) {
      length = column.length;
    } else if (column.length !== length) {
      return false;
    }
    if (!column.every(isCell)) return false;
  }
  return true;
}

/**
 * Convert row records to a table. Field order follows first appearance;
 * fields a record lacks become `null`.
 */
export function fromRecords(records: DataRecord[]): Table {
  const table: Table = {};
  for (const field of extractFieldNames(records)) {
    table[field] = records.map((record) => {
      const value = record[field];
      return isCell(value) ? (value ?? null) : String(value);
    });
  }
  return table;
}

export function toRecords(table: Table): DataRecord[] {
  const columns = columnNames(table);
  const records: DataRecord[] = [];
  for (let row = 0; row < rowCount(table); row++) {
    const record: DataRecord = {};
    for (const column of columns) {
      record[column] = getColumn(table, column)?.[row];
    }
    records.push(record);
  }
  return records;
}

/**
 * Coerce a snapshot into a table. Accepts a table or an array of plain
 * records whose values are all cells; anything else yields `undefined`.
 */
export function toTable(value: unknown): Table | undefined {
  if (isTable(value)) return value;

  if (Array.isArray(value)) {
    const records: DataRecord[] = [];
    for (const item of value) {
      if (!isPlainObject(item) || !Object.values(item).every(isCell)) {
        return undefined;
      }
      records.push(item);
    }
    return fromRecords(records);
  }

  return undefined;
}

export function columnNames(table: Table): string[] {
  return Object.keys(table);
}

/**
 * Own column of a table, ignoring inherited properties such as 'constructor'
 */
export function getColumn(table: Table, name: string): Cell[] | undefined {
  return Object.prototype.hasOwnProperty.call(table, name) ? table[name] : undefined;
}

export function rowCount(table: Table): number {
  const first = Object.values(table)[0];
  return first ? first.length : 0;
}
