/**
 * Cell Diff
 *
 * Compares two snapshots of a table at the level of (row key, column) pairs.
 */

import type { Cell, CellChange, Table } from '@celltrace/core';
import { ConfigurationError, cellsEqual, columnNames, getColumn, rowCount } from '@celltrace/core';

export interface CelldiffOptions {
  /** Columns to leave out of the comparison */
  ignore?: string[];
}

/**
 * Build a map from key value to row index, rejecting duplicates
 */
function buildKeyIndex(table: Table, key: string, side: 'input' | 'output'): Map<Cell, number> {
  const column = getColumn(table, key);
  if (!column) {
    throw new ConfigurationError({
      code: 'KEY_COLUMN_MISSING',
      message: `Key column '${key}' not found in ${side} snapshot`,
      suggestion: `Make sure every step keeps the '${key}' column.`,
      context: { key, side, columns: columnNames(table) },
    });
  }

  const index = new Map<Cell, number>();
  column.forEach((value, row) => {
    const normalized = normalizeKey(value);
    if (index.has(normalized)) {
      throw new ConfigurationError({
        code: 'DUPLICATE_KEY',
        message: `Duplicate key ${String(value)} in column '${key}' of ${side} snapshot`,
        suggestion: `The '${key}' column must identify rows uniquely.`,
        context: { key, side, value: String(value), row },
      });
    }
    index.set(normalized, row);
  });
  return index;
}

/**
 * Dates are compared by time, and every missing value collapses to null
 */
function normalizeKey(value: Cell): Cell {
  if (value instanceof Date) return value.getTime();
  if (value === undefined || (typeof value === 'number' && Number.isNaN(value))) return null;
  return value;
}

/**
 * Compute the cell-level difference between two snapshots.
 *
 * Added rows contribute one change per column (old = null), removed rows one
 * per column (new = null). For rows present on both sides, shared columns are
 * compared cell by cell, and a column present on only one side counts as
 * changed for every row.
 *
 * @param input - Snapshot before the step
 * @param output - Snapshot after the step
 * @param key - Column whose values identify rows
 */
export function celldiff(
  input: Table,
  output: Table,
  key: string,
  options: CelldiffOptions = {}
): CellChange[] {
  const ignored = new Set([key, ...(options.ignore ?? [])]);
  const inputIndex = buildKeyIndex(input, key, 'input');
  const outputIndex = buildKeyIndex(output, key, 'output');

  const inputColumns = columnNames(input).filter((c) => !ignored.has(c));
  const outputColumns = columnNames(output).filter((c) => !ignored.has(c));
  const dropped = inputColumns.filter((c) => getColumn(output, c) === undefined);

  const outputKeys = getColumn(output, key) ?? [];
  const inputKeys = getColumn(input, key) ?? [];

  const matched: CellChange[] = [];
  const added: CellChange[] = [];

  for (let row = 0; row < rowCount(output); row++) {
    const keyValue = outputKeys[row] ?? null;
    const inputRow = inputIndex.get(normalizeKey(keyValue));

    if (inputRow === undefined) {
      for (const column of outputColumns) {
        added.push({ key: keyValue, column, old: null, new: getColumn(output, column)?.[row] ?? null });
      }
      continue;
    }

    for (const column of outputColumns) {
      const newValue = getColumn(output, column)?.[row] ?? null;
      const inputColumn = getColumn(input, column);
      if (!inputColumn) {
        matched.push({ key: keyValue, column, old: null, new: newValue });
        continue;
      }
      const oldValue = inputColumn[inputRow] ?? null;
      if (!cellsEqual(oldValue, newValue)) {
        matched.push({ key: keyValue, column, old: oldValue, new: newValue });
      }
    }

    for (const column of dropped) {
      matched.push({ key: keyValue, column, old: getColumn(input, column)?.[inputRow] ?? null, new: null });
    }
  }

  const removed: CellChange[] = [];
  for (let row = 0; row < rowCount(input); row++) {
    const keyValue = inputKeys[row] ?? null;
    if (outputIndex.has(normalizeKey(keyValue))) continue;

    for (const column of inputColumns) {
      removed.push({ key: keyValue, column, old: getColumn(input, column)?.[row] ?? null, new: null });
    }
  }

  return [...matched, ...added, ...removed];
}
