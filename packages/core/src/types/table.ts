/**
 * Tabular data types shared by loggers and utilities
 */

/** A single scalar cell. `null`, `undefined` and `NaN` count as missing. */
export type Cell = string | number | boolean | bigint | Date | null | undefined;

/**
 * Column-oriented table: every column is an ordered sequence of cells and all
 * columns share the same length. Column order is the key order of the object.
 */
export type Table = {
  [column: string]: Cell[];
};

/** Generic row-oriented record */
export type DataRecord = {
  [field: string]: unknown;
};

/** One changed cell between two snapshots of a table */
export interface CellChange {
  /** Value of the key column for the affected row */
  key: Cell;
  /** Column whose cell changed */
  column: string;
  /** Previous value (`null` when the row or column did not exist) */
  old: Cell;
  /** New value (`null` when the row or column no longer exists) */
  new: Cell;
}
