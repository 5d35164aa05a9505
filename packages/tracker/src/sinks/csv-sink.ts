/**
 * CSV Sink
 *
 * Writes log entries as delimited text.
 */

import { appendFileSync, existsSync, statSync, writeFileSync } from 'node:fs';
import { stringify } from 'csv-stringify/sync';
import { isMissing } from '@celltrace/core';

export interface CsvWriteOptions {
  /** Append to an existing file instead of replacing it */
  append: boolean;
  /** Field delimiter (default: ',') */
  delimiter?: string;
}

/**
 * Render a value as a CSV field. Missing values become empty fields.
 */
export function formatCell(value: unknown): string {
  if (isMissing(value)) return '';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Write rows to a delimited file. In append mode the header is only written
 * when the file is missing or empty. File system errors propagate unchanged.
 */
export function writeCsv(
  file: string,
  header: string[],
  rows: unknown[][],
  options: CsvWriteOptions
): void {
  const delimiter = options.delimiter ?? ',';
  const body = stringify(
    rows.map((row) => row.map(formatCell)),
    { delimiter }
  );

  if (options.append && existsSync(file) && statSync(file).size > 0) {
    appendFileSync(file, body, 'utf-8');
    return;
  }

  const headerLine = stringify([header], { delimiter });
  writeFileSync(file, headerLine + body, 'utf-8');
}
