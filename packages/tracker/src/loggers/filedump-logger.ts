/**
 * Filedump Logger
 *
 * Keeps a full copy of the dataset after every step and writes each copy to
 * its own file.
 */

import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { Cell, FiledumpLoggerOptions, Table } from '@celltrace/core';
import {
  ConfigurationError,
  columnNames,
  filedumpLoggerOptionsSchema,
  flushOptionsSchema,
  getColumn,
  parseOptions,
  rowCount,
} from '@celltrace/core';
import type { ChangeLogger, FlushRequest, StepMeta } from '../interfaces/index.js';
import { defaultDiagnostics, defaultSinkPath } from '../config.js';
import type { Logger } from '../logger.js';
import { writeCsv } from '../sinks/csv-sink.js';
import { requireTable } from './tabular.js';

export const FILEDUMP_DIR = 'filedump';

interface Snapshot {
  step: number;
  columns: string[];
  rows: Cell[][];
}

function takeSnapshot(step: number, table: Table): Snapshot {
  const columns = columnNames(table);
  const rows: Cell[][] = [];
  for (let row = 0; row < rowCount(table); row++) {
    rows.push(columns.map((column) => getColumn(table, column)?.[row] ?? null));
  }
  return { step, columns, rows };
}

export class FiledumpLogger implements ChangeLogger {
  private readonly dir: string | undefined;
  private readonly prefix: string;
  private readonly verbose: boolean;
  private readonly diagnostics: Logger;
  private readonly snapshots: Snapshot[] = [];

  constructor(options: FiledumpLoggerOptions = {}, diagnostics?: Logger) {
    const parsed = parseOptions(filedumpLoggerOptionsSchema, options, 'FiledumpLogger');
    this.dir = parsed.dir;
    this.prefix = parsed.prefix;
    this.verbose = parsed.verbose;
    this.diagnostics = diagnostics ?? defaultDiagnostics();
  }

  record(meta: StepMeta, input: unknown, output: unknown): void {
    const after = takeSnapshot(meta.step, requireTable(output, 'output', 'FiledumpLogger'));

    if (this.snapshots.length === 0) {
      const before = takeSnapshot(0, requireTable(input, 'input', 'FiledumpLogger'));
      this.snapshots.push(before, after);
      return;
    }
    this.snapshots.push(after);
  }

  /**
   * Write every snapshot to `<dir>/<prefix>NNN.csv`. The directory comes from
   * the `dir` flush option, then `file`, then the constructor option.
   * Snapshot files are always rewritten, so `append` is refused.
   */
  flush(options: FlushRequest = {}): void {
    const { file, append, delimiter } = parseOptions(flushOptionsSchema, options, 'FiledumpLogger.flush');
    if (append) {
      throw new ConfigurationError({
        code: 'INVALID_OPTIONS',
        message: 'FiledumpLogger cannot append to snapshot files',
        suggestion: 'Flush to a new directory instead of appending.',
        context: { subject: 'FiledumpLogger.flush' },
      });
    }
    const dir =
      (typeof options.dir === 'string' ? options.dir : undefined) ??
      file ??
      this.dir ??
      defaultSinkPath(FILEDUMP_DIR);

    mkdirSync(dir, { recursive: true });
    for (const snapshot of this.snapshots) {
      const name = `${this.prefix}${String(snapshot.step).padStart(3, '0')}.csv`;
      writeCsv(join(dir, name), snapshot.columns, snapshot.rows, { append: false, delimiter });
    }

    if (this.verbose) {
      this.diagnostics.info(`Dumped ${this.snapshots.length} snapshots in ${dir}`);
    }
  }

  steps(): number[] {
    return this.snapshots.map((snapshot) => snapshot.step);
  }
}
