/**
 * Cellwise Logger
 *
 * Records one entry per table cell that changed during a step.
 */

import type { Cell, CellwiseLoggerOptions, Table } from '@celltrace/core';
import {
  cellwiseLoggerOptionsSchema,
  flushOptionsSchema,
  getColumn,
  parseOptions,
  rowCount,
} from '@celltrace/core';
import type { ChangeLogger, FlushRequest, StepMeta } from '../interfaces/index.js';
import { defaultDiagnostics, defaultSinkPath } from '../config.js';
import type { Logger } from '../logger.js';
import { writeCsv } from '../sinks/csv-sink.js';
import { celldiff } from './celldiff.js';
import { requireTable } from './tabular.js';

export const CELLWISE_LOG_FILE = 'cellwise.csv';

export interface CellwiseLogEntry {
  step: number;
  key: Cell;
  column: string;
  old: Cell;
  new: Cell;
}

export class CellwiseLogger implements ChangeLogger {
  readonly key: string;
  private readonly ignore: string[];
  private readonly verbose: boolean;
  private readonly diagnostics: Logger;
  private readonly log: CellwiseLogEntry[] = [];

  constructor(options: CellwiseLoggerOptions, diagnostics?: Logger) {
    const parsed = parseOptions(cellwiseLoggerOptionsSchema, options, 'CellwiseLogger');
    this.key = parsed.key;
    this.ignore = parsed.ignore;
    this.verbose = parsed.verbose;
    this.diagnostics = diagnostics ?? defaultDiagnostics();
  }

  record(meta: StepMeta, input: unknown, output: unknown): void {
    const before = this.withKey(requireTable(input, 'input', 'CellwiseLogger'));
    const after = this.withKey(requireTable(output, 'output', 'CellwiseLogger'));

    const changes = celldiff(before, after, this.key, { ignore: this.ignore });
    for (const change of changes) {
      this.log.push({ step: meta.step, ...change });
    }

    this.diagnostics.debug('Recorded cell changes', { step: meta.step, changes: changes.length });
  }

  /**
   * An empty record array has no columns at all; read it as a table with an
   * empty key column.
   */
  private withKey(table: Table): Table {
    if (rowCount(table) > 0 || getColumn(table, this.key)) return table;
    return { [this.key]: [], ...table };
  }

  flush(options: FlushRequest = {}): void {
    const { file, append, delimiter } = parseOptions(flushOptionsSchema, options, 'CellwiseLogger.flush');
    const target = file ?? defaultSinkPath(CELLWISE_LOG_FILE);

    writeCsv(
      target,
      ['step', this.key, 'column', 'old', 'new'],
      this.log.map((entry) => [entry.step, entry.key, entry.column, entry.old, entry.new]),
      { append, delimiter }
    );

    if (this.verbose) {
      this.diagnostics.info(`Dumped a log at ${target}`, { entries: this.log.length });
    }
  }

  entries(): CellwiseLogEntry[] {
    return [...this.log];
  }
}
