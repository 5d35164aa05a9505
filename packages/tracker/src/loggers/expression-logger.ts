/**
 * Expression Logger
 *
 * Evaluates a set of named probes on the table after every step, e.g. a
 * row count or the mean of a column, and keeps their values.
 */

import type { Cell, ExpressionLoggerOptions, Probe } from '@celltrace/core';
import { expressionLoggerOptionsSchema, flushOptionsSchema, parseOptions } from '@celltrace/core';
import type { ChangeLogger, FlushRequest, StepMeta } from '../interfaces/index.js';
import { defaultDiagnostics, defaultSinkPath } from '../config.js';
import type { Logger } from '../logger.js';
import { writeCsv } from '../sinks/csv-sink.js';
import { requireTable } from './tabular.js';

export const EXPRESSION_LOG_FILE = 'expression_log.csv';

export interface ExpressionLogEntry {
  step: number;
  expr: string;
  values: Record<string, Cell>;
}

export class ExpressionLogger implements ChangeLogger {
  private readonly probes: [string, Probe][];
  private readonly verbose: boolean;
  private readonly diagnostics: Logger;
  private readonly log: ExpressionLogEntry[] = [];

  constructor(options: ExpressionLoggerOptions, diagnostics?: Logger) {
    const parsed = parseOptions(expressionLoggerOptionsSchema, options, 'ExpressionLogger');
    this.probes = Object.entries(parsed.probes);
    this.verbose = parsed.verbose;
    this.diagnostics = diagnostics ?? defaultDiagnostics();
  }

  record(meta: StepMeta, _input: unknown, output: unknown): void {
    const table = requireTable(output, 'output', 'ExpressionLogger');
    const values: Record<string, Cell> = {};
    for (const [name, probe] of this.probes) {
      values[name] = probe(table);
    }
    this.log.push({ step: meta.step, expr: meta.expr, values });
  }

  flush(options: FlushRequest = {}): void {
    const { file, append, delimiter } = parseOptions(flushOptionsSchema, options, 'ExpressionLogger.flush');
    const target = file ?? defaultSinkPath(EXPRESSION_LOG_FILE);
    const names = this.probes.map(([name]) => name);

    writeCsv(
      target,
      ['step', 'expr', ...names],
      this.log.map((entry) => [entry.step, entry.expr, ...names.map((name) => entry.values[name])]),
      { append, delimiter }
    );

    if (this.verbose) {
      this.diagnostics.info(`Dumped a log at ${target}`, { entries: this.log.length });
    }
  }

  entries(): ExpressionLogEntry[] {
    return [...this.log];
  }
}
