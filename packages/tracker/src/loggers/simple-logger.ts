/**
 * Simple Logger
 *
 * Records, per step, whether the dataset changed at all.
 */

import type { SimpleLoggerOptions } from '@celltrace/core';
import { deepEqual, flushOptionsSchema, parseOptions, simpleLoggerOptionsSchema } from '@celltrace/core';
import type { ChangeLogger, FlushRequest, StepMeta } from '../interfaces/index.js';
import { defaultDiagnostics, defaultSinkPath } from '../config.js';
import type { Logger } from '../logger.js';
import { writeCsv } from '../sinks/csv-sink.js';

export const SIMPLE_LOG_FILE = 'simple_log.csv';

export interface SimpleLogEntry {
  step: number;
  timestamp: Date;
  expr: string;
  changed: boolean;
}

export class SimpleLogger implements ChangeLogger {
  private readonly log: SimpleLogEntry[] = [];
  private readonly verbose: boolean;
  private readonly diagnostics: Logger;

  constructor(options: SimpleLoggerOptions = {}, diagnostics?: Logger) {
    const parsed = parseOptions(simpleLoggerOptionsSchema, options, 'SimpleLogger');
    this.verbose = parsed.verbose;
    this.diagnostics = diagnostics ?? defaultDiagnostics();
  }

  record(meta: StepMeta, input: unknown, output: unknown): void {
    this.log.push({
      step: meta.step,
      timestamp: meta.timestamp,
      expr: meta.expr,
      changed: !deepEqual(input, output),
    });
  }

  flush(options: FlushRequest = {}): void {
    const { file, append, delimiter } = parseOptions(flushOptionsSchema, options, 'SimpleLogger.flush');
    const target = file ?? defaultSinkPath(SIMPLE_LOG_FILE);

    writeCsv(
      target,
      ['step', 'timestamp', 'expr', 'changed'],
      this.log.map((entry) => [entry.step, entry.timestamp, entry.expr, entry.changed]),
      { append, delimiter }
    );

    if (this.verbose) {
      this.diagnostics.info(`Dumped a log at ${target}`, { entries: this.log.length });
    }
  }

  /**
   * Copy of the recorded entries
   */
  entries(): SimpleLogEntry[] {
    return [...this.log];
  }
}
