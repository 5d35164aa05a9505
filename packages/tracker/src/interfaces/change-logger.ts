/**
 * Change Logger Interface
 *
 * The contract every logger attached to a pipeline must satisfy.
 */

import type { FlushOptionsInput } from '@celltrace/core';

/**
 * Metadata describing one step of a tracked pipeline
 */
export interface StepMeta {
  /** Step number, starting at 1 and increasing without gaps */
  step: number;
  /** Wall-clock time the step was recorded */
  timestamp: Date;
  /** Source text of the transformation, or the label given for it */
  expr: string;
  /** The transformation itself, for loggers that need more than its text */
  fn?: (...args: never[]) => unknown;
}

/**
 * Options handed to flush: the sink options plus anything logger-specific
 */
export type FlushRequest = FlushOptionsInput & Record<string, unknown>;

/**
 * Change Logger Interface
 *
 * Loggers are polymorphic over these two operations only; the pipeline never
 * reads a logger's internal state.
 */
export interface ChangeLogger {
  /**
   * Append entries describing what changed between input and output.
   * Must not mutate either snapshot, and must append all of a step's
   * entries or none of them.
   */
  record(meta: StepMeta, input: unknown, output: unknown): void;

  /**
   * Write the accumulated log to its sink. An empty log still produces a
   * header-only file.
   */
  flush(options?: FlushRequest): void;
}
