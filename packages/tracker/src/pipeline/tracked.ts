/**
 * Tracked values
 *
 * A dataset travelling through a pipeline together with the logger attached
 * to it. The logger is carried next to the data, never inside it, so
 * transformations only ever see the dataset itself.
 */

import { UsageError, toTable } from '@celltrace/core';
import type { ChangeLogger } from '../interfaces/index.js';
import { describeCall, describeFunction } from './expression.js';

/**
 * Link between a chain and its logger. Shared by reference by every value
 * of the chain, so the step counter advances along the whole chain.
 */
export interface Attachment {
  readonly logger: ChangeLogger;
  readonly clock: () => Date;
  /** Number of steps recorded so far */
  step: number;
  /** False once the logger was stopped or replaced */
  open: boolean;
}

/**
 * Copy tabular data so that a transformation mutating its argument in place
 * cannot rewrite the pre-image handed to the logger. Tables hold only cells,
 * which clone exactly; any other value is passed through as it is.
 */
function preImage<T>(data: T): T {
  return toTable(data) === undefined ? data : structuredClone(data);
}

export class Tracked<T> {
  constructor(
    readonly data: T,
    readonly attachment?: Attachment
  ) {}

  /** Logger attached to this value, if logging is active */
  get logger(): ChangeLogger | undefined {
    return this.attachment?.open ? this.attachment.logger : undefined;
  }

  /** Steps recorded so far by the attached logger */
  get step(): number {
    return this.attachment?.step ?? 0;
  }

  /**
   * Apply a one-argument transformation. The step is logged under `label`,
   * or under the source text of `fn` when no label is given.
   */
  pipe<U>(fn: (data: T) => U, label?: string): Tracked<U> {
    return this.run(fn, label ?? describeFunction(fn), (data) => fn(data));
  }

  /**
   * Apply `fn(data, ...args)`. The step is logged as `name(., ...args)`.
   */
  apply<A extends unknown[], U>(fn: (data: T, ...args: A) => U, ...args: A): Tracked<U> {
    return this.run(fn, describeCall(fn, args), (data) => fn(data, ...args));
  }

  private run<U>(
    fn: (...args: never[]) => unknown,
    expr: string,
    evaluate: (data: T) => U
  ): Tracked<U> {
    const attachment = this.attachment;
    if (!attachment) {
      return new Tracked(evaluate(this.data));
    }

    if (!attachment.open) {
      throw new UsageError({
        code: 'LOGGER_DETACHED',
        message: 'The logger of this chain was stopped or replaced',
        suggestion: 'Continue from the value returned by stopLog, dumpLog or startLog.',
        context: { step: attachment.step },
      });
    }

    const input = preImage(this.data);
    const output = evaluate(this.data);
    const step = attachment.step + 1;

    attachment.logger.record({ step, timestamp: attachment.clock(), expr, fn }, input, output);
    attachment.step = step;

    return new Tracked(output, attachment);
  }
}

/**
 * Wrap a value without attaching a logger; steps are plain function calls.
 */
export function track<T>(data: T): Tracked<T> {
  return new Tracked(data);
}

/**
 * Apply a list of same-typed transformations one after another
 */
export function pipeAll<T>(tracked: Tracked<T>, ...steps: ((data: T) => T)[]): Tracked<T> {
  return steps.reduce((current, step) => current.pipe(step), tracked);
}
