/**
 * Lifecycle controls: attach a logger, flush it, detach it.
 */

import type { DumpOptionsInput } from '@celltrace/core';
import { UsageError, dumpOptionsSchema, parseOptions } from '@celltrace/core';
import type { ChangeLogger } from '../interfaces/index.js';
import { SimpleLogger } from '../loggers/index.js';
import { Tracked, type Attachment } from './tracked.js';

export interface StartLogOptions {
  /** Clock used to timestamp steps (default: system time) */
  clock?: () => Date;
}

/** Dump options plus logger-specific flush options, forwarded verbatim */
export type DumpLogOptions = DumpOptionsInput & Record<string, unknown>;

function requireAttachment(tracked: Tracked<unknown>, operation: string): Attachment {
  const attachment = tracked.attachment;
  if (!attachment || !attachment.open) {
    throw new UsageError({
      code: 'NO_LOGGER_ATTACHED',
      message: `${operation} called on data without an attached logger`,
      suggestion: 'Attach a logger with startLog first.',
      context: { operation },
    });
  }
  return attachment;
}

/**
 * Attach a logger to a dataset and reset its step counter. A logger already
 * attached to a tracked value is detached without flushing.
 *
 * @param logger - Defaults to a new SimpleLogger
 */
export function startLog<T>(data: Tracked<T>, logger?: ChangeLogger, options?: StartLogOptions): Tracked<T>;
export function startLog<T>(data: T, logger?: ChangeLogger, options?: StartLogOptions): Tracked<T>;
export function startLog(
  data: unknown,
  logger: ChangeLogger = new SimpleLogger(),
  options: StartLogOptions = {}
): Tracked<unknown> {
  let value: unknown = data;
  if (data instanceof Tracked) {
    if (data.attachment) {
      data.attachment.open = false;
    }
    value = data.data;
  }

  return new Tracked(value, {
    logger,
    clock: options.clock ?? (() => new Date()),
    step: 0,
    open: true,
  });
}

/**
 * Flush the attached logger. With `stop: true` the logger is detached
 * afterwards and the returned value carries no logger.
 */
export function dumpLog<T>(tracked: Tracked<T>, options: DumpLogOptions = {}): Tracked<T> {
  const attachment = requireAttachment(tracked, 'dumpLog');
  const { stop } = parseOptions(dumpOptionsSchema, options, 'dumpLog');

  const { stop: _stop, ...flushOptions } = options;
  attachment.logger.flush(flushOptions);

  if (stop) {
    attachment.open = false;
    return new Tracked(tracked.data);
  }
  return tracked;
}

/**
 * Detach the logger without flushing it
 */
export function stopLog<T>(tracked: Tracked<T>): Tracked<T> {
  const attachment = requireAttachment(tracked, 'stopLog');
  attachment.open = false;
  return new Tracked(tracked.data);
}

/**
 * Logger currently attached to a tracked value
 */
export function getLog(tracked: Tracked<unknown>): ChangeLogger | undefined {
  return tracked.logger;
}
