/**
 * Zod schemas for validating logger and dump options
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { Cell, Table } from '../types/index.js';

/** Options shared by flush and dump */
export const flushOptionsSchema = z.object({
  file: z.string().min(1).optional(),
  append: z.boolean().default(false),
  delimiter: z.string().length(1).default(','),
});

/** Dump options: flush options plus detaching */
export const dumpOptionsSchema = flushOptionsSchema.extend({
  stop: z.boolean().default(false),
});

export const simpleLoggerOptionsSchema = z.object({
  verbose: z.boolean().default(true),
});

/** Columns of the cellwise log file besides the key column */
const CELLWISE_LOG_COLUMNS = ['step', 'column', 'old', 'new'];

export const cellwiseLoggerOptionsSchema = z.object({
  key: z
    .string()
    .min(1)
    .refine((key) => !CELLWISE_LOG_COLUMNS.includes(key), {
      message: `must not be one of ${CELLWISE_LOG_COLUMNS.join(', ')}`,
    }),
  ignore: z.array(z.string()).default([]),
  verbose: z.boolean().default(true),
});

export const filedumpLoggerOptionsSchema = z.object({
  dir: z.string().min(1).optional(),
  prefix: z.string().default('step'),
  verbose: z.boolean().default(true),
});

/** Named function evaluated on the table after every step */
export type Probe = (table: Table) => Cell;

const probeSchema = z.custom<Probe>((value) => typeof value === 'function', {
  message: 'Expected a function',
});

export const expressionLoggerOptionsSchema = z.object({
  probes: z
    .record(probeSchema)
    .refine((probes) => Object.keys(probes).length > 0, {
      message: 'At least one probe is required',
    }),
  verbose: z.boolean().default(true),
});

export type FlushOptionsInput = z.input<typeof flushOptionsSchema>;
export type FlushOptions = z.output<typeof flushOptionsSchema>;
export type DumpOptionsInput = z.input<typeof dumpOptionsSchema>;
export type SimpleLoggerOptions = z.input<typeof simpleLoggerOptionsSchema>;
export type CellwiseLoggerOptions = z.input<typeof cellwiseLoggerOptionsSchema>;
export type FiledumpLoggerOptions = z.input<typeof filedumpLoggerOptionsSchema>;
export type ExpressionLoggerOptions = z.input<typeof expressionLoggerOptionsSchema>;

/**
 * Parse options against a schema, turning validation failures into a
 * ConfigurationError. A required field that was not given at all is
 * reported as MISSING_OPTION.
 */
export function parseOptions<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  subject: string
): z.output<T> {
  const result = schema.safeParse(input ?? {});
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues;
  const missing = issues.filter(
    (issue) => issue.code === 'invalid_type' && issue.received === 'undefined'
  );
  const details = issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

  throw new ConfigurationError({
    code: missing.length > 0 ? 'MISSING_OPTION' : 'INVALID_OPTIONS',
    message: `Invalid options for ${subject}: ${details.join('; ')}`,
    suggestion:
      missing.length > 0
        ? `Provide ${missing.map((issue) => `'${issue.path.join('.')}'`).join(', ')}.`
        : 'Check the option types and values.',
    cause: result.error,
    context: { subject, issues: details },
  });
}
