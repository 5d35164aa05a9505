import type { Table } from '@celltrace/core';
import { UsageError, toTable } from '@celltrace/core';

/**
 * Coerce a snapshot to a table or fail with a usage error
 */
export function requireTable(value: unknown, side: 'input' | 'output', subject: string): Table {
  const table = toTable(value);
  if (!table) {
    throw new UsageError({
      code: 'NOT_TABULAR',
      message: `${subject} needs tabular data, but the ${side} snapshot is ${Array.isArray(value) ? 'an array of non-record values' : typeof value}`,
      suggestion: 'Pass a column table ({ column: values[] }) or an array of flat records.',
      context: { side },
    });
  }
  return table;
}
