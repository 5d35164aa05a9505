/**
 * Source text for pipeline steps
 */

type AnyFunction = (...args: never[]) => unknown;

/**
 * Source of a transformation as written at the call site, with whitespace
 * runs collapsed so multi-line functions fit on one log line.
 */
export function describeFunction(fn: AnyFunction): string {
  return fn.toString().replace(/\s+/g, ' ').trim();
}

function describeArgument(arg: unknown): string {
  if (typeof arg === 'function') return arg.name || 'function';
  if (typeof arg === 'bigint') return `${arg}n`;
  if (arg === undefined) return 'undefined';
  if (arg instanceof Date) return JSON.stringify(arg.toISOString());

  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    // circular structures, nested bigints
    return String(arg);
  }
}

/**
 * Render a call-style step as `name(., arg1, arg2)`, where `.` stands for
 * the piped value.
 */
export function describeCall(fn: AnyFunction, args: readonly unknown[]): string {
  const name = fn.name || 'anonymous';
  return `${name}(${['.', ...args.map(describeArgument)].join(', ')})`;
}
