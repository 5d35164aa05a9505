/**
 * Equality primitives used to decide whether a step changed anything
 */

import type { Cell } from '../types/index.js';
import { isPlainObject } from './records.js';

/**
 * A cell is missing when it is null, undefined or NaN
 */
export function isMissing(cell: unknown): boolean {
  return cell === null || cell === undefined || (typeof cell === 'number' && Number.isNaN(cell));
}

/**
 * Compare two cells. Missing equals missing, and a missing cell never
 * equals a present one.
 */
export function cellsEqual(a: Cell, b: Cell): boolean {
  const aMissing = isMissing(a);
  const bMissing = isMissing(b);
  if (aMissing || bMissing) return aMissing && bMissing;

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }

  return a === b;
}

/**
 * Structural equality. Order matters for arrays, object keys, map and set
 * entries, so reordering rows or columns makes two values unequal.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  return compare(a, b, new WeakMap());
}

/**
 * `seen` maps each object under comparison to its counterpart, so a cycle
 * revisiting the same pair is treated as equal.
 */
function compare(a: unknown, b: unknown, seen: WeakMap<object, object>): boolean {
  if (a === b) return true;

  if (typeof a === 'number' && typeof b === 'number') {
    return Number.isNaN(a) && Number.isNaN(b);
  }

  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }

  if (seen.get(a) === b) return true;
  seen.set(a, b);

  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item, i) => compare(item, b[i], seen));
  }

  if (a instanceof Map || b instanceof Map) {
    return a instanceof Map && b instanceof Map && compare([...a.entries()], [...b.entries()], seen);
  }

  if (a instanceof Set || b instanceof Set) {
    return a instanceof Set && b instanceof Set && compare([...a.values()], [...b.values()], seen);
  }

  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) {
    return false;
  }

  // Plain objects and class instances: own enumerable keys in order
  const aRecord: Record<string, unknown> = isPlainObject(a) ? a : { ...a };
  const bRecord: Record<string, unknown> = isPlainObject(b) ? b : { ...b };
  const aKeys = Object.keys(aRecord);
  const bKeys = Object.keys(bRecord);
  if (!compare(aKeys, bKeys, seen)) return false;

  return aKeys.every((key) => compare(aRecord[key], bRecord[key], seen));
}
