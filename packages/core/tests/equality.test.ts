import { describe, expect, it } from 'vitest';
import { cellsEqual, deepEqual, isMissing } from '../src/index.js';

describe('cellsEqual', () => {
  it('treats all missing values as equal', () => {
    expect(isMissing(Number.NaN)).toBe(true);
    expect(cellsEqual(null, undefined)).toBe(true);
    expect(cellsEqual(Number.NaN, null)).toBe(true);
  });

  it('never matches a missing value with a present one', () => {
    expect(cellsEqual(1, null)).toBe(false);
    expect(cellsEqual(undefined, '')).toBe(false);
  });

  it('compares dates by time', () => {
    expect(cellsEqual(new Date('2024-05-01T00:00:00Z'), new Date('2024-05-01T00:00:00Z'))).toBe(true);
    expect(cellsEqual(new Date('2024-05-01T00:00:00Z'), new Date('2024-05-02T00:00:00Z'))).toBe(false);
  });

  it('does not coerce between types', () => {
    expect(cellsEqual('1', 1)).toBe(false);
    expect(cellsEqual(1, 1)).toBe(true);
  });
});

describe('deepEqual', () => {
  const table = () => ({ sl: [1, 2, 3], x: [1, 2, 3], y: ['a', 'b', 'c'] });

  it('matches identical tables', () => {
    expect(deepEqual(table(), table())).toBe(true);
  });

  it('detects a single changed cell', () => {
    const changed = table();
    changed.x[0] = 2;
    expect(deepEqual(table(), changed)).toBe(false);
  });

  it('counts reordered columns as a change', () => {
    const { sl, x, y } = table();
    expect(deepEqual(table(), { sl, y, x })).toBe(false);
  });

  it('counts reordered rows as a change', () => {
    expect(deepEqual([1, 2, 3], [3, 2, 1])).toBe(false);
  });

  it('detects added columns', () => {
    expect(deepEqual(table(), { ...table(), z: [0, 0, 0] })).toBe(false);
  });

  it('handles NaN, dates, maps and sets', () => {
    expect(deepEqual([Number.NaN], [Number.NaN])).toBe(true);
    expect(deepEqual(new Date(0), new Date(0))).toBe(true);
    expect(deepEqual(new Map([['a', 1]]), new Map([['a', 1]]))).toBe(true);
    expect(deepEqual(new Set([1, 2]), new Set([2, 1]))).toBe(false);
  });

  it('distinguishes arrays from objects and scalars of different type', () => {
    expect(deepEqual([], {})).toBe(false);
    expect(deepEqual(1, '1')).toBe(false);
    expect(deepEqual(null, {})).toBe(false);
  });

  it('compares self-referencing structures without recursing forever', () => {
    interface Node {
      a: number;
      self?: Node;
    }
    const first: Node = { a: 1 };
    first.self = first;
    const second: Node = { a: 1 };
    second.self = second;
    const third: Node = { a: 2 };
    third.self = third;

    expect(deepEqual(first, second)).toBe(true);
    expect(deepEqual(first, third)).toBe(false);
  });
});
