import { describe, expect, it } from 'vitest';
import {
  columnNames,
  extractFieldNames,
  fromRecords,
  getColumn,
  isTable,
  rowCount,
  toRecords,
  toTable,
} from '../src/index.js';

describe('isTable', () => {
  it('accepts columns of equal length', () => {
    expect(isTable({ sl: [1, 2, 3], y: ['a', 'b', 'c'] })).toBe(true);
  });

  it('accepts a table without columns', () => {
    expect(isTable({})).toBe(true);
  });

  it('rejects ragged columns', () => {
    expect(isTable({ a: [1], b: [1, 2] })).toBe(false);
  });

  it('rejects non-array columns and non-scalar cells', () => {
    expect(isTable({ a: 1 })).toBe(false);
    expect(isTable({ a: [{ nested: true }] })).toBe(false);
  });

  it('rejects arrays and primitives', () => {
    expect(isTable([])).toBe(false);
    expect(isTable('table')).toBe(false);
    expect(isTable(null)).toBe(false);
  });
});

describe('record conversion', () => {
  it('builds columns in order of first appearance and fills gaps with null', () => {
    const table = fromRecords([{ id: 1, name: 'a' }, { id: 2, city: 'Graz' }]);

    expect(columnNames(table)).toEqual(['id', 'name', 'city']);
    expect(table).toEqual({
      id: [1, 2],
      name: ['a', null],
      city: [null, 'Graz'],
    });
  });

  it('converts a table back to records', () => {
    expect(toRecords({ a: [1, 2], b: ['x', 'y'] })).toEqual([
      { a: 1, b: 'x' },
      { a: 2, b: 'y' },
    ]);
  });

  it('lists field names across records', () => {
    expect(extractFieldNames([{ a: 1 }, { b: 2, a: 3 }])).toEqual(['a', 'b']);
  });
});

describe('toTable', () => {
  it('returns tables unchanged', () => {
    const table = { id: [1] };
    expect(toTable(table)).toBe(table);
  });

  it('converts arrays of flat records', () => {
    expect(toTable([{ id: 1, v: 'a' }])).toEqual({ id: [1], v: ['a'] });
  });

  it('returns undefined for anything else', () => {
    expect(toTable('abc')).toBeUndefined();
    expect(toTable([1, 2])).toBeUndefined();
    expect(toTable([{ a: { nested: 1 } }])).toBeUndefined();
  });
});

describe('table helpers', () => {
  it('counts rows', () => {
    expect(rowCount({})).toBe(0);
    expect(rowCount({ a: [1, 2, 3] })).toBe(3);
  });

  it('ignores inherited properties when looking up columns', () => {
    expect(getColumn({ a: [1] }, 'constructor')).toBeUndefined();
    expect(getColumn({ a: [1] }, 'a')).toEqual([1]);
  });
});
