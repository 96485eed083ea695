import { describe, it, expect } from 'vitest';
import {
  createTable,
  dropColumns,
  numericResultType,
  requireColumn,
  tupleKey,
  withColumns,
} from '../table';
import { DerivationError } from '../errors';

const table = createTable(
  [
    { name: 'a', type: 'int' },
    { name: 'b', type: 'string' },
  ],
  [
    { a: 1, b: 'x' },
    { a: 2, b: null },
  ]
);

describe('withColumns', () => {
  it('appends new columns and keeps replaced ones in place', () => {
    const next = withColumns(
      table,
      [
        { name: 'a', type: 'float' },
        { name: 'c', type: 'bool' },
      ],
      (row) => ({ a: Number(row.a) * 1.5, c: row.b !== null })
    );

    expect(next.columns).toEqual([
      { name: 'a', type: 'float' },
      { name: 'b', type: 'string' },
      { name: 'c', type: 'bool' },
    ]);
    expect(next.rows).toEqual([
      { a: 1.5, b: 'x', c: true },
      { a: 3, b: null, c: false },
    ]);
  });

  it('leaves the input table untouched', () => {
    withColumns(table, [{ name: 'c', type: 'int' }], () => ({ c: 0 }));
    expect(table.columns).toHaveLength(2);
    expect(table.rows[0]).toEqual({ a: 1, b: 'x' });
  });
});

describe('dropColumns', () => {
  it('removes named columns from schema and rows, ignoring unknown names', () => {
    const next = dropColumns(table, ['b', 'missing']);
    expect(next.columns).toEqual([{ name: 'a', type: 'int' }]);
    expect(next.rows).toEqual([{ a: 1 }, { a: 2 }]);
  });
});

describe('requireColumn', () => {
  it('returns the column definition', () => {
    expect(requireColumn(table, 'a', ['int', 'float'])).toEqual({ name: 'a', type: 'int' });
  });

  it('throws a DerivationError for a missing column', () => {
    expect(() => requireColumn(table, 'z')).toThrow(DerivationError);
    expect(() => requireColumn(table, 'z')).toThrow('Missing required column: z');
  });

  it('throws a DerivationError for a wrong type', () => {
    expect(() => requireColumn(table, 'b', ['int', 'float'])).toThrow(
      'Column b has type string, expected int or float'
    );
  });
});

describe('numericResultType', () => {
  it('is int only when every input is int', () => {
    expect(numericResultType('int', 'int')).toBe('int');
    expect(numericResultType('int', 'float')).toBe('float');
  });
});

describe('tupleKey', () => {
  it('distinguishes null, empty string and the string "null"', () => {
    const keys = new Set([tupleKey([null]), tupleKey(['']), tupleKey(['null'])]);
    expect(keys.size).toBe(3);
  });

  it('distinguishes 1 from "1"', () => {
    expect(tupleKey([1])).not.toBe(tupleKey(['1']));
  });
});
