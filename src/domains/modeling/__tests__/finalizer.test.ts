import { describe, it, expect } from 'vitest';
import { compareCells, finalizeFacts, lowercaseColumns, sortFacts } from '../finalizer';
import { WriteError } from '../../../shared/errors';
import { createTable } from '../../../shared/table';

const columns = [
  { name: 'order_year', type: 'int' },
  { name: 'order_month', type: 'int' },
  { name: 'order_day', type: 'int' },
  { name: 'order_item_quantity', type: 'int' },
  { name: 'Tag', type: 'string' },
] as const;

describe('compareCells', () => {
  it('orders nulls first, numbers numerically, strings by code unit', () => {
    expect(compareCells(null, 1)).toBeLessThan(0);
    expect(compareCells(1, null)).toBeGreaterThan(0);
    expect(compareCells(9, 10)).toBeLessThan(0);
    expect(compareCells('B', 'a')).toBeLessThan(0);
    expect(compareCells(null, null)).toBe(0);
  });
});

describe('sortFacts', () => {
  it('sorts by year, month, day, quantity and keeps ties stable', () => {
    const table = createTable(columns, [
      { order_year: 2017, order_month: 2, order_day: 1, order_item_quantity: 1, Tag: 'c' },
      { order_year: 2016, order_month: 12, order_day: 31, order_item_quantity: 5, Tag: 'a' },
      { order_year: 2017, order_month: 1, order_day: 9, order_item_quantity: 3, Tag: 'b1' },
      { order_year: 2017, order_month: 1, order_day: 9, order_item_quantity: 3, Tag: 'b2' },
      { order_year: 2017, order_month: 1, order_day: 9, order_item_quantity: null, Tag: 'b0' },
    ]);

    expect(sortFacts(table).rows.map((r) => r.Tag)).toEqual(['a', 'b0', 'b1', 'b2', 'c']);
  });
});

describe('lowercaseColumns', () => {
  it('renames columns and row keys', () => {
    const result = lowercaseColumns(createTable([{ name: 'Geo_ID', type: 'int' }], [{ Geo_ID: 7 }]));
    expect(result.columns).toEqual([{ name: 'geo_id', type: 'int' }]);
    expect(result.rows).toEqual([{ geo_id: 7 }]);
  });

  it('rejects names that collide once lowercased', () => {
    const table = createTable(
      [
        { name: 'Market', type: 'string' },
        { name: 'market', type: 'string' },
      ],
      []
    );
    expect(() => lowercaseColumns(table)).toThrow(WriteError);
  });
});

describe('finalizeFacts', () => {
  it('sorts then lowercases', () => {
    const table = createTable(columns, [
      { order_year: 2018, order_month: 1, order_day: 1, order_item_quantity: 1, Tag: 'late' },
      { order_year: 2015, order_month: 1, order_day: 1, order_item_quantity: 1, Tag: 'early' },
    ]);
    const result = finalizeFacts(table);
    expect(result.columns.map((c) => c.name)).toEqual([
      'order_year',
      'order_month',
      'order_day',
      'order_item_quantity',
      'tag',
    ]);
    expect(result.rows.map((r) => r.tag)).toEqual(['early', 'late']);
  });
});
