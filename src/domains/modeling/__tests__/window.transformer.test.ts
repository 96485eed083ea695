import { describe, it, expect } from 'vitest';
import { WindowTransformer, classifyDensity, countBy, sumBy } from '../transformers/window.transformer';
import { createTable } from '../../../shared/table';
import type { Row } from '../../../shared/types';

const columns = [
  { name: 'category_name', type: 'string' },
  { name: 'market', type: 'string' },
  { name: 'order_state', type: 'string' },
  { name: 'gross_sales', type: 'float' },
] as const;

const rows: Row[] = [
  { category_name: 'Fishing', market: 'USCA', order_state: 'California', gross_sales: 30 },
  { category_name: 'Fishing', market: 'Europe', order_state: 'California', gross_sales: 10 },
  { category_name: 'Cleats', market: 'USCA', order_state: 'Jalisco', gross_sales: 60 },
  { category_name: 'Cleats', market: 'Europe', order_state: null, gross_sales: 40 },
];

describe('sumBy / countBy', () => {
  it('aggregates per partition, including the null partition', () => {
    expect(sumBy(rows, 'market', 'gross_sales')).toEqual(
      new Map([
        ['USCA', 90],
        ['Europe', 50],
      ])
    );
    expect(countBy(rows, 'order_state')).toEqual(
      new Map<string | null, number>([
        ['California', 2],
        ['Jalisco', 1],
        [null, 0],
      ])
    );
  });
});

describe('classifyDensity', () => {
  it('uses strict bounds at 100 and 10', () => {
    expect(classifyDensity(101)).toBe('Strategic Hub');
    expect(classifyDensity(100)).toBe('Standard Zone');
    expect(classifyDensity(10)).toBe('Standard Zone');
    expect(classifyDensity(9)).toBe('Expansion Zone');
    expect(classifyDensity(0)).toBe('Expansion Zone');
  });
});

describe('WindowTransformer', () => {
  const result = new WindowTransformer().transform(createTable(columns, rows));

  it('broadcasts partition shares and counts back to each row', () => {
    expect(result.rows.map((r) => r.category_share_pct)).toEqual([0.75, 0.25, 0.6, 0.4]);
    expect(result.rows.map((r) => r.market_share_pct)).toEqual([30 / 90, 10 / 50, 60 / 90, 40 / 50]);
    expect(result.rows.map((r) => r.state_order_count)).toEqual([2, 2, 1, 0]);
    expect(result.rows.map((r) => r.state_density_class)).toEqual([
      'Expansion Zone',
      'Expansion Zone',
      'Expansion Zone',
      'Expansion Zone',
    ]);
  });

  it('makes shares sum to one within each partition', () => {
    for (const [keyColumn, shareColumn] of [
      ['category_name', 'category_share_pct'],
      ['market', 'market_share_pct'],
    ]) {
      const totals = new Map<unknown, number>();
      for (const row of result.rows) {
        const share = row[shareColumn];
        totals.set(row[keyColumn], (totals.get(row[keyColumn]) ?? 0) + (typeof share === 'number' ? share : 0));
      }
      for (const total of totals.values()) {
        expect(total).toBeCloseTo(1, 9);
      }
    }
  });

  it('counts a state with more than 100 orders as a hub', () => {
    const many: Row[] = Array.from({ length: 101 }, (_, i) => ({
      category_name: 'Fishing',
      market: 'USCA',
      order_state: 'Texas',
      gross_sales: i + 1,
    }));
    const hub = new WindowTransformer().transform(createTable(columns, many));
    expect(hub.rows[0].state_order_count).toBe(101);
    expect(hub.rows[0].state_density_class).toBe('Strategic Hub');
  });

  it('keeps null gross sales out of the share', () => {
    const withNull = new WindowTransformer().transform(
      createTable(columns, [...rows, { category_name: 'Fishing', market: 'USCA', order_state: 'Texas', gross_sales: null }])
    );
    expect(withNull.rows[0].category_share_pct).toBe(0.75);
    expect(withNull.rows[4].category_share_pct).toBeNull();
  });
});
