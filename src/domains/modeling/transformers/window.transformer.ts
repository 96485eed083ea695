// ──────────────────────────────────────────
// Modeling: group-relative window metrics
// ──────────────────────────────────────────
// Two passes: aggregate per partition key, then broadcast back to each row.

import type { Cell, Row, Table } from '../../../shared/types';
import { numberCell, requireColumn, withColumns } from '../../../shared/table';

export type DensityClass = 'Strategic Hub' | 'Standard Zone' | 'Expansion Zone';

/** Sum of non-null values of `valueColumn` per distinct value of `keyColumn`. */
export function sumBy(rows: readonly Row[], keyColumn: string, valueColumn: string): Map<Cell, number> {
  const sums = new Map<Cell, number>();
  for (const row of rows) {
    const key = row[keyColumn] ?? null;
    const value = numberCell(row, valueColumn);
    sums.set(key, (sums.get(key) ?? 0) + (value ?? 0));
  }
  return sums;
}

/** Count of non-null `keyColumn` values per partition, so the null partition counts 0. */
export function countBy(rows: readonly Row[], keyColumn: string): Map<Cell, number> {
  const counts = new Map<Cell, number>();
  for (const row of rows) {
    const key = row[keyColumn] ?? null;
    counts.set(key, (counts.get(key) ?? 0) + (key === null ? 0 : 1));
  }
  return counts;
}

export function shareOf(value: number | null, total: number | undefined): number | null {
  if (value === null || total === undefined) return null;
  return value / total;
}

export function classifyDensity(stateOrderCount: number): DensityClass {
  if (stateOrderCount > 100) return 'Strategic Hub';
  if (stateOrderCount < 10) return 'Expansion Zone';
  return 'Standard Zone';
}

export class WindowTransformer {
  transform(table: Table): Table {
    requireColumn(table, 'gross_sales', ['int', 'float']);
    requireColumn(table, 'category_name');
    requireColumn(table, 'market');
    requireColumn(table, 'order_state');

    const categoryTotals = sumBy(table.rows, 'category_name', 'gross_sales');
    const marketTotals = sumBy(table.rows, 'market', 'gross_sales');
    const stateCounts = countBy(table.rows, 'order_state');

    return withColumns(
      table,
      [
        { name: 'category_share_pct', type: 'float' },
        { name: 'state_order_count', type: 'int' },
        { name: 'market_share_pct', type: 'float' },
        { name: 'state_density_class', type: 'string' },
      ],
      (row) => {
        const gross = numberCell(row, 'gross_sales');
        const stateOrderCount = stateCounts.get(row.order_state ?? null) ?? 0;
        return {
          category_share_pct: shareOf(gross, categoryTotals.get(row.category_name ?? null)),
          state_order_count: stateOrderCount,
          market_share_pct: shareOf(gross, marketTotals.get(row.market ?? null)),
          state_density_class: classifyDensity(stateOrderCount),
        };
      }
    );
  }
}
