// ──────────────────────────────────────────
// Modeling: final ordering + column naming
// ──────────────────────────────────────────

import { WriteError } from '../../shared/errors';
import type { Cell, Row, Table } from '../../shared/types';

export const SORT_COLUMNS = ['order_year', 'order_month', 'order_day', 'order_item_quantity'] as const;

/** Ascending, nulls first. */
export function compareCells(a: Cell, b: Cell): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

/** Stable sort, so ties keep their input order. */
export function sortFacts(table: Table, columns: readonly string[] = SORT_COLUMNS): Table {
  const rows = [...table.rows].sort((x, y) => {
    for (const column of columns) {
      const cmp = compareCells(x[column] ?? null, y[column] ?? null);
      if (cmp !== 0) return cmp;
    }
    return 0;
  });
  return { columns: table.columns, rows };
}

export function lowercaseColumns(table: Table): Table {
  const seen = new Set<string>();
  const columns = table.columns.map((c) => {
    const name = c.name.toLowerCase();
    if (seen.has(name)) {
      throw new WriteError(`Column ${c.name} collides with another column once lowercased`);
    }
    seen.add(name);
    return { name, type: c.type };
  });
  const rows: Row[] = table.rows.map((row) => {
    const next: Record<string, Cell> = {};
    for (const c of table.columns) next[c.name.toLowerCase()] = row[c.name] ?? null;
    return next;
  });
  return { columns, rows };
}

export function finalizeFacts(table: Table): Table {
  return lowercaseColumns(sortFacts(table));
}
