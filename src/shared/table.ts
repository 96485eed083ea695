// ──────────────────────────────────────────
// In-memory table helpers
// ──────────────────────────────────────────

import type { Cell, ColumnDef, ColumnType, Row, Table } from './types';
import { DerivationError } from './errors';

export function createTable(columns: readonly ColumnDef[], rows: readonly Row[]): Table {
  return { columns, rows };
}

export function findColumn(table: Table, name: string): ColumnDef | undefined {
  return table.columns.find((c) => c.name === name);
}

export function requireColumn(table: Table, name: string, types?: readonly ColumnType[]): ColumnDef {
  const column = findColumn(table, name);
  if (!column) {
    throw new DerivationError(`Missing required column: ${name}`);
  }
  if (types && !types.includes(column.type)) {
    throw new DerivationError(
      `Column ${name} has type ${column.type}, expected ${types.join(' or ')}`
    );
  }
  return column;
}

/**
 * Adds (or replaces) columns, computing their values from each row.
 * Replaced columns keep their position; new ones are appended.
 */
export function withColumns(
  table: Table,
  defs: readonly ColumnDef[],
  compute: (row: Row) => Record<string, Cell>
): Table {
  const columns = [...table.columns];
  for (const def of defs) {
    const idx = columns.findIndex((c) => c.name === def.name);
    if (idx >= 0) columns[idx] = def;
    else columns.push(def);
  }
  const rows = table.rows.map((row) => ({ ...row, ...compute(row) }));
  return { columns, rows };
}

export function dropColumns(table: Table, names: readonly string[]): Table {
  const drop = new Set(names);
  const columns = table.columns.filter((c) => !drop.has(c.name));
  const rows = table.rows.map((row) => {
    const next: Record<string, Cell> = {};
    for (const c of columns) next[c.name] = row[c.name] ?? null;
    return next;
  });
  return { columns, rows };
}

export function filterRows(table: Table, predicate: (row: Row) => boolean): Table {
  return { columns: table.columns, rows: table.rows.filter(predicate) };
}

export function numberCell(row: Row, name: string): number | null {
  const value = row[name];
  return typeof value === 'number' ? value : null;
}

export function stringCell(row: Row, name: string): string | null {
  const value = row[name];
  return typeof value === 'string' ? value : null;
}

/** Int when every input is int, float otherwise. */
export function numericResultType(...types: ColumnType[]): ColumnType {
  return types.every((t) => t === 'int') ? 'int' : 'float';
}

/** Stable key for a tuple of cells, used for grouping, joins and dedup. */
export function tupleKey(cells: readonly Cell[]): string {
  return JSON.stringify(cells);
}
