// ──────────────────────────────────────────
// Modeling: date validation, dedup, column pruning
// ──────────────────────────────────────────

import { format, isValid, parse } from 'date-fns';
import type { Cell, Row, Table, ValidationStats } from '../../shared/types';
import { dropColumns, filterRows, tupleKey, withColumns } from '../../shared/table';

export const DATE_CHECK_COLUMN = 'valid_date_check';
export const PRUNED_COLUMNS = ['order_dayofweek', DATE_CHECK_COLUMN, 'shipping_mode'] as const;

const PARTS_FORMAT = 'yyyy-M-d';
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Rebuilds a calendar date from year/month/day cells. Anything that does not
 * name a real day (month 13, day 32, Feb 29 outside leap years, fractional or
 * missing parts) gives null instead of throwing.
 */
export function orderDateFromParts(year: Cell, month: Cell, day: Cell): Date | null {
  if (year === null || month === null || day === null) return null;
  const text = `${String(year)}-${String(month)}-${String(day)}`;
  const date = parse(text, PARTS_FORMAT, REFERENCE_DATE);
  return isValid(date) ? date : null;
}

export function orderDateOf(row: Row): Date | null {
  return orderDateFromParts(row.order_year ?? null, row.order_month ?? null, row.order_day ?? null);
}

export function filterValidDates(table: Table): { table: Table; dropped: number } {
  const checked = withColumns(table, [{ name: DATE_CHECK_COLUMN, type: 'string' }], (row) => {
    const date = orderDateOf(row);
    return { [DATE_CHECK_COLUMN]: date ? format(date, 'yyyy-MM-dd') : null };
  });
  const valid = filterRows(checked, (row) => row[DATE_CHECK_COLUMN] !== null);
  return { table: valid, dropped: table.rows.length - valid.rows.length };
}

/** Keeps the first occurrence of every fully identical row, in input order. */
export function dedupe(table: Table): { table: Table; dropped: number } {
  const names = table.columns.map((c) => c.name);
  const seen = new Set<string>();
  const unique = filterRows(table, (row) => {
    const key = tupleKey(names.map((n) => row[n] ?? null));
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
  return { table: unique, dropped: table.rows.length - unique.rows.length };
}

export function pruneColumns(table: Table): Table {
  return dropColumns(table, PRUNED_COLUMNS);
}

export function validateAndDedupe(table: Table): { table: Table; stats: ValidationStats } {
  const dated = filterValidDates(table);
  const unique = dedupe(dated.table);
  return {
    table: pruneColumns(unique.table),
    stats: {
      inputRows: table.rows.length,
      invalidDateRows: dated.dropped,
      duplicateRows: unique.dropped,
    },
  };
}
