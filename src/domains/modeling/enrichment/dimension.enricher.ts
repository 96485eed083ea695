// ──────────────────────────────────────────
// Modeling: star-schema enrichment (left-outer joins)
// ──────────────────────────────────────────

import { EnrichmentError } from '../../../shared/errors';
import type { Cell, ColumnDef, DimensionSet, DimensionSpec, Row, Table } from '../../../shared/types';
import { dropColumns, findColumn, tupleKey } from '../../../shared/table';

export const DIMENSION_SPECS: readonly DimensionSpec[] = [
  { name: 'geo', keys: ['order_state', 'order_country', 'order_region', 'market'] },
  { name: 'customerGeo', keys: ['customer_state', 'customer_country'] },
  { name: 'product', keys: ['product_name', 'category_name', 'department_name'] },
];

const COLLISION_SUFFIX = '_right';

/** Null key parts never match, so such rows are left unmatched. */
function joinKey(row: Row, keys: readonly string[]): string | null {
  const cells: Cell[] = keys.map((k) => row[k] ?? null);
  return cells.some((c) => c === null) ? null : tupleKey(cells);
}

export function indexDimension(dimension: Table, definition: DimensionSpec): Map<string, Row> {
  for (const key of definition.keys) {
    if (!findColumn(dimension, key)) {
      throw new EnrichmentError(`Dimension ${definition.name} is missing key column ${key}`);
    }
  }
  const index = new Map<string, Row>();
  for (const row of dimension.rows) {
    const key = joinKey(row, definition.keys);
    if (key === null) continue;
    if (index.has(key)) {
      throw new EnrichmentError(`Dimension ${definition.name} has duplicate natural key ${key}`);
    }
    index.set(key, row);
  }
  return index;
}

/**
 * Left-outer join of `facts` with `dimension` on `definition.keys`, followed by
 * dropping those keys. Unmatched rows keep null dimension attributes.
 */
export function leftJoinDimension(facts: Table, dimension: Table, definition: DimensionSpec): Table {
  for (const key of definition.keys) {
    if (!findColumn(facts, key)) {
      throw new EnrichmentError(`Fact table is missing join column ${key} for ${definition.name}`);
    }
  }
  const index = indexDimension(dimension, definition);
  const keySet = new Set(definition.keys);
  const factNames = new Set(facts.columns.map((c) => c.name));

  const attached: { source: string; target: ColumnDef }[] = dimension.columns
    .filter((c) => !keySet.has(c.name))
    .map((c) => ({
      source: c.name,
      target: { name: factNames.has(c.name) ? `${c.name}${COLLISION_SUFFIX}` : c.name, type: c.type },
    }));

  const rows: Row[] = facts.rows.map((row) => {
    const key = joinKey(row, definition.keys);
    const match = key === null ? undefined : index.get(key);
    const next: Record<string, Cell> = { ...row };
    for (const { source, target } of attached) {
      next[target.name] = match ? match[source] ?? null : null;
    }
    return next;
  });

  const joined: Table = { columns: [...facts.columns, ...attached.map((a) => a.target)], rows };
  return dropColumns(joined, definition.keys);
}

export class DimensionEnricher {
  enrich(facts: Table, dimensions: DimensionSet): Table {
    const before = facts.rows.length;
    const enriched = DIMENSION_SPECS.reduce(
      (table, definition) => leftJoinDimension(table, dimensions[definition.name], definition),
      facts
    );
    if (enriched.rows.length !== before) {
      throw new EnrichmentError(`Row count changed during enrichment: ${before} -> ${enriched.rows.length}`);
    }
    return enriched;
  }
}
