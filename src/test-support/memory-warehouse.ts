// ──────────────────────────────────────────
// Test support: in-memory warehouse
// ──────────────────────────────────────────

import type { WarehouseContract } from '../shared/contracts';
import type { Row } from '../shared/types';

export class MemoryWarehouse implements WarehouseContract {
  facts: Row[] = [];
  dimensions = new Map<string, Row[]>();
  failingTables = new Set<string>();

  async appendFacts(rows: readonly Row[]): Promise<number> {
    this.facts.push(...rows);
    return rows.length;
  }

  async appendDimension(table: string, rows: readonly Row[]): Promise<number> {
    if (this.failingTables.has(table)) {
      throw new Error(`relation "${table}" does not exist`);
    }
    this.dimensions.set(table, [...(this.dimensions.get(table) ?? []), ...rows]);
    return rows.length;
  }
}
