// ──────────────────────────────────────────
// Warehouse: Knex repository (append-only)
// ──────────────────────────────────────────

import type { Knex } from 'knex';
import type { WarehouseContract } from '../../shared/contracts';
import type { Row } from '../../shared/types';

export const LOAD_CHUNK_SIZE = 10_000;

export class KnexWarehouseRepo implements WarehouseContract {
  constructor(
    private db: Knex,
    private factTable = 'fact_sales'
  ) {}

  async appendFacts(rows: readonly Row[]): Promise<number> {
    return this.append(this.factTable, rows);
  }

  async appendDimension(table: string, rows: readonly Row[]): Promise<number> {
    return this.append(table, rows);
  }

  private async append(table: string, rows: readonly Row[]): Promise<number> {
    if (rows.length === 0) return 0;
    // batchInsert wraps all chunks in one transaction
    await this.db.batchInsert(table, [...rows], LOAD_CHUNK_SIZE);
    return rows.length;
  }
}
