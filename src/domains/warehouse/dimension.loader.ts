// ──────────────────────────────────────────
// Warehouse: dimension table load
// ──────────────────────────────────────────

import type { WarehouseContract } from '../../shared/contracts';
import { errorMessage } from '../../shared/errors';
import type { DimensionName, Logger } from '../../shared/types';
import type { DimensionPaths } from '../../shared/config';
import { readParquetTable } from '../silver/parquet.reader';

export const DIMENSION_TABLES: Record<DimensionName, string> = {
  geo: 'dim_geo',
  customerGeo: 'dim_customer_geo',
  product: 'dim_product',
};

const LOAD_ORDER: readonly DimensionName[] = ['geo', 'customerGeo', 'product'];

export interface DimensionLoadOutcome {
  table: string;
  rows: number;
  error: string | null;
}

export class DimensionLoader {
  constructor(
    private paths: DimensionPaths,
    private warehouse: WarehouseContract,
    private logger: Logger = console
  ) {}

  /** Loads each dimension independently; one failing table does not stop the others. */
  async run(): Promise<DimensionLoadOutcome[]> {
    const outcomes: DimensionLoadOutcome[] = [];
    for (const name of LOAD_ORDER) {
      const table = DIMENSION_TABLES[name];
      this.logger.log(`[DimensionLoader] Loading dimension table: ${table}`);
      try {
        const data = await readParquetTable(this.paths[name]);
        this.logger.log(`[DimensionLoader] Read ${data.rows.length} rows.`);
        const rows = await this.warehouse.appendDimension(table, data.rows);
        this.logger.log(`[DimensionLoader] Loaded ${table} successfully.`);
        outcomes.push({ table, rows, error: null });
      } catch (err) {
        const message = errorMessage(err);
        this.logger.error(`[DimensionLoader] Error loading ${table}: ${message}. Skipping this dimension.`);
        outcomes.push({ table, rows: 0, error: message });
      }
    }
    return outcomes;
  }
}
