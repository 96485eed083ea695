// ──────────────────────────────────────────
// Warehouse: fact table column contract
// ──────────────────────────────────────────

import type { Cell, Row, Table } from '../../shared/types';
import { ValidationError } from '../../shared/errors';

/** Columns of `fact_sales`, in load order. */
export const FACT_COLUMNS = [
  // Keys
  'geo_id', 'customer_geo_id', 'product_key',

  // Time
  'order_year', 'order_month', 'order_day',
  'day_name_str', 'order_day_type',

  // Logistics
  'type', 'days_for_shipping_real', 'days_for_shipment_scheduled',
  'shipping_delta', 'delivery_class', 'shipping_mode_clean',
  'order_status', 'customer_segment',

  // Financials
  'order_item_quantity', 'order_item_product_price',
  'order_item_discount_rate', 'order_item_profit_ratio',
  'gross_sales', 'discount_amount', 'net_revenue',
  'order_profit_amount', 'total_cost', 'actual_unit_cost',

  // Risk & strategy
  'is_profit_bleeder', 'markup_pct', 'margin_leakage_pct',
  'price_segment', 'trade_route',
  'state_order_count', 'state_density_class',
] as const;

/**
 * Projects `table` onto the fact contract. Every contract column must exist;
 * extra columns are dropped. NaN and ±Infinity have no decimal representation
 * and load as null.
 */
export function projectToContract(table: Table, columns: readonly string[] = FACT_COLUMNS): Row[] {
  const present = new Set(table.columns.map((c) => c.name));
  const missing = columns.filter((c) => !present.has(c));
  if (missing.length > 0) {
    throw new ValidationError(`Fact artifact is missing contract columns: ${missing.join(', ')}`);
  }

  return table.rows.map((row) => {
    const projected: Record<string, Cell> = {};
    for (const column of columns) {
      const value = row[column] ?? null;
      projected[column] = typeof value === 'number' && !Number.isFinite(value) ? null : value;
    }
    return projected;
  });
}
