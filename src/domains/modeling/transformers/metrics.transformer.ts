// ──────────────────────────────────────────
// Modeling: financial + operational metric derivation
// ──────────────────────────────────────────
// Every field depends only on raw inputs or fields computed above it.
// Null operands yield null. Divisions by zero are left unguarded except for
// margin leakage, where NaN becomes 0.

import type { Cell, Table } from '../../../shared/types';
import { numberCell, numericResultType, requireColumn, withColumns } from '../../../shared/table';

export const RAW_NUMERIC_COLUMNS = {
  price: 'order_item_product_price',
  quantity: 'order_item_quantity',
  discountRate: 'order_item_discount_rate',
  profitRatio: 'order_item_profit_ratio',
  daysReal: 'days_for_shipping_real',
  daysScheduled: 'days_for_shipment_scheduled',
} as const;

const NUMERIC = ['int', 'float'] as const;

export interface DerivedMetrics {
  gross_sales: number | null;
  discount_amount: number | null;
  net_revenue: number | null;
  order_profit_amount: number | null;
  total_cost: number | null;
  actual_unit_cost: number | null;
  is_profit_bleeder: boolean | null;
  shipping_delta: number | null;
  markup_pct: number | null;
  margin_leakage_pct: number | null;
}

export interface MetricInputs {
  price: number | null;
  quantity: number | null;
  discountRate: number | null;
  profitRatio: number | null;
  daysReal: number | null;
  daysScheduled: number | null;
}

type Op = (a: number, b: number) => number;
const lift = (op: Op) => (a: number | null, b: number | null): number | null =>
  a === null || b === null ? null : op(a, b);

const mul = lift((a, b) => a * b);
const sub = lift((a, b) => a - b);
const add = lift((a, b) => a + b);
const div = lift((a, b) => a / b);

export function deriveMetrics(input: MetricInputs): DerivedMetrics {
  const gross_sales = mul(input.price, input.quantity);
  const discount_amount = mul(gross_sales, input.discountRate);
  const net_revenue = sub(gross_sales, discount_amount);
  const order_profit_amount = mul(net_revenue, input.profitRatio);
  const total_cost = sub(net_revenue, order_profit_amount);
  const actual_unit_cost = div(total_cost, input.quantity);
  const is_profit_bleeder = order_profit_amount === null ? null : order_profit_amount < 0;
  const shipping_delta = sub(input.daysReal, input.daysScheduled);
  const markup_pct = div(sub(input.price, actual_unit_cost), actual_unit_cost);
  const leakage = div(discount_amount, add(order_profit_amount, discount_amount));
  const margin_leakage_pct = leakage !== null && Number.isNaN(leakage) ? 0 : leakage;

  return {
    gross_sales,
    discount_amount,
    net_revenue,
    order_profit_amount,
    total_cost,
    actual_unit_cost,
    is_profit_bleeder,
    shipping_delta,
    markup_pct,
    margin_leakage_pct,
  };
}

export class MetricsTransformer {
  transform(table: Table): Table {
    const types = Object.fromEntries(
      Object.entries(RAW_NUMERIC_COLUMNS).map(([key, name]) => [key, requireColumn(table, name, NUMERIC).type])
    );

    return withColumns(
      table,
      [
        { name: 'gross_sales', type: 'float' },
        { name: 'discount_amount', type: 'float' },
        { name: 'net_revenue', type: 'float' },
        { name: 'order_profit_amount', type: 'float' },
        { name: 'total_cost', type: 'float' },
        { name: 'actual_unit_cost', type: 'float' },
        { name: 'is_profit_bleeder', type: 'bool' },
        { name: 'shipping_delta', type: numericResultType(types.daysReal, types.daysScheduled) },
        { name: 'markup_pct', type: 'float' },
        { name: 'margin_leakage_pct', type: 'float' },
      ],
      (row) => {
        const metrics = deriveMetrics({
          price: numberCell(row, RAW_NUMERIC_COLUMNS.price),
          quantity: numberCell(row, RAW_NUMERIC_COLUMNS.quantity),
          discountRate: numberCell(row, RAW_NUMERIC_COLUMNS.discountRate),
          profitRatio: numberCell(row, RAW_NUMERIC_COLUMNS.profitRatio),
          daysReal: numberCell(row, RAW_NUMERIC_COLUMNS.daysReal),
          daysScheduled: numberCell(row, RAW_NUMERIC_COLUMNS.daysScheduled),
        });
        const cells: Record<string, Cell> = { ...metrics };
        return cells;
      }
    );
  }
}
