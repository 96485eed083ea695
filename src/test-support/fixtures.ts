// ──────────────────────────────────────────
// Test support: Bronze rows, dimensions, temp dirs
// ──────────────────────────────────────────

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import iconv from 'iconv-lite';
import type { Cell, ColumnDef, DimensionSet, Logger, Row, Table } from '../shared/types';
import type { DimensionPaths } from '../shared/config';
import { createTable } from '../shared/table';
import { writeParquetTable } from '../domains/silver/parquet.writer';

export const BRONZE_COLUMNS: readonly ColumnDef[] = [
  { name: 'type', type: 'string' },
  { name: 'days_for_shipping_real', type: 'int' },
  { name: 'days_for_shipment_scheduled', type: 'int' },
  { name: 'shipping_mode', type: 'string' },
  { name: 'order_status', type: 'string' },
  { name: 'customer_segment', type: 'string' },
  { name: 'customer_country', type: 'string' },
  { name: 'customer_state', type: 'string' },
  { name: 'order_country', type: 'string' },
  { name: 'order_state', type: 'string' },
  { name: 'order_region', type: 'string' },
  { name: 'market', type: 'string' },
  { name: 'product_name', type: 'string' },
  { name: 'category_name', type: 'string' },
  { name: 'department_name', type: 'string' },
  { name: 'order_item_quantity', type: 'int' },
  { name: 'order_item_product_price', type: 'float' },
  { name: 'order_item_discount_rate', type: 'float' },
  { name: 'order_item_profit_ratio', type: 'float' },
  { name: 'order_year', type: 'int' },
  { name: 'order_month', type: 'int' },
  { name: 'order_day', type: 'int' },
  { name: 'order_dayofweek', type: 'string' },
];

/**
 * 2017-03-04 (a Saturday), 2 × 100.0 at 10% discount and 25% profit ratio,
 * shipped in 3 days against 2 scheduled.
 */
export const BASE_ROW: Row = {
  type: 'DEBIT',
  days_for_shipping_real: 3,
  days_for_shipment_scheduled: 2,
  shipping_mode: 'Second Class',
  order_status: 'COMPLETE',
  customer_segment: 'Consumer',
  customer_country: 'EE. UU.',
  customer_state: 'CA',
  order_country: 'Estados Unidos',
  order_state: 'California',
  order_region: 'West of USA',
  market: 'USCA',
  product_name: 'Pelican Kayak',
  category_name: 'Water Sports',
  department_name: 'Fan Shop',
  order_item_quantity: 2,
  order_item_product_price: 100.5,
  order_item_discount_rate: 0.1,
  order_item_profit_ratio: 0.25,
  order_year: 2017,
  order_month: 3,
  order_day: 4,
  order_dayofweek: 'Saturday',
};

export function bronzeRow(overrides: Record<string, Cell> = {}): Row {
  return { ...BASE_ROW, ...overrides };
}

export function bronzeTable(rows: readonly Row[], columns: readonly ColumnDef[] = BRONZE_COLUMNS): Table {
  return createTable(columns, rows);
}

function csvField(value: Cell): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function bronzeCsv(rows: readonly Row[], columns: readonly ColumnDef[] = BRONZE_COLUMNS): string {
  const names = columns.map((c) => c.name);
  const lines = [names.join(',')];
  for (const row of rows) lines.push(names.map((n) => csvField(row[n] ?? null)).join(','));
  return lines.join('\n') + '\n';
}

export async function writeBronzeFile(filePath: string, rows: readonly Row[]): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, iconv.encode(bronzeCsv(rows), 'windows-1252'));
}

/** Dimensions covering BASE_ROW: geo 10, customer geo 20, product 30. */
export function dimensionSet(): DimensionSet {
  return {
    geo: createTable(
      [
        { name: 'geo_id', type: 'int' },
        { name: 'order_country', type: 'string' },
        { name: 'order_state', type: 'string' },
        { name: 'order_region', type: 'string' },
        { name: 'market', type: 'string' },
      ],
      [
        { geo_id: 10, order_country: 'Estados Unidos', order_state: 'California', order_region: 'West of USA', market: 'USCA' },
        { geo_id: 11, order_country: 'Francia', order_state: 'Bretaña', order_region: 'Western Europe', market: 'Europe' },
      ]
    ),
    customerGeo: createTable(
      [
        { name: 'customer_geo_id', type: 'int' },
        { name: 'customer_country', type: 'string' },
        { name: 'customer_state', type: 'string' },
      ],
      [{ customer_geo_id: 20, customer_country: 'EE. UU.', customer_state: 'CA' }]
    ),
    product: createTable(
      [
        { name: 'product_key', type: 'int' },
        { name: 'product_name', type: 'string' },
        { name: 'category_name', type: 'string' },
        { name: 'department_name', type: 'string' },
      ],
      [{ product_key: 30, product_name: 'Pelican Kayak', category_name: 'Water Sports', department_name: 'Fan Shop' }]
    ),
  };
}

/** Writes `dimensionSet()` as the three Parquet artifacts under `dir`. */
export async function writeDimensionFiles(dir: string): Promise<DimensionPaths> {
  const dims = dimensionSet();
  const paths: DimensionPaths = {
    geo: path.join(dir, 'dim_geo.parquet'),
    customerGeo: path.join(dir, 'dim_customer_geo.parquet'),
    product: path.join(dir, 'dim_product.parquet'),
  };
  await writeParquetTable(dims.geo, paths.geo);
  await writeParquetTable(dims.customerGeo, paths.customerGeo);
  await writeParquetTable(dims.product, paths.product);
  return paths;
}

export async function makeTempDir(prefix = 'silver-forge-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export interface CapturedLogger extends Logger {
  lines: string[];
}

export function captureLogger(): CapturedLogger {
  const lines: string[] = [];
  const push = (...args: unknown[]) => {
    lines.push(args.map(String).join(' '));
  };
  return { lines, log: push, warn: push, error: push };
}
