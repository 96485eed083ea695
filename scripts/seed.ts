// ──────────────────────────────────────────
// Script: seed synthetic Bronze CSV drops and the three
// dimension artifacts they join against
// ──────────────────────────────────────────
// Usage: tsx scripts/seed.ts [--files=3] [--rows=250]

import dotenv from 'dotenv';
dotenv.config();

import fs from 'fs/promises';
import path from 'path';
import iconv from 'iconv-lite';
import { faker } from '@faker-js/faker';
import { loadConfig } from '../src/shared/config';
import { createTable } from '../src/shared/table';
import type { Cell, Row } from '../src/shared/types';
import { writeParquetTable } from '../src/domains/silver/parquet.writer';

const GEOS = [
  { order_country: 'Estados Unidos', order_state: 'California', order_region: 'West of USA', market: 'USCA' },
  { order_country: 'Estados Unidos', order_state: 'Nueva York', order_region: 'East of USA', market: 'USCA' },
  { order_country: 'México', order_state: 'Jalisco', order_region: 'Central America', market: 'LATAM' },
  { order_country: 'Francia', order_state: 'Île-de-France', order_region: 'Western Europe', market: 'Europe' },
  { order_country: 'Alemania', order_state: 'Baviera', order_region: 'Western Europe', market: 'Europe' },
  { order_country: 'Australia', order_state: 'Queensland', order_region: 'Oceania', market: 'Pacific Asia' },
];

const CUSTOMER_GEOS = [
  { customer_country: 'EE. UU.', customer_state: 'CA' },
  { customer_country: 'EE. UU.', customer_state: 'NY' },
  { customer_country: 'EE. UU.', customer_state: 'TX' },
  { customer_country: 'Puerto Rico', customer_state: 'PR' },
];

const PRODUCTS = [
  { product_name: 'Field & Stream Sportsman 16 Gun Fire Safe', category_name: 'Fishing', department_name: 'Fan Shop', price: 399.98 },
  { product_name: 'Perfect Fitness Perfect Rip Deck', category_name: 'Cleats', department_name: 'Apparel', price: 59.99 },
  { product_name: "Nike Men's Dri-FIT Victory Golf Polo", category_name: "Men's Footwear", department_name: 'Apparel', price: 50 },
  { product_name: "O'Brien Men's Neoprene Life Vest", category_name: 'Indoor/Outdoor Games', department_name: 'Fan Shop', price: 49.98 },
  { product_name: 'Pelican Sunstream 100 Kayak', category_name: 'Water Sports', department_name: 'Fan Shop', price: 199.99 },
  { product_name: 'Diamondback Womens Serene Classic Comfort Bi', category_name: 'Camping & Hiking', department_name: 'Footwear', price: 299.98 },
];

const PAYMENT_TYPES = ['DEBIT', 'TRANSFER', 'CASH', 'PAYMENT'];
const ORDER_STATUSES = ['COMPLETE', 'PENDING', 'CLOSED', 'PROCESSING', 'SUSPECTED_FRAUD'];
const SEGMENTS = ['Consumer', 'Corporate', 'Home Office'];
const SHIPPING_MODES = ['Standard Class', 'First Class', 'Second Class', 'Same Day'];
const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

const BRONZE_HEADER = [
  'type', 'days_for_shipping_real', 'days_for_shipment_scheduled', 'shipping_mode',
  'order_status', 'customer_segment', 'customer_country', 'customer_state',
  'order_country', 'order_state', 'order_region', 'market',
  'product_name', 'category_name', 'department_name',
  'order_item_quantity', 'order_item_product_price', 'order_item_discount_rate', 'order_item_profit_ratio',
  'order_year', 'order_month', 'order_day', 'order_dayofweek',
];

function argValue(name: string, fallback: number): number {
  const arg = process.argv.find((a) => a.startsWith(`--${name}=`));
  const value = arg ? Number(arg.split('=')[1]) : fallback;
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

function csvField(value: Cell): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function withIds<T extends Row>(idColumn: string, entries: readonly T[]): Row[] {
  return entries.map((entry, i) => ({ [idColumn]: i + 1, ...entry }));
}

function bronzeRow(): Row {
  const geo = faker.helpers.arrayElement(GEOS);
  const customer = faker.helpers.arrayElement(CUSTOMER_GEOS);
  const product = faker.helpers.arrayElement(PRODUCTS);
  const date = faker.date.between({ from: '2015-01-01T00:00:00Z', to: '2017-12-31T00:00:00Z' });

  return {
    type: faker.helpers.arrayElement(PAYMENT_TYPES),
    days_for_shipping_real: faker.number.int({ min: 0, max: 6 }),
    days_for_shipment_scheduled: faker.number.int({ min: 0, max: 4 }),
    shipping_mode: faker.helpers.arrayElement(SHIPPING_MODES),
    order_status: faker.helpers.arrayElement(ORDER_STATUSES),
    customer_segment: faker.helpers.arrayElement(SEGMENTS),
    ...customer,
    ...geo,
    product_name: product.product_name,
    category_name: product.category_name,
    department_name: product.department_name,
    order_item_quantity: faker.number.int({ min: 1, max: 5 }),
    order_item_product_price: product.price,
    order_item_discount_rate: faker.number.int({ min: 0, max: 25 }) / 100,
    order_item_profit_ratio: faker.number.int({ min: -80, max: 50 }) / 100,
    order_year: date.getUTCFullYear(),
    order_month: date.getUTCMonth() + 1,
    order_day: date.getUTCDate(),
    order_dayofweek: DAY_NAMES[date.getUTCDay()],
  };
}

async function writeBronzeFile(filePath: string, rows: readonly Row[], encoding: string): Promise<void> {
  const lines = [BRONZE_HEADER.join(',')];
  for (const row of rows) {
    lines.push(BRONZE_HEADER.map((name) => csvField(row[name] ?? null)).join(','));
  }
  await fs.writeFile(filePath, iconv.encode(lines.join('\n') + '\n', encoding));
}

async function seed() {
  const config = loadConfig(process.env);
  const fileCount = argValue('files', 3);
  const rowCount = argValue('rows', 250);
  faker.seed(20240601);
  console.log('[Seed] Starting...');

  // ── 1. Dimensions ──
  const products = PRODUCTS.map((p) => ({
    product_name: p.product_name,
    category_name: p.category_name,
    department_name: p.department_name,
  }));

  await writeParquetTable(
    createTable(
      [
        { name: 'geo_id', type: 'int' },
        { name: 'order_country', type: 'string' },
        { name: 'order_state', type: 'string' },
        { name: 'order_region', type: 'string' },
        { name: 'market', type: 'string' },
      ],
      withIds('geo_id', GEOS)
    ),
    config.dimensions.geo
  );
  await writeParquetTable(
    createTable(
      [
        { name: 'customer_geo_id', type: 'int' },
        { name: 'customer_country', type: 'string' },
        { name: 'customer_state', type: 'string' },
      ],
      withIds('customer_geo_id', CUSTOMER_GEOS)
    ),
    config.dimensions.customerGeo
  );
  await writeParquetTable(
    createTable(
      [
        { name: 'product_key', type: 'int' },
        { name: 'product_name', type: 'string' },
        { name: 'category_name', type: 'string' },
        { name: 'department_name', type: 'string' },
      ],
      withIds('product_key', products)
    ),
    config.dimensions.product
  );
  console.log('[Seed] Wrote dimension artifacts');

  // ── 2. Bronze drops ──
  await fs.mkdir(config.paths.bronzeRoot, { recursive: true });
  for (let f = 0; f < fileCount; f++) {
    const rows = Array.from({ length: rowCount }, bronzeRow);

    // A few rows the validator has to deal with
    rows.push({ ...rows[0] });
    rows.push({ ...bronzeRow(), order_year: 2017, order_month: 2, order_day: 30 });

    const filePath = path.join(config.paths.bronzeRoot, `supply_chain_batch_${String(f + 1).padStart(2, '0')}.csv`);
    await writeBronzeFile(filePath, rows, config.sourceEncoding);
    console.log(`[Seed] Wrote ${rows.length} rows to ${path.basename(filePath)}`);
  }

  console.log(`\n[Seed] ✅ Done!`);
  console.log(`  Bronze root:  ${config.paths.bronzeRoot}`);
  console.log(`  Files:        ${fileCount}`);
  console.log(`\n  Process with:`);
  console.log(`  npm run batch\n`);
}

seed().catch((err) => {
  console.error('[Seed] Error:', err);
  process.exit(1);
});
