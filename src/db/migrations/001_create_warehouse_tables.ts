// ──────────────────────────────────────────
// Migration: star schema (dimensions + fact) and run history
// ──────────────────────────────────────────

import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // ── Dimensions (before the fact table, which references them) ──

  await knex.schema.createTable('dim_geo', (t) => {
    t.integer('geo_id').primary();
    t.string('order_country', 100);
    t.string('order_state', 100);
    t.string('order_region', 100);
    t.string('market', 50);
  });

  await knex.schema.createTable('dim_customer_geo', (t) => {
    t.integer('customer_geo_id').primary();
    t.string('customer_country', 100);
    t.string('customer_state', 100);
  });

  await knex.schema.createTable('dim_product', (t) => {
    t.integer('product_key').primary();
    t.string('product_name', 255);
    t.string('category_name', 100);
    t.string('department_name', 100);
  });

  // ── Fact ──

  await knex.schema.createTable('fact_sales', (t) => {
    t.bigIncrements('order_id');
    t.integer('geo_id').references('geo_id').inTable('dim_geo');
    t.integer('customer_geo_id').references('customer_geo_id').inTable('dim_customer_geo');
    t.integer('product_key').references('product_key').inTable('dim_product');

    t.integer('order_year');
    t.integer('order_month');
    t.integer('order_day');
    t.string('day_name_str', 20);
    t.string('order_day_type', 20);

    t.string('type', 50);
    t.integer('days_for_shipping_real');
    t.integer('days_for_shipment_scheduled');
    t.integer('shipping_delta');
    t.string('delivery_class', 50);
    t.string('shipping_mode_clean', 50);
    t.string('order_status', 50);
    t.string('customer_segment', 50);

    t.integer('order_item_quantity');
    t.decimal('order_item_product_price', 18, 4);
    t.decimal('order_item_discount_rate', 18, 4);
    t.decimal('order_item_profit_ratio', 18, 4);
    t.decimal('gross_sales', 18, 4);
    t.decimal('discount_amount', 18, 4);
    t.decimal('net_revenue', 18, 4);
    t.decimal('order_profit_amount', 18, 4);
    t.decimal('total_cost', 18, 4);
    t.decimal('actual_unit_cost', 18, 4);

    t.boolean('is_profit_bleeder');
    t.decimal('markup_pct', 18, 4);
    t.decimal('margin_leakage_pct', 18, 4);
    t.string('price_segment', 50);
    t.string('trade_route', 255);

    t.integer('state_order_count');
    t.string('state_density_class', 50);

    t.timestamp('load_timestamp', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.raw(`
    CREATE INDEX idx_fact_sales_order_date_parts ON fact_sales (order_year, order_month, order_day);
  `);

  // ── Run history ──

  await knex.schema.createTable('pipeline_runs', (t) => {
    t.uuid('id').primary();
    t.string('mode', 20).notNullable();
    t.timestamp('started_at', { useTz: true }).notNullable();
    t.timestamp('finished_at', { useTz: true }).notNullable();
    t.integer('discovered').notNullable().defaultTo(0);
    t.integer('archived').notNullable().defaultTo(0);
    t.integer('skipped').notNullable().defaultTo(0);
    t.jsonb('files').notNullable().defaultTo('[]');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('pipeline_runs');
  await knex.schema.dropTableIfExists('fact_sales');
  await knex.schema.dropTableIfExists('dim_product');
  await knex.schema.dropTableIfExists('dim_customer_geo');
  await knex.schema.dropTableIfExists('dim_geo');
}
