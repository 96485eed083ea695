// ──────────────────────────────────────────
// Migration: stored order_date rebuilt from the date parts
// ──────────────────────────────────────────

import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.raw(`
    ALTER TABLE fact_sales
    ADD COLUMN order_date date GENERATED ALWAYS AS (make_date(order_year, order_month, order_day)) STORED
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.alterTable('fact_sales', (t) => {
    t.dropColumn('order_date');
  });
}
