// ──────────────────────────────────────────
// Script: drop warehouse tables and re-run migrations
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import path from 'path';
import { getDb, closeDb } from '../src/db/connection';
import { loadConfig } from '../src/shared/config';

async function reset() {
  const { databaseUrl } = loadConfig(process.env);
  if (!databaseUrl) {
    throw new Error('DATABASE_URL is required');
  }
  const db = getDb(databaseUrl);
  console.log('[Reset] Dropping all tables...');

  // Drop in reverse FK order
  await db.raw('DROP TABLE IF EXISTS fact_sales CASCADE');
  await db.raw('DROP TABLE IF EXISTS dim_product CASCADE');
  await db.raw('DROP TABLE IF EXISTS dim_customer_geo CASCADE');
  await db.raw('DROP TABLE IF EXISTS dim_geo CASCADE');
  await db.raw('DROP TABLE IF EXISTS pipeline_runs CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations_lock CASCADE');

  console.log('[Reset] Running migrations...');
  await db.migrate.latest({
    directory: path.resolve(__dirname, '../src/db/migrations'),
    extension: 'ts',
  });

  console.log('[Reset] ✅ Done: all tables recreated');
  await closeDb();
  process.exit(0);
}

reset().catch((err) => {
  console.error('[Reset] Error:', err);
  process.exit(1);
});
