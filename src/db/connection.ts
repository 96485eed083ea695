// ──────────────────────────────────────────
// Database connection: Knex instance
// ──────────────────────────────────────────

import knex, { Knex } from 'knex';

let db: Knex | undefined;

export function getDb(databaseUrl: string): Knex {
  if (!db) {
    db = knex({
      client: 'pg',
      connection: databaseUrl,
      pool: { min: 0, max: 5 },
    });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = undefined;
  }
}
