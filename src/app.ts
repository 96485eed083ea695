// ──────────────────────────────────────────
// App entry point: bootstrap + Express server
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import path from 'path';
import express from 'express';
import { closeDb } from './db/connection';
import { loadConfig } from './shared/config';
import { apiKeyAuth } from './platform/auth';
import { createServices } from './container';
import { createBatchRoutes } from './domains/batch/routes';
import { createWarehouseRoutes } from './domains/warehouse/routes';
import { Runtime } from './runtime';

async function main() {
  const config = loadConfig(process.env);
  const { coordinator, recorder, warehouse } = createServices(config);

  if (warehouse) {
    console.log('[App] Running migrations...');
    await warehouse.db.migrate.latest({
      directory: path.resolve(__dirname, 'db/migrations'),
      extension: 'ts',
    });
  } else {
    console.warn('[App] DATABASE_URL not set: run history kept in memory, warehouse routes disabled');
  }

  // ── Runtime ──
  const runtime = new Runtime(coordinator, warehouse?.factLoader ?? null);

  // ── Express app ──
  const app = express();
  app.use(express.json());

  const auth = apiKeyAuth(config.apiKey);
  app.use('/api/v1/batches', auth, createBatchRoutes(coordinator, recorder, config.paths));
  if (warehouse) {
    app.use('/api/v1/warehouse', auth, createWarehouseRoutes(warehouse.factLoader, warehouse.dimensionLoader));
  }

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  runtime.start(config.intervalMs);
  const server = app.listen(config.port, () => {
    console.log(`[App] Silver Forge listening on port ${config.port}`);
  });

  const shutdown = async () => {
    console.log('[App] Shutting down...');
    runtime.stop();
    server.close();
    await closeDb();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[App] Shutdown error:', err);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  console.error('[App] Fatal error:', err);
  process.exit(1);
});
