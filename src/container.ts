// ──────────────────────────────────────────
// Composition root: wires domains from an AppConfig
// ──────────────────────────────────────────

import type { Knex } from 'knex';
import type { AppConfig } from './shared/config';
import type { RunRecorder } from './shared/contracts';
import type { Logger } from './shared/types';
import { getDb } from './db/connection';
import { ParquetDimensionSource } from './domains/modeling/enrichment/dimension.source';
import { FactProcessor } from './domains/modeling/processor';
import { ParquetFactWriter } from './domains/silver/parquet.writer';
import { Archiver } from './domains/batch/archiver';
import { BatchCoordinator } from './domains/batch/coordinator';
import { InMemoryRunRecorder, KnexRunRepo } from './domains/batch/run.repo';
import { KnexWarehouseRepo } from './domains/warehouse/warehouse.repo';
import { FactLoader, loadedName } from './domains/warehouse/fact.loader';
import { DimensionLoader } from './domains/warehouse/dimension.loader';

export interface WarehouseServices {
  db: Knex;
  factLoader: FactLoader;
  dimensionLoader: DimensionLoader;
}

export interface Services {
  coordinator: BatchCoordinator;
  recorder: RunRecorder;
  warehouse: WarehouseServices | null;
}

export function createServices(config: Readonly<AppConfig>, logger: Logger = console): Services {
  const db = config.databaseUrl ? getDb(config.databaseUrl) : null;

  // ── Bronze → Silver ──
  const dimensions = new ParquetDimensionSource(config.dimensions);
  const processor = new FactProcessor(dimensions, new ParquetFactWriter(), {
    encoding: config.sourceEncoding,
    logger,
  });
  const recorder: RunRecorder = db ? new KnexRunRepo(db) : new InMemoryRunRecorder();
  const coordinator = new BatchCoordinator(processor, new Archiver({ archiveRoot: config.paths.archiveRoot }), {
    paths: config.paths,
    concurrency: config.concurrency,
    recorder,
    logger,
  });

  // ── Silver → warehouse (only with a database) ──
  let warehouse: WarehouseServices | null = null;
  if (db) {
    const repo = new KnexWarehouseRepo(db, config.factTable);
    const silverArchiver = new Archiver({ archiveRoot: config.paths.silverArchiveRoot, naming: loadedName });
    warehouse = {
      db,
      factLoader: new FactLoader(config.paths.silverRoot, repo, silverArchiver, logger),
      dimensionLoader: new DimensionLoader(config.dimensions, repo, logger),
    };
  }

  return { coordinator, recorder, warehouse };
}
