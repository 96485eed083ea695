// ──────────────────────────────────────────
// Warehouse: Silver → SQL fact load
// ──────────────────────────────────────────

import path from 'path';
import type { FileArchiver, WarehouseContract } from '../../shared/contracts';
import { errorMessage } from '../../shared/errors';
import type { LoadOutcome, LoadSummary, Logger } from '../../shared/types';
import { listFiles } from '../ingestion/discovery';
import { readParquetTable } from '../silver/parquet.reader';
import type { ArchiveNamer } from '../batch/archiver';
import { projectToContract } from './fact-contract';

export const loadedName: ArchiveNamer = (stem, ext, stamp) => `LOADED_${stem}_${stamp}${ext}`;

export function isFactArtifact(name: string): boolean {
  return name.startsWith('Fact_') && name.endsWith('.parquet');
}

export class FactLoader {
  constructor(
    private silverRoot: string,
    private warehouse: WarehouseContract,
    private archiver: FileArchiver,
    private logger: Logger = console
  ) {}

  async run(): Promise<LoadSummary> {
    const files = await listFiles(this.silverRoot, isFactArtifact);
    if (files.length === 0) {
      this.logger.log('[FactLoader] No fact Parquet files found to load.');
    } else {
      this.logger.log(`[FactLoader] Found ${files.length} files to load.`);
    }

    const outcomes: LoadOutcome[] = [];
    for (const [i, file] of files.entries()) {
      outcomes.push(await this.loadOne(file, i + 1, files.length));
    }

    const loaded = outcomes.filter((o) => o.status === 'loaded').length;
    this.logger.log(`[FactLoader] Silver → SQL load completed: ${loaded} loaded, ${outcomes.length - loaded} skipped.`);
    return { discovered: files.length, loaded, skipped: outcomes.length - loaded, files: outcomes };
  }

  private async loadOne(file: string, index: number, total: number): Promise<LoadOutcome> {
    const name = path.basename(file);
    this.logger.log(`[FactLoader] Processing file ${index}/${total}: ${name}`);
    try {
      const table = await readParquetTable(file);
      const rows = projectToContract(table);
      this.logger.log(`[FactLoader] Loading ${rows.length} rows into SQL.`);
      const inserted = await this.warehouse.appendFacts(rows);

      const archivePath = await this.archiver.archive(file);
      this.logger.log(`[FactLoader] Archived file as: ${path.basename(archivePath)}`);
      return { file, status: 'loaded', rows: inserted, archivePath, error: null };
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error(`[FactLoader] Error loading ${name}: ${message}. Skipping file.`);
      return { file, status: 'skipped', rows: 0, archivePath: null, error: message };
    }
  }
}
