// ──────────────────────────────────────────
// Modeling: per-file Bronze → Silver processor
// ──────────────────────────────────────────

import type { DimensionSource, FactSink, FileProcessor } from '../../shared/contracts';
import { PipelineError, withFailureKind } from '../../shared/errors';
import type { Logger, PipelineResult } from '../../shared/types';
import { readBronzeTable, DEFAULT_ENCODING } from '../ingestion/bronze.reader';
import { deriveFacts } from './pipeline';
import { DimensionEnricher } from './enrichment/dimension.enricher';
import { finalizeFacts } from './finalizer';

export interface ProcessorOptions {
  encoding?: string;
  logger?: Logger;
}

export class FactProcessor implements FileProcessor {
  private enricher = new DimensionEnricher();
  private encoding: string;
  private logger: Logger;

  constructor(
    private dimensions: DimensionSource,
    private sink: FactSink,
    options: ProcessorOptions = {}
  ) {
    this.encoding = options.encoding ?? DEFAULT_ENCODING;
    this.logger = options.logger ?? console;
  }

  /**
   * Ingest, validate, derive, enrich, sort and write one file. Never throws for
   * file-level problems; they come back as a typed failure.
   */
  async process(sourcePath: string, outputPath: string): Promise<PipelineResult> {
    try {
      const raw = await withFailureKind('ingest', () => readBronzeTable(sourcePath, this.encoding));
      const { table: facts, stats } = await withFailureKind('derivation', () => deriveFacts(raw));

      if (stats.duplicateRows > 0) {
        this.logger.log(`[Processor] Dropped ${stats.duplicateRows} duplicate rows.`);
      }
      if (stats.invalidDateRows > 0) {
        this.logger.log(`[Processor] Dropped ${stats.invalidDateRows} rows with invalid order dates.`);
      }

      const dimensions = await withFailureKind('enrichment', () => this.dimensions.load());
      const enriched = await withFailureKind('enrichment', () => this.enricher.enrich(facts, dimensions));
      const table = await withFailureKind('write', () => finalizeFacts(enriched));
      await withFailureKind('write', () => this.sink.write(table, outputPath));

      return { ok: true, table, outputPath, stats: { ...stats, outputRows: table.rows.length } };
    } catch (err) {
      if (err instanceof PipelineError) return { ok: false, failure: err.toFailure() };
      throw err;
    }
  }
}
