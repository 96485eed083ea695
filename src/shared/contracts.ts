// ──────────────────────────────────────────
// Domain contracts: typed interfaces between domains
// ──────────────────────────────────────────

import type { BatchSummary, DimensionSet, PipelineResult, Row, Table } from './types';

/**
 * Supplies the read-only dimension tables used for enrichment.
 * Implementations may cache; callers must not mutate the result.
 */
export interface DimensionSource {
  load(): Promise<DimensionSet>;
}

/** Persists a finalized fact table as one artifact. */
export interface FactSink {
  write(table: Table, destination: string): Promise<void>;
}

/** Turns one Bronze file into one Silver artifact. */
export interface FileProcessor {
  process(sourcePath: string, outputPath: string): Promise<PipelineResult>;
}

/** Moves a processed file out of its pending location. */
export interface FileArchiver {
  archive(sourcePath: string): Promise<string>;
}

/**
 * Batch history, exposed to the HTTP surface.
 */
export interface RunRecorder {
  record(summary: BatchSummary): Promise<void>;
  list(limit?: number): Promise<BatchSummary[]>;
}

/**
 * Warehouse contract: append-only loads into the relational store.
 */
export interface WarehouseContract {
  appendFacts(rows: readonly Row[]): Promise<number>;
  appendDimension(table: string, rows: readonly Row[]): Promise<number>;
}
