// ──────────────────────────────────────────
// Shared type definitions for the Bronze → Silver pipeline
// ──────────────────────────────────────────

export type Cell = string | number | boolean | null;
export type ColumnType = 'int' | 'float' | 'bool' | 'string';

export interface ColumnDef {
  name: string;
  type: ColumnType;
}

export type Row = Readonly<Record<string, Cell>>;

/**
 * Fully materialized table. Stages never mutate one; they return a new table.
 */
export interface Table {
  readonly columns: readonly ColumnDef[];
  readonly rows: readonly Row[];
}

export type DimensionName = 'geo' | 'customerGeo' | 'product';

export interface DimensionSpec {
  name: DimensionName;
  /** Natural-key columns consumed (and dropped) by the join. */
  keys: readonly string[];
}

export type DimensionSet = Record<DimensionName, Table>;

export type FailureKind = 'ingest' | 'derivation' | 'enrichment' | 'write' | 'archive' | 'unexpected';

export interface FailureReason {
  kind: FailureKind;
  message: string;
}

export interface ValidationStats {
  inputRows: number;
  invalidDateRows: number;
  duplicateRows: number;
}

export interface FileStats extends ValidationStats {
  outputRows: number;
}

export type PipelineResult =
  | { ok: true; table: Table; outputPath: string; stats: FileStats }
  | { ok: false; failure: FailureReason };

export type FileState = 'pending' | 'processing' | 'succeeded' | 'archived' | 'failed' | 'skipped';

export type FileOutcome =
  | {
      status: 'archived';
      file: string;
      outputPath: string;
      archivePath: string;
      stats: FileStats;
    }
  | {
      status: 'skipped';
      file: string;
      failure: FailureReason;
    };

export type BatchMode = 'batch' | 'single';

export interface BatchSummary {
  id: string;
  mode: BatchMode;
  started_at: Date;
  finished_at: Date;
  discovered: number;
  archived: number;
  skipped: number;
  files: FileOutcome[];
}

export interface LoadOutcome {
  file: string;
  status: 'loaded' | 'skipped';
  rows: number;
  archivePath: string | null;
  error: string | null;
}

export interface LoadSummary {
  discovered: number;
  loaded: number;
  skipped: number;
  files: LoadOutcome[];
}

export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}
