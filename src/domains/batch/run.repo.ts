// ──────────────────────────────────────────
// Batch: run history repositories
// ──────────────────────────────────────────

import type { Knex } from 'knex';
import type { RunRecorder } from '../../shared/contracts';
import type { BatchMode, BatchSummary, FileOutcome } from '../../shared/types';

interface PipelineRunRow {
  id: string;
  mode: BatchMode;
  started_at: Date;
  finished_at: Date;
  discovered: number;
  archived: number;
  skipped: number;
  files: FileOutcome[] | string;
}

export class KnexRunRepo implements RunRecorder {
  constructor(private db: Knex) {}

  async record(summary: BatchSummary): Promise<void> {
    await this.db('pipeline_runs').insert({
      ...summary,
      files: JSON.stringify(summary.files),
    });
  }

  async list(limit = 50): Promise<BatchSummary[]> {
    const rows: PipelineRunRow[] = await this.db('pipeline_runs')
      .select('id', 'mode', 'started_at', 'finished_at', 'discovered', 'archived', 'skipped', 'files')
      .orderBy('started_at', 'desc')
      .limit(limit);

    return rows.map((row) => ({
      ...row,
      // pg hands jsonb back parsed; other drivers return text
      files: typeof row.files === 'string' ? JSON.parse(row.files) : row.files,
    }));
  }
}

export class InMemoryRunRecorder implements RunRecorder {
  private runs: BatchSummary[] = [];

  async record(summary: BatchSummary): Promise<void> {
    this.runs.push(summary);
  }

  async list(limit = 50): Promise<BatchSummary[]> {
    return [...this.runs].reverse().slice(0, limit);
  }
}
