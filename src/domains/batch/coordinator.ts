// ──────────────────────────────────────────
// Batch: run coordinator
// ──────────────────────────────────────────
// Runs each discovered Bronze file through the processor, then archives it.
// A file is archived only after its artifact was written; any failure leaves
// the file in place for the next run and the batch moves on.

import path from 'path';
import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import type { FileArchiver, FileProcessor, RunRecorder } from '../../shared/contracts';
import { PipelineError, errorMessage } from '../../shared/errors';
import type { BatchMode, BatchSummary, FileOutcome, Logger, PipelineResult } from '../../shared/types';
import type { PipelinePaths } from '../../shared/config';
import { listBronzeFiles } from '../ingestion/discovery';
import { FileTracker } from './file-state';

export interface CoordinatorOptions {
  paths: Pick<PipelinePaths, 'bronzeRoot' | 'silverRoot'>;
  concurrency?: number;
  recorder?: RunRecorder;
  logger?: Logger;
  clock?: () => Date;
}

export function factOutputName(sourcePath: string): string {
  return `Fact_${path.parse(sourcePath).name}.parquet`;
}

export class BatchCoordinator {
  private logger: Logger;
  private clock: () => Date;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private processor: FileProcessor,
    private archiver: FileArchiver,
    private options: CoordinatorOptions
  ) {
    this.logger = options.logger ?? console;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Runs never overlap: a call made while another is active waits for it. */
  run(): Promise<BatchSummary> {
    return this.exclusive(() => this.runBatch());
  }

  /** Single-file mode: one source, one explicit output artifact. */
  runSingle(sourcePath: string, targetPath: string): Promise<BatchSummary> {
    return this.exclusive(() => this.runOneFile(sourcePath, targetPath));
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.tail.then(fn, fn);
    // The caller sees any rejection through `next`; the queue only needs settlement
    this.tail = next.catch(() => undefined);
    return next;
  }

  private async runBatch(): Promise<BatchSummary> {
    const startedAt = this.clock();
    const files = await listBronzeFiles(this.options.paths.bronzeRoot);
    this.logger.log(`[Batch] Found ${files.length} files to process.`);

    const limit = pLimit(Math.max(1, this.options.concurrency ?? 1));
    const outcomes = await Promise.all(
      files.map((file, i) =>
        limit(() =>
          this.processOne(file, path.join(this.options.paths.silverRoot, factOutputName(file)), i + 1, files.length)
        )
      )
    );

    const summary = this.summarize('batch', startedAt, outcomes);
    this.logger.log(`[Batch] Batch processing complete: ${summary.archived} archived, ${summary.skipped} skipped.`);
    await this.record(summary);
    return summary;
  }

  private async runOneFile(sourcePath: string, targetPath: string): Promise<BatchSummary> {
    const startedAt = this.clock();
    this.logger.log(`[Batch] Starting single-file pipeline for: ${path.basename(sourcePath)}`);
    const outcome = await this.processOne(sourcePath, targetPath, 1, 1);
    const summary = this.summarize('single', startedAt, [outcome]);
    await this.record(summary);
    return summary;
  }

  private async processOne(file: string, outputPath: string, index: number, total: number): Promise<FileOutcome> {
    const name = path.basename(file);
    const tracker = new FileTracker(file);
    tracker.to('processing');
    this.logger.log(`[Batch] Processing file ${index}/${total}: ${name}`);

    let result: PipelineResult;
    try {
      result = await this.processor.process(file, outputPath);
    } catch (err) {
      result = { ok: false, failure: { kind: 'unexpected', message: errorMessage(err) } };
    }

    if (!result.ok) {
      tracker.to('failed');
      tracker.to('skipped');
      this.logger.error(`[Batch] Error processing ${name} (${result.failure.kind}): ${result.failure.message}`);
      this.logger.error('[Batch] Skipping file and continuing batch job.');
      return { status: 'skipped', file, failure: result.failure };
    }

    tracker.to('succeeded');
    this.logger.log(`[Batch] Saved cleaned data: ${path.basename(result.outputPath)} (${result.stats.outputRows} rows)`);

    try {
      const archivePath = await this.archiver.archive(file);
      tracker.to('archived');
      this.logger.log(`[Batch] Archived source file: ${path.basename(archivePath)}`);
      return { status: 'archived', file, outputPath: result.outputPath, archivePath, stats: result.stats };
    } catch (err) {
      tracker.to('failed');
      tracker.to('skipped');
      const failure =
        err instanceof PipelineError ? err.toFailure() : { kind: 'archive' as const, message: errorMessage(err) };
      this.logger.error(`[Batch] Error archiving ${name}: ${failure.message}`);
      return { status: 'skipped', file, failure };
    }
  }

  private summarize(mode: BatchMode, startedAt: Date, files: FileOutcome[]): BatchSummary {
    const archived = files.filter((f) => f.status === 'archived').length;
    return {
      id: uuidv4(),
      mode,
      started_at: startedAt,
      finished_at: this.clock(),
      discovered: files.length,
      archived,
      skipped: files.length - archived,
      files,
    };
  }

  private async record(summary: BatchSummary): Promise<void> {
    if (!this.options.recorder) return;
    try {
      await this.options.recorder.record(summary);
    } catch (err) {
      this.logger.warn(`[Batch] Failed to record run ${summary.id}: ${errorMessage(err)}`);
    }
  }
}
