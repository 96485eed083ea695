// ──────────────────────────────────────────
// Shared error taxonomy
// ──────────────────────────────────────────

import type { FailureKind, FailureReason } from './types';

/**
 * Base class for every condition that is fatal to a single input file.
 * The batch coordinator turns these into a skip-and-continue outcome.
 */
export class PipelineError extends Error {
  constructor(
    readonly kind: FailureKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toFailure(): FailureReason {
    return { kind: this.kind, message: this.message };
  }
}

export class IngestError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ingest', message, options);
  }
}

export class DerivationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('derivation', message, options);
  }
}

export class EnrichmentError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('enrichment', message, options);
  }
}

export class WriteError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('write', message, options);
  }
}

export class ArchiveError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('archive', message, options);
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs `fn`, re-throwing anything that is not already a PipelineError as one of `kind`.
 */
export async function withFailureKind<T>(
  kind: FailureKind,
  fn: () => T | Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof PipelineError) throw err;
    throw new PipelineError(kind, errorMessage(err), { cause: err });
  }
}
