// ──────────────────────────────────────────
// Batch: per-file lifecycle
// ──────────────────────────────────────────

import type { FileState } from '../../shared/types';

// succeeded -> failed covers an archive move that fails after the write.
const TRANSITIONS: Record<FileState, readonly FileState[]> = {
  pending: ['processing'],
  processing: ['succeeded', 'failed'],
  succeeded: ['archived', 'failed'],
  failed: ['skipped'],
  archived: [],
  skipped: [],
};

export function canTransition(from: FileState, to: FileState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class FileTracker {
  private current: FileState = 'pending';
  private readonly history: FileState[] = ['pending'];

  constructor(readonly file: string) {}

  get state(): FileState {
    return this.current;
  }

  get path(): readonly FileState[] {
    return this.history;
  }

  isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  to(next: FileState): void {
    if (!canTransition(this.current, next)) {
      throw new Error(`Illegal transition for ${this.file}: ${this.current} -> ${next}`);
    }
    this.current = next;
    this.history.push(next);
  }
}
