// ──────────────────────────────────────────
// Platform: HTTP error mapping
// ──────────────────────────────────────────

import type { Response } from 'express';
import { ValidationError } from '../shared/errors';

export function sendError(res: Response, err: unknown): void {
  if (err instanceof ValidationError) {
    res.status(400).json({ error: err.message });
    return;
  }
  const message = err instanceof Error ? err.message : 'Internal error';
  res.status(500).json({ error: message });
}
