// ──────────────────────────────────────────
// Platform: API key middleware
// ──────────────────────────────────────────

import crypto from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

export function hashApiKey(rawKey: string): Buffer {
  return crypto.createHash('sha256').update(rawKey).digest();
}

/**
 * Requires `x-api-key` to match `expectedKey`. With no key configured every
 * request passes.
 */
export function apiKeyAuth(expectedKey: string | null): RequestHandler {
  const expectedHash = expectedKey ? hashApiKey(expectedKey) : null;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedHash) {
      next();
      return;
    }

    const rawKey = req.header('x-api-key');
    if (!rawKey) {
      res.status(401).json({ error: 'Missing x-api-key header' });
      return;
    }

    // Hashing first gives equal-length buffers for timingSafeEqual
    if (!crypto.timingSafeEqual(hashApiKey(rawKey), expectedHash)) {
      res.status(401).json({ error: 'Invalid API key' });
      return;
    }

    next();
  };
}
