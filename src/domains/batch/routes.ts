// ──────────────────────────────────────────
// Batch: API routes
// ──────────────────────────────────────────

import path from 'path';
import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import type { RunRecorder } from '../../shared/contracts';
import { ValidationError } from '../../shared/errors';
import type { PipelinePaths } from '../../shared/config';
import { sendError } from '../../platform/http';
import type { BatchCoordinator } from './coordinator';

const singleRunSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1).optional(),
});

/** Resolves `name` under `root`, rejecting anything that escapes it. */
export function resolveInside(root: string, name: string): string {
  const resolved = path.resolve(root, name);
  const relative = path.relative(root, resolved);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new ValidationError(`Path escapes ${root}: ${name}`);
  }
  return resolved;
}

export function createBatchRoutes(
  coordinator: BatchCoordinator,
  recorder: RunRecorder,
  paths: Pick<PipelinePaths, 'bronzeRoot' | 'silverRoot'>
): Router {
  const router = Router();

  // POST /run: process every pending Bronze file
  router.post('/run', async (_req: Request, res: Response) => {
    try {
      const summary = await coordinator.run();
      res.json(summary);
    } catch (err) {
      sendError(res, err);
    }
  });

  // POST /single { source, target? }: one file, names relative to the Bronze / Silver roots
  router.post('/single', async (req: Request, res: Response) => {
    try {
      const parsed = singleRunSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((i) => i.message).join('; '));
      }
      const source = resolveInside(paths.bronzeRoot, parsed.data.source);
      const targetName = parsed.data.target ?? `${path.parse(source).name}_Silver.parquet`;
      const target = resolveInside(paths.silverRoot, targetName);
      const summary = await coordinator.runSingle(source, target);
      res.json(summary);
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /?limit=20: recent runs, newest first
  router.get('/', async (req: Request, res: Response) => {
    try {
      const limit = Math.min(Number(req.query.limit) || 50, 500);
      const runs = await recorder.list(limit);
      res.json({ data: runs });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
