// ──────────────────────────────────────────
// Warehouse: API routes
// ──────────────────────────────────────────

import { Router } from 'express';
import type { Request, Response } from 'express';
import { sendError } from '../../platform/http';
import type { FactLoader } from './fact.loader';
import type { DimensionLoader } from './dimension.loader';

export function createWarehouseRoutes(factLoader: FactLoader, dimensionLoader: DimensionLoader): Router {
  const router = Router();

  // POST /facts/load: append every Silver fact artifact
  router.post('/facts/load', async (_req: Request, res: Response) => {
    try {
      const summary = await factLoader.run();
      res.json(summary);
    } catch (err) {
      sendError(res, err);
    }
  });

  // POST /dimensions/load: append the three dimension artifacts
  router.post('/dimensions/load', async (_req: Request, res: Response) => {
    try {
      const outcomes = await dimensionLoader.run();
      res.json({ data: outcomes });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
