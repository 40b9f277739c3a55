// ──────────────────────────────────────────
// Ingestion: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { MetricsService } from '../analytics/metrics.service';
import { asyncHandler } from '../../platform/http';
import { notFound } from '../../shared/errors';
import { isSourceName } from './sources';

export function createIngestionRoutes(metricsService: MetricsService): Router {
  const router = Router();

  // GET / — load status of every source in the last refresh
  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json({ data: await metricsService.getSourceStatuses() });
    })
  );

  // GET /:source — one source's status
  router.get(
    '/:source',
    asyncHandler(async (req: Request, res: Response) => {
      const { source } = req.params;
      if (!isSourceName(source)) throw notFound(`Unknown source: ${source}`);

      const statuses = await metricsService.getSourceStatuses();
      const status = statuses.find((s) => s.source === source);
      // A failed refresh records no per-source status
      if (!status) throw notFound(`No status recorded for ${source}`);
      res.json(status);
    })
  );

  return router;
}
