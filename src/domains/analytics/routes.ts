// ──────────────────────────────────────────
// Analytics: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { MetricsService } from './metrics.service';
import { asyncHandler } from '../../platform/http';
import { badRequest } from '../../shared/errors';
import { parseCalendarDate } from '../modeling/coerce';

const isoDate = z
  .string()
  .trim()
  .refine((value) => parseCalendarDate(value) === value, { message: 'Expected a YYYY-MM-DD date' });

export const timeSeriesQuerySchema = z.object({
  start: isoDate.optional(),
  end: isoDate.optional(),
  granularity: z.enum(['daily', 'weekly', 'monthly']).default('daily'),
  channel: z.string().trim().min(1).optional(),
});

const campaignQuerySchema = z.object({
  channel: z.string().trim().min(1).optional(),
});

export function createAnalyticsRoutes(metricsService: MetricsService): Router {
  const router = Router();

  // GET /summary — KPI cards, or a blocking notice when there is no data
  router.get(
    '/summary',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(await metricsService.getSummary());
    })
  );

  // GET /?start=...&end=...&granularity=daily&channel=Facebook — trend series
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const query = timeSeriesQuerySchema.parse(req.query);
      if (query.start && query.end && query.start > query.end) {
        throw badRequest('start must not be after end');
      }
      const data = await metricsService.getTimeSeries(query);
      res.json({ data });
    })
  );

  // GET /channels — channel efficiency table
  router.get(
    '/channels',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json({ data: await metricsService.getChannelEfficiency() });
    })
  );

  // GET /campaigns?channel=Google — campaign performance, highest spend first
  router.get(
    '/campaigns',
    asyncHandler(async (req: Request, res: Response) => {
      const { channel } = campaignQuerySchema.parse(req.query);
      res.json({ data: await metricsService.getCampaignPerformance(channel) });
    })
  );

  // POST /refresh — drop the cached result and recompute
  router.post(
    '/refresh',
    asyncHandler(async (_req: Request, res: Response) => {
      const status = await metricsService.forceRefresh();
      res.json({ message: 'Refresh complete', status });
    })
  );

  return router;
}
