// ──────────────────────────────────────────
// App — composition root + Express routes
// ──────────────────────────────────────────

import express, { Express } from 'express';
import { AppConfig } from './config';
import { errorHandler } from './platform/http';

// Ingestion
import { SourceLoader, createIngestionRoutes } from './domains/ingestion';

// Modeling
import { SchemaNormalizer } from './domains/modeling';

// Analytics
import { DashboardPipeline, MetricsService, createAnalyticsRoutes } from './domains/analytics';

// Runtime
import { Runtime } from './runtime';

export interface AppContext {
  app: Express;
  pipeline: DashboardPipeline;
  runtime: Runtime;
}

export function createApp(config: AppConfig): AppContext {
  // ── Ingestion ──
  const sourceLoader = new SourceLoader(config.DATA_DIRS);

  // ── Modeling ──
  const normalizer = new SchemaNormalizer();

  // ── Analytics ──
  const pipeline = new DashboardPipeline(sourceLoader, normalizer);
  const metricsService = new MetricsService(pipeline);

  // ── Runtime ──
  const runtime = new Runtime(pipeline, config.REFRESH_INTERVAL_MS);

  // ── Express app ──
  const app = express();
  app.use(express.json());

  app.use('/api/v1/metrics', createAnalyticsRoutes(metricsService));
  app.use('/api/v1/sources', createIngestionRoutes(metricsService));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(errorHandler);

  return { app, pipeline, runtime };
}
