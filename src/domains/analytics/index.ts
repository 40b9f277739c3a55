// ──────────────────────────────────────────
// Analytics domain — barrel export
// ──────────────────────────────────────────

export { DashboardPipeline, NO_DATA_NOTICE } from './pipeline';
export { MarketingAggregator } from './marketing.aggregator';
export { BusinessAggregator } from './business.aggregator';
export { ReconciliationJoiner } from './reconciliation.joiner';
export { MetricsService } from './metrics.service';
export type { SummaryView } from './metrics.service';
export { createAnalyticsRoutes } from './routes';
