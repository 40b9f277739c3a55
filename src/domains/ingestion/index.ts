// ──────────────────────────────────────────
// Ingestion domain — barrel export
// ──────────────────────────────────────────

export { SourceLoader } from './source-loader';
export { SOURCES, findSource, isSourceName } from './sources';
export { parseCsv, emptyTable } from './csv';
export { createIngestionRoutes } from './routes';
