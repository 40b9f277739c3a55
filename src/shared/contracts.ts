// ──────────────────────────────────────────
// Domain contracts — typed interfaces between domains
// ──────────────────────────────────────────

import {
  LoadResult,
  NormalizationOutcome,
  NormalizedBusinessRecord,
  NormalizedMarketingRecord,
  PipelineResult,
  RawTable,
  RefreshOptions,
  ResolvedSource,
  SourceName,
} from './types';

/**
 * Ingestion contract — exposed to the pipeline.
 * `resolve` is cheap (stat only) and feeds the cache fingerprint;
 * `loadResult` reads and parses the file it resolved.
 */
export interface IngestionContract {
  resolve(source: SourceName): Promise<ResolvedSource | null>;
  loadResult(source: SourceName, resolved?: ResolvedSource | null): Promise<LoadResult>;
  load(source: SourceName): Promise<RawTable>;
}

/**
 * Modeling contract — exposed to the pipeline.
 * Turns raw tables into the canonical schema of their category.
 */
export interface ModelingContract {
  normalizeMarketing(table: RawTable, channel: string): NormalizationOutcome<NormalizedMarketingRecord>;
  normalizeBusiness(table: RawTable): NormalizationOutcome<NormalizedBusinessRecord>;
}

/**
 * Analytics contract — exposed to the presentation layer (HTTP routes, runtime).
 */
export interface SnapshotProvider {
  refresh(options?: RefreshOptions): Promise<PipelineResult>;
}
