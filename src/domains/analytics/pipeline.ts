// ──────────────────────────────────────────
// Analytics: Dashboard pipeline — the single entry point
// ──────────────────────────────────────────
// load → normalize → aggregate → join, once per refresh. The last result is
// kept under a fingerprint of every source file (path, mtime, size, or
// absence) and served again until any of those change or a forced refresh
// clears it. Results are never mutated after they are built.

import { v4 as uuidv4 } from 'uuid';
import { IngestionContract, ModelingContract, SnapshotProvider } from '../../shared/contracts';
import { errorMessage } from '../../shared/errors';
import {
  LoadResult,
  NormalizedBusinessRecord,
  NormalizedMarketingRecord,
  Notice,
  PipelineResult,
  RefreshOptions,
  ResolvedSource,
  SourceDefinition,
  SourceStatus,
  Table,
} from '../../shared/types';
import { SOURCES } from '../ingestion/sources';
import { MarketingAggregator } from './marketing.aggregator';
import { BusinessAggregator } from './business.aggregator';
import { ReconciliationJoiner } from './reconciliation.joiner';

export const NO_DATA_NOTICE = 'No data found. Place CSVs in ./data/ and refresh.';

interface CacheEntry {
  key: string;
  result: PipelineResult;
}

interface ResolvedEntry {
  definition: SourceDefinition;
  file: ResolvedSource | null;
}

/** Freezes a result and everything reachable from it, so cached rows cannot be edited by callers. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !(value instanceof Date) && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) deepFreeze(child);
  }
  return value;
}

export function fingerprint(entries: readonly ResolvedEntry[]): string {
  return entries
    .map(({ definition, file }) =>
      file ? `${definition.name}=${file.path}@${file.mtime_ms}:${file.size}` : `${definition.name}=absent`
    )
    .join('|');
}

export class DashboardPipeline implements SnapshotProvider {
  private cache: CacheEntry | null = null;
  private marketingAggregator = new MarketingAggregator();
  private businessAggregator = new BusinessAggregator();
  private joiner = new ReconciliationJoiner();

  constructor(
    private ingestion: IngestionContract,
    private modeling: ModelingContract
  ) {}

  async refresh(options: RefreshOptions = {}): Promise<PipelineResult> {
    try {
      const resolved = await Promise.all(
        SOURCES.map(async (definition) => ({ definition, file: await this.ingestion.resolve(definition.name) }))
      );
      const key = fingerprint(resolved);

      if (!options.force && this.cache?.key === key) {
        return this.cache.result;
      }

      const loads = await Promise.all(
        resolved.map(({ definition, file }) => this.ingestion.loadResult(definition.name, file))
      );
      const result = deepFreeze(this.compute(loads));
      this.cache = { key, result };

      console.log(
        `[Pipeline] Run ${result.run_id}: ${result.status}, ` +
          `${result.sources.filter((s) => s.status === 'loaded').length}/${SOURCES.length} sources, ` +
          `${result.reconciled.length} days`
      );
      return result;
    } catch (err) {
      const message = errorMessage(err);
      console.error('[Pipeline] Refresh failed:', message);
      return deepFreeze(
        this.emptyResult('failed', [], [{ level: 'blocking', message: `Refresh failed: ${message}` }])
      );
    }
  }

  invalidate(): void {
    this.cache = null;
  }

  private compute(loads: LoadResult[]): PipelineResult {
    const notices: Notice[] = [];
    const sources: SourceStatus[] = [];
    const marketingTables: Table<NormalizedMarketingRecord>[] = [];
    let businessTable: Table<NormalizedBusinessRecord> = { columns: [], rows: [] };
    let validMarketingRows = 0;
    let validBusinessRows = 0;

    for (const load of loads) {
      const definition = SOURCES.find((s) => s.name === load.source);
      if (!definition) continue;

      if (load.status !== 'loaded') {
        sources.push({
          source: load.source,
          status: load.status,
          path: load.status === 'corrupt' ? load.path : null,
          rows: 0,
          invalid_dates: 0,
          reason: load.status === 'corrupt' ? load.reason : null,
        });
        notices.push(
          load.status === 'missing'
            ? { level: 'info', message: `${definition.tag} data not found (${definition.candidates[0]})` }
            : { level: 'warning', message: `${definition.tag} data could not be read: ${load.reason}` }
        );
        continue;
      }

      let invalidDates: number;
      let rows: number;
      if (definition.category === 'marketing') {
        const outcome = this.modeling.normalizeMarketing(load.table, definition.tag);
        marketingTables.push(outcome.table);
        invalidDates = outcome.invalidDates;
        rows = outcome.table.rows.length;
        validMarketingRows += rows - invalidDates;
      } else {
        const outcome = this.modeling.normalizeBusiness(load.table);
        businessTable = outcome.table;
        invalidDates = outcome.invalidDates;
        rows = outcome.table.rows.length;
        validBusinessRows += rows - invalidDates;
      }

      sources.push({ source: load.source, status: 'loaded', path: load.path, rows, invalid_dates: invalidDates, reason: null });
      if (invalidDates > 0) {
        notices.push({
          level: 'info',
          message: `${definition.tag}: ${invalidDates} row(s) without a valid date were excluded`,
        });
      }
    }

    if (validMarketingRows === 0 && validBusinessRows === 0) {
      return this.emptyResult('no_data', sources, [...notices, { level: 'blocking', message: NO_DATA_NOTICE }]);
    }
    if (validMarketingRows === 0) {
      notices.push({ level: 'info', message: 'No marketing activity found; business data has no dates to join on' });
    }

    const marketing = this.marketingAggregator.summarize(marketingTables);
    const business = this.businessAggregator.aggregate(businessTable);
    const reconciled = this.joiner.join(marketing.byDate, business);

    return {
      run_id: uuidv4(),
      computed_at: new Date(),
      status: 'ok',
      sources,
      notices,
      marketing,
      business,
      reconciled,
      kpis: this.joiner.kpis(reconciled),
      channels: this.joiner.channelEfficiency(marketing.byChannel),
    };
  }

  private emptyResult(
    status: PipelineResult['status'],
    sources: SourceStatus[],
    notices: Notice[]
  ): PipelineResult {
    return {
      run_id: uuidv4(),
      computed_at: new Date(),
      status,
      sources,
      notices,
      marketing: { daily: [], byDate: [], byChannel: [], byCampaign: [] },
      business: [],
      reconciled: [],
      kpis: this.joiner.kpis([]),
      channels: [],
    };
  }
}
