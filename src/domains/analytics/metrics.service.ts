// ──────────────────────────────────────────
// Analytics: Metrics service
// ──────────────────────────────────────────

import { SnapshotProvider } from '../../shared/contracts';
import {
  BusinessSums,
  CampaignRollup,
  ChannelEfficiencyRow,
  EfficiencyRatios,
  FrozenRows,
  Granularity,
  KpiBundle,
  MarketingSums,
  Notice,
  PipelineStatus,
  ReconciledDailyMetric,
  SourceStatus,
  TimeSeriesQuery,
  TrendPoint,
} from '../../shared/types';
import { addMarketingSums, compareText, efficiency, ratio, zeroMarketingSums } from './ratios';

export interface SummaryView {
  status: PipelineStatus;
  computed_at: Date;
  kpis: KpiBundle;
  notices: FrozenRows<Notice>;
}

export class MetricsService {
  constructor(private pipeline: SnapshotProvider) {}

  async getSummary(): Promise<SummaryView> {
    const result = await this.pipeline.refresh();
    return {
      status: result.status,
      computed_at: result.computed_at,
      kpis: { ...result.kpis },
      notices: result.notices,
    };
  }

  async getTimeSeries(query: TimeSeriesQuery): Promise<TrendPoint[]> {
    const result = await this.pipeline.refresh();
    const inRange = (date: string) =>
      (query.start === undefined || date >= query.start) && (query.end === undefined || date <= query.end);

    if (query.channel !== undefined) {
      const channel = query.channel;
      const rows = result.marketing.daily.filter((r) => sameChannel(r.channel, channel) && inRange(r.date));
      return bucketByGranularity(rows, query.granularity).map((bucket) => ({
        date: bucket.label,
        ...rollupMarketing(bucket.rows),
        business: null,
      }));
    }

    const rows = result.reconciled.filter((r) => inRange(r.date));
    return bucketByGranularity(rows, query.granularity).map((bucket) => {
      const business = rollupBusiness(bucket.rows);
      const marketing = rollupMarketing(bucket.rows);
      return {
        date: bucket.label,
        ...marketing,
        business: {
          ...business,
          gross_margin_pct: ratio(business.gross_profit, business.total_revenue),
          cac: ratio(marketing.spend, business.new_customers),
          rev_per_order: ratio(business.total_revenue, business.orders),
        },
      };
    });
  }

  async getChannelEfficiency(): Promise<FrozenRows<ChannelEfficiencyRow>> {
    const result = await this.pipeline.refresh();
    return result.channels;
  }

  async getCampaignPerformance(channel?: string): Promise<FrozenRows<CampaignRollup>> {
    const result = await this.pipeline.refresh();
    return result.marketing.byCampaign.filter((c) => channel === undefined || sameChannel(c.channel, channel));
  }

  async getSourceStatuses(): Promise<FrozenRows<SourceStatus>> {
    const result = await this.pipeline.refresh();
    return result.sources;
  }

  async forceRefresh(): Promise<PipelineStatus> {
    const result = await this.pipeline.refresh({ force: true });
    return result.status;
  }
}

// ── Helpers ──

// Channel filters come from query strings, where "facebook" and "Facebook" mean the same tag
function sameChannel(tag: string, requested: string): boolean {
  return tag.toLowerCase() === requested.trim().toLowerCase();
}

function rollupMarketing(rows: readonly MarketingSums[]): MarketingSums & EfficiencyRatios {
  const sums = zeroMarketingSums();
  for (const row of rows) addMarketingSums(sums, row);
  // Derived from totals — never averaged from daily values
  return { ...sums, ...efficiency(sums) };
}

function rollupBusiness(rows: readonly ReconciledDailyMetric[]): BusinessSums {
  return {
    orders: rows.reduce((s, r) => s + r.orders, 0),
    new_customers: rows.reduce((s, r) => s + r.new_customers, 0),
    total_revenue: rows.reduce((s, r) => s + r.total_revenue, 0),
    gross_profit: rows.reduce((s, r) => s + r.gross_profit, 0),
  };
}

interface Bucket<R> {
  label: string;
  rows: R[];
}

export function bucketLabel(date: string, granularity: Granularity): string {
  if (granularity === 'daily') return date;
  if (granularity === 'monthly') return date.slice(0, 7);

  // ISO week start (Monday)
  const d = new Date(`${date}T00:00:00Z`);
  const day = d.getUTCDay();
  d.setUTCDate(d.getUTCDate() - day + (day === 0 ? -6 : 1));
  return d.toISOString().slice(0, 10);
}

function bucketByGranularity<R extends { date: string }>(rows: readonly R[], granularity: Granularity): Bucket<R>[] {
  const map = new Map<string, R[]>();

  for (const row of rows) {
    const key = bucketLabel(row.date, granularity);
    const bucket = map.get(key);
    if (bucket) bucket.push(row);
    else map.set(key, [row]);
  }

  return Array.from(map.entries())
    .sort(([a], [b]) => compareText(a, b))
    .map(([label, rows]) => ({ label, rows }));
}
