// ──────────────────────────────────────────
// Shared type definitions
// ──────────────────────────────────────────

export type SourceName = 'facebook' | 'google' | 'tiktok' | 'business';
export type Category = 'marketing' | 'business';
export type Granularity = 'daily' | 'weekly' | 'monthly';
export type PipelineStatus = 'ok' | 'no_data' | 'failed';
export type NoticeLevel = 'info' | 'warning' | 'blocking';

// ── Tables ──

export type RawRecord = Record<string, string>;

export interface Table<R> {
  columns: string[];
  rows: R[];
}

export type RawTable = Table<RawRecord>;

export interface NormalizedMarketingRecord {
  /** Calendar date as YYYY-MM-DD, or null when the source value did not parse. */
  date: string | null;
  channel: string;
  campaign: string;
  impressions: number;
  clicks: number;
  spend: number;
  attributed_revenue: number;
  extra: Record<string, string>;
}

export interface NormalizedBusinessRecord {
  date: string | null;
  source: 'business';
  orders: number;
  new_orders: number;
  new_customers: number;
  total_revenue: number;
  gross_profit: number;
  extra: Record<string, string>;
}

export interface NormalizationOutcome<R> {
  table: Table<R>;
  invalidDates: number;
}

// ── Loading ──

export interface SourceDefinition {
  name: SourceName;
  category: Category;
  /** Stamped on every normalized row: the channel label, or "business". */
  tag: string;
  /** Relative paths tried in order inside each search directory. */
  candidates: string[];
}

export interface ResolvedSource {
  source: SourceName;
  path: string;
  mtime_ms: number;
  size: number;
}

export type LoadResult =
  | { status: 'loaded'; source: SourceName; path: string; table: RawTable }
  | { status: 'missing'; source: SourceName; tried: string[] }
  | { status: 'corrupt'; source: SourceName; path: string; reason: string };

export interface SourceStatus {
  source: SourceName;
  status: LoadResult['status'];
  path: string | null;
  rows: number;
  invalid_dates: number;
  reason: string | null;
}

// ── Metrics ──

export interface MarketingSums {
  impressions: number;
  clicks: number;
  spend: number;
  attributed_revenue: number;
}

export interface EfficiencyRatios {
  ctr: number | null;
  cpc: number | null;
  roas: number | null;
}

export interface DailyChannelMetric extends MarketingSums, EfficiencyRatios {
  date: string;
  channel: string;
}

export interface DateRollup extends MarketingSums, EfficiencyRatios {
  date: string;
}

export interface ChannelRollup extends MarketingSums, EfficiencyRatios {
  channel: string;
}

export interface CampaignRollup extends MarketingSums, EfficiencyRatios {
  channel: string;
  campaign: string;
}

export interface MarketingAggregate {
  daily: DailyChannelMetric[];
  byDate: DateRollup[];
  byChannel: ChannelRollup[];
  byCampaign: CampaignRollup[];
}

export interface BusinessSums {
  orders: number;
  new_customers: number;
  total_revenue: number;
  gross_profit: number;
}

export interface DailyBusinessMetric extends BusinessSums {
  date: string;
  gross_margin_pct: number | null;
}

export interface ReconciledDailyMetric extends MarketingSums, EfficiencyRatios, BusinessSums {
  date: string;
  gross_margin_pct: number | null;
  cac: number | null;
  rev_per_order: number | null;
  /** False when no business row existed for this date and the business fields were zero-filled. */
  has_business_data: boolean;
}

export interface KpiBundle {
  total_spend: number;
  total_attributed_revenue: number;
  overall_roas: number | null;
  total_clicks: number;
  total_impressions: number;
  total_orders: number;
  total_new_customers: number;
  total_revenue: number;
  total_gross_profit: number;
  overall_cac: number | null;
  overall_gross_margin_pct: number | null;
}

export interface ChannelEfficiencyRow extends ChannelRollup {
  spend_share: number | null;
  revenue_share: number | null;
}

export interface TrendBusiness extends BusinessSums {
  gross_margin_pct: number | null;
  cac: number | null;
  rev_per_order: number | null;
}

export interface TrendPoint extends MarketingSums, EfficiencyRatios {
  date: string;
  /** Null on channel-filtered series: business outcomes are not attributable to one channel. */
  business: TrendBusiness | null;
}

// ── Pipeline ──

/** Rows shared through the cached result; frozen at runtime as well. */
export type FrozenRows<T> = readonly Readonly<T>[];

export interface Notice {
  level: NoticeLevel;
  message: string;
}

export interface PipelineResult {
  readonly run_id: string;
  readonly computed_at: Date;
  readonly status: PipelineStatus;
  readonly sources: FrozenRows<SourceStatus>;
  readonly notices: FrozenRows<Notice>;
  readonly marketing: {
    readonly daily: FrozenRows<DailyChannelMetric>;
    readonly byDate: FrozenRows<DateRollup>;
    readonly byChannel: FrozenRows<ChannelRollup>;
    readonly byCampaign: FrozenRows<CampaignRollup>;
  };
  readonly business: FrozenRows<DailyBusinessMetric>;
  readonly reconciled: FrozenRows<ReconciledDailyMetric>;
  readonly kpis: Readonly<KpiBundle>;
  readonly channels: FrozenRows<ChannelEfficiencyRow>;
}

export interface RefreshOptions {
  force?: boolean;
}

export interface TimeSeriesQuery {
  start?: string;
  end?: string;
  granularity: Granularity;
  channel?: string;
}
