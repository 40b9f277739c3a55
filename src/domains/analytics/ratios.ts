// ──────────────────────────────────────────
// Analytics: Ratio metrics
// ──────────────────────────────────────────
// Every derived metric is computed from summed totals, never averaged from
// finer-grained ratios, and is null (not 0, not Infinity) on a zero denominator.

import { EfficiencyRatios, MarketingSums } from '../../shared/types';

export function ratio(numerator: number, denominator: number): number | null {
  return denominator === 0 ? null : numerator / denominator;
}

export function efficiency(sums: MarketingSums): EfficiencyRatios {
  return {
    ctr: ratio(sums.clicks, sums.impressions),
    cpc: ratio(sums.spend, sums.clicks),
    roas: ratio(sums.attributed_revenue, sums.spend),
  };
}

export function zeroMarketingSums(): MarketingSums {
  return { impressions: 0, clicks: 0, spend: 0, attributed_revenue: 0 };
}

export function addMarketingSums(target: MarketingSums, row: MarketingSums): void {
  target.impressions += row.impressions;
  target.clicks += row.clicks;
  target.spend += row.spend;
  target.attributed_revenue += row.attributed_revenue;
}

export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
