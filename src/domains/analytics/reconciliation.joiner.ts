// ──────────────────────────────────────────
// Analytics: Reconciliation joiner
// ──────────────────────────────────────────

import {
  ChannelEfficiencyRow,
  ChannelRollup,
  DailyBusinessMetric,
  DateRollup,
  KpiBundle,
  ReconciledDailyMetric,
} from '../../shared/types';
import { efficiency, ratio } from './ratios';

export class ReconciliationJoiner {
  /**
   * Left join on date with the marketing date rollup as the left side.
   * Dates without a business row keep zero-filled business fields and
   * `has_business_data: false`.
   */
  join(marketingDaily: readonly DateRollup[], businessDaily: readonly DailyBusinessMetric[]): ReconciledDailyMetric[] {
    const business = new Map(businessDaily.map((b) => [b.date, b]));

    return marketingDaily.map((m) => {
      const b = business.get(m.date);
      const orders = b?.orders ?? 0;
      const newCustomers = b?.new_customers ?? 0;
      const totalRevenue = b?.total_revenue ?? 0;
      const grossProfit = b?.gross_profit ?? 0;

      return {
        date: m.date,
        impressions: m.impressions,
        clicks: m.clicks,
        spend: m.spend,
        attributed_revenue: m.attributed_revenue,
        ...efficiency(m),
        orders,
        new_customers: newCustomers,
        total_revenue: totalRevenue,
        gross_profit: grossProfit,
        gross_margin_pct: ratio(grossProfit, totalRevenue),
        cac: ratio(m.spend, newCustomers),
        rev_per_order: ratio(totalRevenue, orders),
        has_business_data: b !== undefined,
      };
    });
  }

  /** Whole-period totals over the joined table; ratios from totals. */
  kpis(reconciled: readonly ReconciledDailyMetric[]): KpiBundle {
    const sum = (pick: (r: ReconciledDailyMetric) => number) => reconciled.reduce((s, r) => s + pick(r), 0);

    const totalSpend = sum((r) => r.spend);
    const totalAttributed = sum((r) => r.attributed_revenue);
    const totalNewCustomers = sum((r) => r.new_customers);
    const totalRevenue = sum((r) => r.total_revenue);
    const totalGrossProfit = sum((r) => r.gross_profit);

    return {
      total_spend: totalSpend,
      total_attributed_revenue: totalAttributed,
      overall_roas: ratio(totalAttributed, totalSpend),
      total_clicks: sum((r) => r.clicks),
      total_impressions: sum((r) => r.impressions),
      total_orders: sum((r) => r.orders),
      total_new_customers: totalNewCustomers,
      total_revenue: totalRevenue,
      total_gross_profit: totalGrossProfit,
      overall_cac: ratio(totalSpend, totalNewCustomers),
      overall_gross_margin_pct: ratio(totalGrossProfit, totalRevenue),
    };
  }

  /** Channel efficiency with each channel's share of total spend and attributed revenue. */
  channelEfficiency(byChannel: readonly ChannelRollup[]): ChannelEfficiencyRow[] {
    const totalSpend = byChannel.reduce((s, c) => s + c.spend, 0);
    const totalRevenue = byChannel.reduce((s, c) => s + c.attributed_revenue, 0);

    return byChannel.map((c) => ({
      ...c,
      spend_share: ratio(c.spend, totalSpend),
      revenue_share: ratio(c.attributed_revenue, totalRevenue),
    }));
  }
}
