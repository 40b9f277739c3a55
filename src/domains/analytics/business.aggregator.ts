// ──────────────────────────────────────────
// Analytics: Business aggregator
// ──────────────────────────────────────────

import { BusinessSums, DailyBusinessMetric, NormalizedBusinessRecord, Table } from '../../shared/types';
import { hasDate } from './marketing.aggregator';
import { compareText, ratio } from './ratios';

export class BusinessAggregator {
  aggregate(table: Table<NormalizedBusinessRecord>): DailyBusinessMetric[] {
    const byDate = new Map<string, BusinessSums>();

    for (const row of table.rows.filter(hasDate)) {
      let sums = byDate.get(row.date);
      if (!sums) {
        sums = { orders: 0, new_customers: 0, total_revenue: 0, gross_profit: 0 };
        byDate.set(row.date, sums);
      }
      sums.orders += row.orders;
      sums.new_customers += row.new_customers;
      sums.total_revenue += row.total_revenue;
      sums.gross_profit += row.gross_profit;
    }

    return Array.from(byDate.entries())
      .sort(([a], [b]) => compareText(a, b))
      .map(([date, sums]) => ({
        date,
        ...sums,
        gross_margin_pct: ratio(sums.gross_profit, sums.total_revenue),
      }));
  }
}
