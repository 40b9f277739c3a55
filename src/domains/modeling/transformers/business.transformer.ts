// ──────────────────────────────────────────
// Modeling: Business outcomes transformer
// ──────────────────────────────────────────

import { NormalizationOutcome, NormalizedBusinessRecord, RawTable } from '../../../shared/types';
import { canonicalizeTable, pickColumns } from '../schema/columns';
import { parseCalendarDate, parseDecimal, toCount } from '../coerce';

export const BUSINESS_COLUMNS = [
  'date',
  'source',
  'orders',
  'new_orders',
  'new_customers',
  'total_revenue',
  'gross_profit',
] as const;

const KNOWN = new Set<string>(BUSINESS_COLUMNS);

export class BusinessTransformer {
  transform(raw: RawTable): NormalizationOutcome<NormalizedBusinessRecord> {
    const table = canonicalizeTable(raw, 'business');
    const extraColumns = table.columns.filter((c) => !KNOWN.has(c));

    // Exports without an orders column only report new orders
    const ordersColumn =
      !table.columns.includes('orders') && table.columns.includes('new_orders') ? 'new_orders' : 'orders';

    let invalidDates = 0;
    const rows = table.rows.map((r): NormalizedBusinessRecord => {
      const date = parseCalendarDate(r.date);
      if (date === null) invalidDates++;

      return {
        date,
        source: 'business',
        orders: toCount(r[ordersColumn]),
        new_orders: toCount(r.new_orders),
        new_customers: toCount(r.new_customers),
        // Signed: refunds can push a day's revenue and profit below zero
        total_revenue: parseDecimal(r.total_revenue),
        gross_profit: parseDecimal(r.gross_profit),
        extra: pickColumns(r, extraColumns),
      };
    });

    return {
      table: { columns: [...BUSINESS_COLUMNS, ...extraColumns], rows },
      invalidDates,
    };
  }
}
