// ──────────────────────────────────────────
// Modeling: Marketing channel transformer
// ──────────────────────────────────────────

import { NormalizationOutcome, NormalizedMarketingRecord, RawTable } from '../../../shared/types';
import { canonicalizeTable, pickColumns } from '../schema/columns';
import { parseCalendarDate, toAmount, toCount } from '../coerce';

export const MARKETING_COLUMNS = [
  'date',
  'channel',
  'campaign',
  'impressions',
  'clicks',
  'spend',
  'attributed_revenue',
] as const;

const KNOWN = new Set<string>(MARKETING_COLUMNS);

export class MarketingTransformer {
  transform(raw: RawTable, channel: string): NormalizationOutcome<NormalizedMarketingRecord> {
    const table = canonicalizeTable(raw, 'marketing');
    // A channel column inside the file never overrides the caller's tag.
    const extraColumns = table.columns.filter((c) => !KNOWN.has(c));

    let invalidDates = 0;
    const rows = table.rows.map((r): NormalizedMarketingRecord => {
      const date = parseCalendarDate(r.date);
      if (date === null) invalidDates++;

      return {
        date,
        channel,
        campaign: (r.campaign ?? '').trim(),
        impressions: toCount(r.impressions),
        clicks: toCount(r.clicks),
        spend: toAmount(r.spend),
        attributed_revenue: toAmount(r.attributed_revenue),
        extra: pickColumns(r, extraColumns),
      };
    });

    return {
      table: { columns: [...MARKETING_COLUMNS, ...extraColumns], rows },
      invalidDates,
    };
  }
}
