// ──────────────────────────────────────────
// Analytics: Marketing aggregator
// ──────────────────────────────────────────

import {
  CampaignRollup,
  ChannelRollup,
  DailyChannelMetric,
  DateRollup,
  MarketingAggregate,
  MarketingSums,
  NormalizedMarketingRecord,
  Table,
} from '../../shared/types';
import { addMarketingSums, compareText, efficiency, zeroMarketingSums } from './ratios';

type Dated<R> = R & { date: string };

interface Group<K> {
  key: K;
  sums: MarketingSums;
}

/** Groups rows under a composite key, summing the marketing measures. */
function groupSums<R extends MarketingSums, K>(
  rows: readonly R[],
  keyOf: (row: R) => K,
  idOf: (key: K) => string
): Group<K>[] {
  const groups = new Map<string, Group<K>>();
  for (const row of rows) {
    const key = keyOf(row);
    const id = idOf(key);
    let group = groups.get(id);
    if (!group) {
      group = { key, sums: zeroMarketingSums() };
      groups.set(id, group);
    }
    addMarketingSums(group.sums, row);
  }
  return Array.from(groups.values());
}

export function hasDate<R extends { date: string | null }>(row: R): row is Dated<R> {
  return row.date !== null;
}

export class MarketingAggregator {
  aggregate(tables: Table<NormalizedMarketingRecord>[]): DailyChannelMetric[] {
    return this.summarize(tables).daily;
  }

  /**
   * Daily-by-channel metrics plus the rollups derived from them. The date and
   * channel rollups re-sum the daily groups, so they always agree with them.
   */
  summarize(tables: Table<NormalizedMarketingRecord>[]): MarketingAggregate {
    const rows = tables
      .filter((t) => t.rows.length > 0)
      .flatMap((t) => t.rows)
      .filter(hasDate);

    const daily: DailyChannelMetric[] = groupSums(
      rows,
      (r) => ({ date: r.date, channel: r.channel }),
      (k) => `${k.date}\u0000${k.channel}`
    )
      .map(({ key, sums }) => ({ ...key, ...sums, ...efficiency(sums) }))
      .sort((a, b) => compareText(a.date, b.date) || compareText(a.channel, b.channel));

    const byDate: DateRollup[] = groupSums(daily, (r) => r.date, (k) => k)
      .map(({ key, sums }) => ({ date: key, ...sums, ...efficiency(sums) }))
      .sort((a, b) => compareText(a.date, b.date));

    const byChannel: ChannelRollup[] = groupSums(daily, (r) => r.channel, (k) => k)
      .map(({ key, sums }) => ({ channel: key, ...sums, ...efficiency(sums) }))
      .sort((a, b) => compareText(a.channel, b.channel));

    const byCampaign: CampaignRollup[] = groupSums(
      rows,
      (r) => ({ channel: r.channel, campaign: r.campaign }),
      (k) => `${k.channel}\u0000${k.campaign}`
    )
      .map(({ key, sums }) => ({ ...key, ...sums, ...efficiency(sums) }))
      .sort(
        (a, b) =>
          b.spend - a.spend || compareText(a.channel, b.channel) || compareText(a.campaign, b.campaign)
      );

    return { daily, byDate, byChannel, byCampaign };
  }
}
