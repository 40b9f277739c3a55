// ──────────────────────────────────────────
// Sample data — demo exports for every source
// ──────────────────────────────────────────
// Headers differ per file on purpose, the way real channel exports do.

import dayjs from 'dayjs';
import Papa from 'papaparse';

export interface SampleFile {
  name: string;
  content: string;
}

export interface SampleOptions {
  days: number;
  /** Last day covered, YYYY-MM-DD. */
  endDate: string;
  seed?: number;
}

interface ChannelProfile {
  file: string;
  dateFormat: string;
  headers: [date: string, campaign: string, impressions: string, clicks: string, spend: string, revenue: string];
  campaigns: string[];
  ctr: number;
  cpc: number;
  roas: number;
}

const CHANNELS: ChannelProfile[] = [
  {
    file: 'Facebook.csv',
    dateFormat: 'YYYY-MM-DD',
    headers: ['date', 'campaign', 'impression', 'clicks', 'spend', 'attributed revenue'],
    campaigns: ['Retargeting - Lookalike', 'Prospecting - Broad'],
    ctr: 0.018,
    cpc: 1.2,
    roas: 2.8,
  },
  {
    file: 'Google.csv',
    dateFormat: 'YYYY-MM-DD',
    headers: ['date', 'campaign', 'impressions', 'clicks', 'spend', 'attributed_revenue'],
    campaigns: ['Search - Brand', 'Search - Generic', 'Shopping'],
    ctr: 0.045,
    cpc: 0.9,
    roas: 3.6,
  },
  {
    file: 'TikTok.csv',
    dateFormat: 'M/D/YYYY',
    headers: ['Date', 'Campaign', 'Impressions', 'Clicks', 'Spend', 'Attributed Revenue'],
    campaigns: ['Creators - Spark Ads', 'In-Feed - Broad'],
    ctr: 0.011,
    cpc: 0.6,
    roas: 1.9,
  },
];

const BUSINESS_HEADERS = ['date', '# of orders', '# of new orders', 'new customers', 'total revenue', 'gross profit', 'COGS'];

/** mulberry32 — small seeded PRNG so the same options always give the same files. */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const money = (value: number) => (Math.round(value * 100) / 100).toFixed(2);

export function generateSampleFiles(options: SampleOptions): SampleFile[] {
  const random = createRandom(options.seed ?? 42);
  const end = dayjs(options.endDate);
  const dates = Array.from({ length: options.days }, (_, i) => end.subtract(options.days - 1 - i, 'day'));

  const files = CHANNELS.map((channel) => {
    const data: string[][] = [];
    for (const date of dates) {
      for (const campaign of channel.campaigns) {
        const impressions = 2000 + Math.floor(random() * 18000);
        const clicks = Math.floor(impressions * channel.ctr * (0.6 + random() * 0.8));
        const spend = clicks * channel.cpc * (0.8 + random() * 0.4);
        const revenue = spend * channel.roas * (0.5 + random());
        data.push([
          date.format(channel.dateFormat),
          campaign,
          String(impressions),
          String(clicks),
          money(spend),
          money(revenue),
        ]);
      }
    }
    return { name: channel.file, content: Papa.unparse({ fields: [...channel.headers], data }) };
  });

  const business: string[][] = dates.map((date) => {
    const orders = 20 + Math.floor(random() * 60);
    const newOrders = Math.floor(orders * (0.3 + random() * 0.3));
    const newCustomers = Math.max(0, newOrders - Math.floor(random() * 3));
    const revenue = orders * (45 + random() * 30);
    const cogs = revenue * (0.45 + random() * 0.15);
    return [
      date.format('YYYY-MM-DD'),
      String(orders),
      String(newOrders),
      String(newCustomers),
      money(revenue),
      money(revenue - cogs),
      money(cogs),
    ];
  });
  files.push({ name: 'business.csv', content: Papa.unparse({ fields: BUSINESS_HEADERS, data: business }) });

  return files;
}
