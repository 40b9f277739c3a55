import { afterAll, afterEach, beforeAll, beforeEach, describe, it, expect, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import type { Express } from 'express';
import { createApp } from '../src/app';
import { timeSeriesQuerySchema } from '../src/domains/analytics/routes';
import { csv } from './helpers/memory-ingestion';

function listen(app: Express): Promise<Server> {
  return new Promise((resolve) => {
    const server = app.listen(0, () => resolve(server));
  });
}

describe('HTTP API', () => {
  let dir: string;
  let server: Server;
  let baseUrl: string;

  async function call(method: 'GET' | 'POST', url: string): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${url}`, { method });
    const body: unknown = await res.json();
    return { status: res.status, body };
  }

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'routes-'));
    await fs.writeFile(
      path.join(dir, 'Facebook.csv'),
      csv(
        'date,campaign,impressions,clicks,spend,attributed revenue',
        '2024-01-01,Prospecting,1000,50,100,300',
        '2024-01-02,Retargeting,500,0,0,300'
      )
    );
    await fs.writeFile(
      path.join(dir, 'business.csv'),
      csv('date,# of orders,new customers,total revenue,gross profit', '2024-01-01,10,5,500,150')
    );

    const { app } = createApp({ PORT: 0, DATA_DIRS: [dir], REFRESH_INTERVAL_MS: 0 });
    server = await listen(app);
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await fs.rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('answers the health check', async () => {
    expect(await call('GET', '/health')).toEqual({ status: 200, body: { status: 'ok' } });
  });

  it('serves the KPI summary', async () => {
    const { status, body } = await call('GET', '/api/v1/metrics/summary');

    expect(status).toBe(200);
    expect(body).toMatchObject({
      status: 'ok',
      kpis: { total_spend: 100, total_attributed_revenue: 600, overall_roas: 6, total_orders: 10, overall_cac: 20 },
    });
  });

  it('serves the daily series with business fields', async () => {
    const { status, body } = await call('GET', '/api/v1/metrics?granularity=daily');

    expect(status).toBe(200);
    expect(body).toMatchObject({
      data: [
        { date: '2024-01-01', spend: 100, roas: 3, business: { orders: 10, cac: 20, gross_margin_pct: 0.3 } },
        { date: '2024-01-02', spend: 0, roas: null, business: { orders: 0, cac: null, gross_margin_pct: null } },
      ],
    });
  });

  it('filters the series by channel regardless of case', async () => {
    const { body } = await call('GET', '/api/v1/metrics?channel=facebook&start=2024-01-02');

    expect(body).toEqual({
      data: [
        {
          date: '2024-01-02',
          impressions: 500,
          clicks: 0,
          spend: 0,
          attributed_revenue: 300,
          ctr: 0,
          cpc: null,
          roas: null,
          business: null,
        },
      ],
    });
  });

  it('rejects a range whose start is after its end', async () => {
    expect(await call('GET', '/api/v1/metrics?start=2024-01-05&end=2024-01-01')).toEqual({
      status: 400,
      body: { error: 'start must not be after end' },
    });
  });

  it('rejects malformed query parameters', async () => {
    const { status, body } = await call('GET', '/api/v1/metrics?granularity=hourly');

    expect(status).toBe(400);
    expect(body).toMatchObject({ error: 'validation_failed', issues: [{ path: ['granularity'] }] });
  });

  it('lists channel efficiency and campaigns', async () => {
    expect(await call('GET', '/api/v1/metrics/channels')).toMatchObject({
      status: 200,
      body: { data: [{ channel: 'Facebook', spend: 100, spend_share: 1, revenue_share: 1 }] },
    });
    expect(await call('GET', '/api/v1/metrics/campaigns?channel=Facebook')).toMatchObject({
      status: 200,
      body: {
        data: [
          { channel: 'Facebook', campaign: 'Prospecting', spend: 100 },
          { channel: 'Facebook', campaign: 'Retargeting', spend: 0 },
        ],
      },
    });
  });

  it('reports source statuses', async () => {
    const { body } = await call('GET', '/api/v1/sources');
    expect(body).toMatchObject({
      data: [
        { source: 'facebook', status: 'loaded', rows: 2 },
        { source: 'google', status: 'missing' },
        { source: 'tiktok', status: 'missing' },
        { source: 'business', status: 'loaded', rows: 1 },
      ],
    });

    expect(await call('GET', '/api/v1/sources/facebook')).toMatchObject({
      status: 200,
      body: { source: 'facebook', status: 'loaded', path: path.join(dir, 'Facebook.csv') },
    });
  });

  it('answers 404 for an unknown source', async () => {
    expect(await call('GET', '/api/v1/sources/bing')).toEqual({
      status: 404,
      body: { error: 'Unknown source: bing' },
    });
  });

  it('recomputes on a forced refresh', async () => {
    expect(await call('POST', '/api/v1/metrics/refresh')).toEqual({
      status: 200,
      body: { message: 'Refresh complete', status: 'ok' },
    });
  });
});

describe('timeSeriesQuerySchema', () => {
  it('defaults to daily granularity', () => {
    expect(timeSeriesQuerySchema.parse({})).toEqual({ granularity: 'daily' });
  });

  it('accepts ISO dates and a channel', () => {
    expect(timeSeriesQuerySchema.parse({ start: '2024-01-01', end: '2024-01-31', granularity: 'weekly', channel: ' Google ' })).toEqual({
      start: '2024-01-01',
      end: '2024-01-31',
      granularity: 'weekly',
      channel: 'Google',
    });
  });

  it('rejects other date spellings and unknown granularities', () => {
    expect(timeSeriesQuerySchema.safeParse({ start: '01/02/2024' }).success).toBe(false);
    expect(timeSeriesQuerySchema.safeParse({ end: '2024-02-30' }).success).toBe(false);
    expect(timeSeriesQuerySchema.safeParse({ granularity: 'hourly' }).success).toBe(false);
  });
});
