import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest';
import type { Server } from 'http';
import express from 'express';
import { z } from 'zod';
import { asyncHandler, errorHandler } from '../src/platform/http';
import { HttpError, ValidationError } from '../src/shared/errors';

describe('errorHandler', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = express();
    app.get(
      '/zod',
      asyncHandler(async (req) => {
        z.object({ limit: z.coerce.number().int() }).parse(req.query);
      })
    );
    app.get(
      '/invalid',
      asyncHandler(async () => {
        throw new ValidationError('bad input', { field: 'limit' });
      })
    );
    app.get(
      '/gone',
      asyncHandler(async () => {
        throw new HttpError(410, 'gone');
      })
    );
    app.get(
      '/boom',
      asyncHandler(async () => {
        throw new Error('kaput');
      })
    );
    app.use(errorHandler);

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  async function get(url: string): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${url}`);
    const body: unknown = await res.json();
    return { status: res.status, body };
  }

  it('maps zod failures to 400 with their issues', async () => {
    const { status, body } = await get('/zod?limit=abc');

    expect(status).toBe(400);
    expect(body).toMatchObject({ error: 'validation_failed', issues: [{ path: ['limit'] }] });
  });

  it('maps ValidationError to 400 with details', async () => {
    expect(await get('/invalid')).toEqual({ status: 400, body: { error: 'bad input', details: { field: 'limit' } } });
  });

  it('uses the status code of an HttpError', async () => {
    expect(await get('/gone')).toEqual({ status: 410, body: { error: 'gone' } });
  });

  it('answers 500 for anything else and logs it', async () => {
    const logged = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(await get('/boom')).toEqual({ status: 500, body: { error: 'kaput' } });
    expect(logged).toHaveBeenCalledTimes(1);
    logged.mockRestore();
  });
});
