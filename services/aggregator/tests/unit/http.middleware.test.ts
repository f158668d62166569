import { describe, it, expect, vi } from 'vitest';
import type { NextFunction, Request, Response } from 'express';
import { requireApiKeyForWrites } from '../../src/middleware/auth.js';
import { errorHandler } from '../../src/middleware/error.js';
import { httpError } from '../../src/utils/errors.js';
import { SentimentBody, SymbolParam, WebhookForecastsBody } from '../../src/utils/validators.js';

function fakeReq(method: string, url: string, headers: Record<string, string> = {}) {
  return {
    method,
    url,
    originalUrl: url,
    header: (name: string) => headers[name.toLowerCase()],
  } as unknown as Request;
}

type FakeRes = {
  statusCode: number;
  body: unknown;
  status(code: number): FakeRes;
  json(body: unknown): FakeRes;
};

function fakeRes(): FakeRes {
  const res: FakeRes = {
    statusCode: 200,
    body: undefined,
    status(code) { res.statusCode = code; return res; },
    json(body) { res.body = body; return res; },
  };
  return res;
}

describe('requireApiKeyForWrites', () => {
  it('lets reads through without a key', () => {
    const next = vi.fn();
    requireApiKeyForWrites(fakeReq('GET', '/api/v1/candles/BTCUSDT'), fakeRes() as unknown as Response, next);
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('rejects a webhook call without the key', () => {
    const next = vi.fn();
    const res = fakeRes();
    requireApiKeyForWrites(fakeReq('POST', '/api/v1/webhooks/sentiment'), res as unknown as Response, next);
    expect(next).not.toHaveBeenCalled();
    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({ error: { code: 'AUTH_REQUIRED', message: 'invalid or missing x-api-key' } });
  });

  it('rejects a wrong key', () => {
    const next = vi.fn();
    const res = fakeRes();
    requireApiKeyForWrites(fakeReq('POST', '/api/v1/webhooks/forecasts', { 'x-api-key': 'nope' }), res as unknown as Response, next);
    expect(res.statusCode).toBe(401);
  });

  it('accepts the configured key', () => {
    const next = vi.fn();
    requireApiKeyForWrites(fakeReq('POST', '/api/v1/webhooks/forecasts', { 'x-api-key': 'dev-key' }), fakeRes() as unknown as Response, next);
    expect(next).toHaveBeenCalledTimes(1);
  });
});

describe('errorHandler', () => {
  const next: NextFunction = () => {};

  it('maps a typed error to its status and code', () => {
    const res = fakeRes();
    errorHandler(httpError(404, 'NOT_FOUND', 'no candles'), fakeReq('GET', '/x'), res as unknown as Response, next);
    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({ error: { code: 'NOT_FOUND', message: 'no candles' } });
  });

  it('answers 400 on a schema failure', () => {
    const res = fakeRes();
    const parsed = SymbolParam.safeParse('BTC/USDT');
    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    errorHandler(parsed.error, fakeReq('GET', '/x'), res as unknown as Response, next);
    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
  });

  it('answers 500 INTERNAL_ERROR on anything else', () => {
    const res = fakeRes();
    errorHandler(new Error('pool exhausted'), fakeReq('GET', '/x'), res as unknown as Response, next);
    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: { code: 'INTERNAL_ERROR', message: 'pool exhausted' } });
  });
});

describe('webhook bodies', () => {
  it('accepts a sentiment score with an ISO bucket', () => {
    expect(SentimentBody.parse({ bucketTime: '2024-01-01T12:00:00Z', score: -0.35 }))
      .toEqual({ bucketTime: '2024-01-01T12:00:00Z', score: -0.35 });
  });

  it('rejects a score outside [-1, 1]', () => {
    expect(SentimentBody.safeParse({ bucketTime: 1704110400, score: 1.5 }).success).toBe(false);
  });

  it('requires at least one forecast item', () => {
    expect(WebhookForecastsBody.safeParse({ items: [] }).success).toBe(false);
    expect(WebhookForecastsBody.safeParse({
      items: [{ forecastTime: 1704110460, predictedPrice: 101.2, lowerBound: null }],
    }).success).toBe(true);
  });
});
