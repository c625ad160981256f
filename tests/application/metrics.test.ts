import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/infrastructure/db/index.js', () => ({
  queryMetrics: vi.fn(),
}));

import { getMetrics } from '../../src/application/metrics.js';
import { metricsQuerySchema } from '../../src/application/metrics-schema.js';
import { queryMetrics } from '../../src/infrastructure/db/index.js';

const mockQueryMetrics = vi.mocked(queryMetrics);
const fakeDb = {} as import('../../src/infrastructure/db/index.js').Database;
const NOW = new Date('2026-02-18T12:00:00.000Z');

beforeEach(() => {
  vi.clearAllMocks();
});

// ── metricsQuerySchema ───────────────────────────────────

describe('metricsQuerySchema', () => {
  it('defaults to a 60 second window grouped by path', () => {
    expect(metricsQuerySchema.parse({})).toEqual({ window_seconds: 60, group_by: 'path' });
  });

  it('coerces the window and upper-cases the method', () => {
    expect(metricsQuerySchema.parse({ window_seconds: '300', group_by: 'host', method: ' get ', host: 'api.test' }))
      .toEqual({ window_seconds: 300, group_by: 'host', method: 'GET', host: 'api.test' });
  });

  it.each([
    ['5', 'window_seconds must be between 10 and 3600'],
    ['3601', 'window_seconds must be between 10 and 3600'],
    ['30.5', 'window_seconds must be an integer'],
    ['soon', 'window_seconds must be an integer'],
  ])('rejects window_seconds=%s', (window_seconds, message) => {
    const parsed = metricsQuerySchema.safeParse({ window_seconds });

    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues.map((issue) => issue.message)).toEqual([message]);
  });

  it('rejects an unknown group_by', () => {
    const parsed = metricsQuerySchema.safeParse({ group_by: 'user_agent' });

    expect(parsed.error?.issues.map((issue) => issue.message)).toEqual([
      'group_by must be one of: path, method, host',
    ]);
  });
});

// ── getMetrics ───────────────────────────────────────────

describe('getMetrics', () => {
  it('queries the window ending now and derives rates, busiest first', async () => {
    mockQueryMetrics.mockResolvedValue([
      { key: '/health', count: 7, avg_response_ms: 0.8 },
      { key: '/orders', count: 30, avg_response_ms: 12.5 },
    ]);

    const result = await getMetrics(fakeDb, { window_seconds: 60, group_by: 'path', method: 'GET' }, NOW);

    expect(mockQueryMetrics).toHaveBeenCalledWith(fakeDb, {
      from: new Date('2026-02-18T11:59:00.000Z'),
      to: NOW,
      group_by: 'path',
      method: 'GET',
      host: undefined,
    });
    expect(result).toEqual({
      window_seconds: 60,
      group_by: 'path',
      from: '2026-02-18T11:59:00.000Z',
      to: '2026-02-18T12:00:00.000Z',
      metrics: [
        { key: '/orders', count: 30, rate_per_sec: 0.5, avg_response_ms: 12.5 },
        { key: '/health', count: 7, rate_per_sec: 0.1167, avg_response_ms: 0.8 },
      ],
    });
  });

  it('keeps groups whose column is absent', async () => {
    mockQueryMetrics.mockResolvedValue([{ key: null, count: 10, avg_response_ms: 2 }]);

    const result = await getMetrics(fakeDb, { window_seconds: 10, group_by: 'host' }, NOW);

    expect(result.metrics).toEqual([{ key: null, count: 10, rate_per_sec: 1, avg_response_ms: 2 }]);
  });
});
