import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../src/infrastructure/db/index.js', () => ({
  queryRequestLogs: vi.fn(),
  findRequestLogById: vi.fn(),
  queryMetrics: vi.fn(),
}));

import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import queryRoutes from '../../src/interfaces/http/query-routes.js';
import metricsRoutes from '../../src/interfaces/http/metrics-routes.js';
import { findRequestLogById, queryMetrics, queryRequestLogs } from '../../src/infrastructure/db/index.js';

const fakeDb = {} as import('../../src/infrastructure/db/index.js').Database;

let app: FastifyInstance;

beforeEach(async () => {
  vi.clearAllMocks();
  vi.mocked(queryRequestLogs).mockResolvedValue([]);
  vi.mocked(queryMetrics).mockResolvedValue([]);
  vi.mocked(findRequestLogById).mockResolvedValue(undefined);

  app = Fastify({ logger: false });
  await app.register(fp(async (instance) => {
    instance.decorate('db', fakeDb);
  }, { name: 'db' }));
  await app.register(queryRoutes);
  await app.register(metricsRoutes);
  await app.ready();
});

afterEach(async () => {
  await app.close();
});

describe('GET /api/v1/requests', () => {
  it('lists with pagination', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v1/requests?limit=5&offset=10&method=get' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ data: [], pagination: { limit: 5, offset: 10, count: 0 } });
    expect(queryRequestLogs).toHaveBeenCalledWith(fakeDb, { method: 'GET' }, { limit: 5, offset: 10 });
  });

  it.each([
    ['limit=abc', 'limit must be an integer'],
    ['offset=1.5', 'offset must be an integer'],
    ['ip=not-an-ip', 'ip must be a valid IPv4 or IPv6 address'],
    ['from=yesterday', 'from must be a valid ISO-8601 timestamp'],
    ['to=soon', 'to must be a valid ISO-8601 timestamp'],
    ['from=2026-02-18T12:00:00Z&to=2026-02-18T11:00:00Z', 'from must not be after to'],
  ])('rejects %s', async (query, error) => {
    const response = await app.inject({ method: 'GET', url: `/api/v1/requests?${query}` });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error });
    expect(queryRequestLogs).not.toHaveBeenCalled();
  });
});

describe('GET /api/v1/requests/:id', () => {
  it('returns 404 for a missing row', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v1/requests/42' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'Request log not found' });
    expect(findRequestLogById).toHaveBeenCalledWith(fakeDb, 42);
  });

  it('rejects a non-positive id', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v1/requests/0' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'id must be a positive integer' });
  });
});

describe('GET /api/v1/requests/metrics', () => {
  it('returns grouped metrics', async () => {
    vi.mocked(queryMetrics).mockResolvedValue([{ key: 'GET', count: 20, avg_response_ms: 3 }]);

    const response = await app.inject({ method: 'GET', url: '/api/v1/requests/metrics?window_seconds=10&group_by=method' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      window_seconds: 10,
      group_by: 'method',
      metrics: [{ key: 'GET', count: 20, rate_per_sec: 2, avg_response_ms: 3 }],
    });
  });

  it('rejects an out-of-range window', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v1/requests/metrics?window_seconds=5' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: 'Invalid metrics query',
      issues: ['window_seconds must be between 10 and 3600'],
    });
    expect(queryMetrics).not.toHaveBeenCalled();
  });

  it('rejects an unknown group_by', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v1/requests/metrics?group_by=ip' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: 'Invalid metrics query',
      issues: ['group_by must be one of: path, method, host'],
    });
  });
});
