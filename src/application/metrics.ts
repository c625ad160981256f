import type { Database, MetricsGroupBy } from '../infrastructure/db/index.js';
import { queryMetrics } from '../infrastructure/db/index.js';
import type { MetricsQuery } from './metrics-schema.js';

export interface MetricsEntry {
  key: string | null;
  count: number;
  rate_per_sec: number;
  avg_response_ms: number;
}

export interface MetricsResult {
  window_seconds: number;
  group_by: MetricsGroupBy;
  from: string;
  to: string;
  metrics: MetricsEntry[];
}

/** Requests per second over the window, to four decimals. */
function ratePerSecond(count: number, windowSeconds: number): number {
  return Math.round((count / windowSeconds) * 10_000) / 10_000;
}

/**
 * Use case: traffic served in the trailing `window_seconds` before `now`,
 * grouped by path, method or host, busiest group first.
 */
export async function getMetrics(
  db: Database,
  query: MetricsQuery,
  now: Date = new Date(),
): Promise<MetricsResult> {
  const from = new Date(now.getTime() - query.window_seconds * 1000);

  const buckets = await queryMetrics(db, {
    from,
    to: now,
    group_by: query.group_by,
    method: query.method,
    host: query.host,
  });

  const metrics = buckets
    .map((bucket): MetricsEntry => ({
      key: bucket.key,
      count: bucket.count,
      rate_per_sec: ratePerSecond(bucket.count, query.window_seconds),
      avg_response_ms: bucket.avg_response_ms,
    }))
    .sort((a, b) => b.count - a.count);

  return {
    window_seconds: query.window_seconds,
    group_by: query.group_by,
    from: from.toISOString(),
    to: now.toISOString(),
    metrics,
  };
}
