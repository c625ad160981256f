import { eq, and, gte, lte, count, sql, type SQL } from 'drizzle-orm';
import type { Database } from './client.js';
import { requestLogs } from './schema.js';

export type MetricsGroupBy = 'path' | 'method' | 'host';

export interface MetricsFilters {
  from: Date;
  to: Date;
  group_by: MetricsGroupBy;
  method?: string;
  host?: string;
}

export interface MetricsBucket {
  /** NULL when the grouped column is absent on the row (method or host). */
  key: string | null;
  count: number;
  avg_response_ms: number;
}

/**
 * Queries `request_logs` for grouped counts and mean latency within a time
 * window. The `request_time` range predicate uses
 * `idx_request_logs_request_time`. Rates are derived in the application layer.
 */
export async function queryMetrics(
  db: Database,
  filters: MetricsFilters,
): Promise<MetricsBucket[]> {
  const conditions: SQL[] = [
    gte(requestLogs.request_time, filters.from),
    lte(requestLogs.request_time, filters.to),
  ];

  if (filters.method !== undefined) {
    conditions.push(eq(requestLogs.method, filters.method));
  }
  if (filters.host !== undefined) {
    conditions.push(eq(requestLogs.host, filters.host));
  }

  const groupCol = filters.group_by === 'method'
    ? requestLogs.method
    : filters.group_by === 'host'
      ? requestLogs.host
      : requestLogs.path;

  const rows = await db
    .select({
      key: groupCol,
      count: count(),
      avg_response_ms: sql<string | null>`avg(extract(epoch from ${requestLogs.response_time}) * 1000)`,
    })
    .from(requestLogs)
    .where(and(...conditions))
    .groupBy(groupCol);

  return rows.map((r) => ({
    key: r.key,
    count: Number(r.count),
    avg_response_ms: r.avg_response_ms === null ? 0 : parseFloat(Number(r.avg_response_ms).toFixed(3)),
  }));
}
