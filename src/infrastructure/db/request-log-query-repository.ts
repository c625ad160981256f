import { eq, and, gte, lte, like, desc, type SQL } from 'drizzle-orm';
import type { Database } from './client.js';
import { requestLogs } from './schema.js';

export interface RequestLogQueryFilters {
  /** Matches rows whose path starts with this value. */
  path_prefix?: string;
  ip?: string;
  method?: string;
  from?: string;   // ISO-8601, inclusive
  to?: string;     // ISO-8601, inclusive
}

export interface PaginationParams {
  limit: number;
  offset: number;
}

/** Escapes LIKE wildcards so the prefix is matched literally. */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Fetches a paginated, filtered list of request logs.
 *
 * Filters build a dynamic WHERE clause; only non-undefined filters are
 * applied. Each filter hits one of the table's indexes. Default ordering:
 * newest first (request_time DESC).
 */
export async function queryRequestLogs(
  db: Database,
  filters: RequestLogQueryFilters,
  pagination: PaginationParams,
) {
  const conditions: SQL[] = [];

  if (filters.path_prefix !== undefined) {
    conditions.push(like(requestLogs.path, `${escapeLikePattern(filters.path_prefix)}%`));
  }
  if (filters.ip !== undefined) {
    conditions.push(eq(requestLogs.ip, filters.ip));
  }
  if (filters.method !== undefined) {
    conditions.push(eq(requestLogs.method, filters.method));
  }
  if (filters.from !== undefined) {
    conditions.push(gte(requestLogs.request_time, new Date(filters.from)));
  }
  if (filters.to !== undefined) {
    conditions.push(lte(requestLogs.request_time, new Date(filters.to)));
  }

  const whereClause = conditions.length > 0 ? and(...conditions) : undefined;

  const rows = await db
    .select()
    .from(requestLogs)
    .where(whereClause)
    .orderBy(desc(requestLogs.request_time))
    .limit(pagination.limit)
    .offset(pagination.offset);

  return rows;
}

/** Fetches a single request log by id. Returns undefined if not found. */
export async function findRequestLogById(db: Database, id: number) {
  const rows = await db
    .select()
    .from(requestLogs)
    .where(eq(requestLogs.id, id))
    .limit(1);

  return rows[0];
}
