import type { Database, RequestLogQueryFilters } from '../infrastructure/db/index.js';
import { queryRequestLogs, findRequestLogById } from '../infrastructure/db/index.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

export interface ListRequestsParams {
  limit?: number;
  offset?: number;
  path?: string;
  ip?: string;
  method?: string;
  from?: string;
  to?: string;
}

/**
 * Use case: list persisted request logs with pagination and filters.
 * Clamps limit to [1, 500], defaults to 50. `path` is a prefix match and
 * `method` is compared upper-cased.
 */
export async function listRequests(db: Database, params: ListRequestsParams) {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);

  const filters: RequestLogQueryFilters = {};
  if (params.path !== undefined) filters.path_prefix = params.path;
  if (params.ip !== undefined) filters.ip = params.ip;
  if (params.method !== undefined) filters.method = params.method.toUpperCase();
  if (params.from !== undefined) filters.from = params.from;
  if (params.to !== undefined) filters.to = params.to;

  const data = await queryRequestLogs(db, filters, { limit, offset });

  return {
    data,
    pagination: { limit, offset, count: data.length },
  };
}

/**
 * Use case: fetch a single request log by id.
 * Returns null if not found.
 */
export async function getRequest(db: Database, id: number) {
  const row = await findRequestLogById(db, id);
  return row ?? null;
}
