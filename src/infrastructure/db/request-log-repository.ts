import { sql } from 'drizzle-orm';
import type { Database } from './client.js';
import { requestLogs } from './schema.js';

/**
 * Driver-level parameters for one `request_logs` row.
 * Declared as a type alias: it must satisfy the prepared statement's
 * `Record<string, unknown>` parameter.
 */
export type RequestLogParams = {
  ip: string;
  user_agent: string | null;
  path: string;
  request_time: Date;
  method: string;
  protocol: string;
  host: string;
  accept_language: string | null;
  referer: string | null;
  content_type: string | null;
  content_length: number | null;
  /** Postgres interval literal, e.g. `12 milliseconds`. */
  response_time: string;
};

export const INSERT_REQUEST_LOG_STATEMENT = 'insert_request_log';

/**
 * Builds the named, parameterised insert reused for every row on a
 * connection. postgres.js caches the parsed statement per connection,
 * so each execute only ships parameters.
 */
export function prepareRequestLogInsert(db: Database) {
  return db
    .insert(requestLogs)
    .values({
      ip: sql.placeholder('ip'),
      user_agent: sql.placeholder('user_agent'),
      path: sql.placeholder('path'),
      request_time: sql.placeholder('request_time'),
      method: sql.placeholder('method'),
      protocol: sql.placeholder('protocol'),
      host: sql.placeholder('host'),
      accept_language: sql.placeholder('accept_language'),
      referer: sql.placeholder('referer'),
      content_type: sql.placeholder('content_type'),
      content_length: sql.placeholder('content_length'),
      response_time: sql.placeholder('response_time'),
    })
    .prepare(INSERT_REQUEST_LOG_STATEMENT);
}

export type PreparedRequestLogInsert = ReturnType<typeof prepareRequestLogInsert>;
