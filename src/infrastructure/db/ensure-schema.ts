import type { SqlClient } from './client.js';

/**
 * Idempotent DDL for the `request_logs` table and its indexes.
 *
 * Mirrors schema.ts. In production drizzle-kit migrations own the schema;
 * this guarantees the table exists on first run against an empty database.
 */
export const REQUEST_LOGS_DDL: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS request_logs (
    id               SERIAL PRIMARY KEY,
    ip               INET NOT NULL,
    user_agent       TEXT,
    path             TEXT NOT NULL,
    request_time     TIMESTAMPTZ NOT NULL,
    method           VARCHAR(10) NOT NULL,
    protocol         VARCHAR(10) NOT NULL,
    host             TEXT NOT NULL,
    accept_language  TEXT,
    referer          TEXT,
    content_type     TEXT,
    content_length   BIGINT,
    response_time    INTERVAL NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_request_logs_request_time ON request_logs (request_time)',
  'CREATE INDEX IF NOT EXISTS idx_request_logs_path ON request_logs (path)',
  'CREATE INDEX IF NOT EXISTS idx_request_logs_ip ON request_logs (ip)',
];

export async function ensureSchema(sql: Pick<SqlClient, 'unsafe'>): Promise<void> {
  for (const statement of REQUEST_LOGS_DDL) {
    await sql.unsafe(statement);
  }
}
