import {
  pgTable,
  serial,
  inet,
  text,
  timestamp,
  varchar,
  bigint,
  interval,
  index,
} from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `request_logs` table.
 *
 * One row per observed request. `id` is database-assigned; nothing in the
 * pipeline relies on it, so duplicate-free delivery comes from the queue's
 * destructive dequeue rather than a natural key.
 */
export const requestLogs = pgTable('request_logs', {
  id: serial('id').primaryKey(),
  ip: inet('ip').notNull(),
  user_agent: text('user_agent'),
  path: text('path').notNull(),
  request_time: timestamp('request_time', { withTimezone: true }).notNull(),
  method: varchar('method', { length: 10 }).notNull(),
  protocol: varchar('protocol', { length: 10 }).notNull(),
  host: text('host').notNull(),
  accept_language: text('accept_language'),
  referer: text('referer'),
  content_type: text('content_type'),
  content_length: bigint('content_length', { mode: 'number' }),
  response_time: interval('response_time').notNull(),
}, (table) => [
  index('idx_request_logs_request_time').on(table.request_time),
  index('idx_request_logs_path').on(table.path),
  index('idx_request_logs_ip').on(table.ip),
]);

export type RequestLogRow = typeof requestLogs.$inferSelect;
