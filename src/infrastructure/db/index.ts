export { requestLogs } from './schema.js';
export type { RequestLogRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient, DbClientOptions, SqlClient } from './client.js';
export { ensureSchema, REQUEST_LOGS_DDL } from './ensure-schema.js';
export { prepareRequestLogInsert, INSERT_REQUEST_LOG_STATEMENT } from './request-log-repository.js';
export type { RequestLogParams, PreparedRequestLogInsert } from './request-log-repository.js';
export { queryRequestLogs, findRequestLogById, escapeLikePattern } from './request-log-query-repository.js';
export type { RequestLogQueryFilters, PaginationParams } from './request-log-query-repository.js';
export { queryMetrics } from './metrics-repository.js';
export type { MetricsFilters, MetricsBucket, MetricsGroupBy } from './metrics-repository.js';
export { default as dbPlugin } from './db-plugin.js';
