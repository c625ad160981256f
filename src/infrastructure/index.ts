export { dbPlugin, createDbClient, ensureSchema, requestLogs } from './db/index.js';
export type { Database, DbClient, RequestLogRow } from './db/index.js';
export { PostgresSinkConnector, toRowParams, classifySinkError } from './sink/index.js';
export type { PostgresSinkOptions } from './sink/index.js';
export { telemetryPlugin, describeIncomingMessage } from './http/index.js';
export type { TelemetryPluginOptions, Telemetry } from './http/index.js';
