export { PostgresSinkConnector } from './postgres-sink.js';
export type { PostgresSinkOptions, DbClientFactory } from './postgres-sink.js';
export { toRowParams, toInetAddress, toIntervalLiteral } from './row-mapping.js';
export { classifySinkError, isConnectivityFailure } from './classify-error.js';
