export { BoundedQueue } from './bounded-queue.js';
export { TelemetryTap } from './telemetry-tap.js';
export type { TapStats } from './telemetry-tap.js';
export { Interceptor, systemClock } from './interceptor.js';
export type { RequestHandler, Clock, InterceptorOptions } from './interceptor.js';
export type { SinkConnector, SinkState } from './sink-connector.js';
export { IngestionWorker, abortableSleep, untilAborted, DEFAULT_BACKOFF_MS, DEFAULT_DRAIN_TIMEOUT_MS } from './ingestion-worker.js';
export type {
  IngestionWorkerOptions,
  WorkerHandle,
  WorkerState,
  WorkerStats,
  StopOptions,
  Sleep,
} from './ingestion-worker.js';
export { listRequests, getRequest } from './query-requests.js';
export type { ListRequestsParams } from './query-requests.js';
export { getMetrics } from './metrics.js';
export type { MetricsEntry, MetricsResult } from './metrics.js';
export { metricsQuerySchema, METRICS_GROUP_BY } from './metrics-schema.js';
export type { MetricsQuery } from './metrics-schema.js';
