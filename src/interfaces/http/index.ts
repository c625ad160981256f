export { default as queryRoutes } from './query-routes.js';
export { default as metricsRoutes } from './metrics-routes.js';
export { default as telemetryRoutes } from './telemetry-routes.js';
