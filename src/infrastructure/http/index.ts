export { default as telemetryPlugin } from './telemetry-plugin.js';
export type { TelemetryPluginOptions, Telemetry } from './telemetry-plugin.js';
export {
  describeIncomingMessage,
  formatPeerAddress,
  parseContentLength,
  requestPath,
} from './request-metadata.js';
