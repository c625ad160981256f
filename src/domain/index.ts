export type { RequestMetadata, RequestRecord } from './request-record.js';
export { createRequestRecord, UNKNOWN_CONTENT_LENGTH } from './request-record.js';
export { ConfigurationError, ConnectionError, WriteError, QueueClosedError } from './errors.js';
