import { ConnectionError, WriteError } from '../../domain/index.js';

/** postgres.js client-side connection codes. */
const CLIENT_CONNECTION_CODES = new Set([
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
]);

/** Node socket errno codes. */
const SOCKET_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
]);

/** SQLSTATEs outside class 08 that mean the server is going away. */
const SERVER_SHUTDOWN_STATES = new Set(['57P01', '57P02', '57P03']);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * True when the failure means the connection (and with it the prepared
 * statement) is unusable, as opposed to one row being rejected.
 */
export function isConnectivityFailure(err: unknown): boolean {
  const code = errorCode(err);
  if (code === undefined) return false;
  return CLIENT_CONNECTION_CODES.has(code)
    || SOCKET_CODES.has(code)
    || SERVER_SHUTDOWN_STATES.has(code)
    || /^08[0-9A-Z]{3}$/.test(code);
}

/** Wraps a driver error in the pipeline's taxonomy, keeping it as `cause`. */
export function classifySinkError(err: unknown): ConnectionError | WriteError {
  if (err instanceof ConnectionError || err instanceof WriteError) return err;

  const detail = err instanceof Error ? err.message : String(err);
  if (isConnectivityFailure(err)) {
    return new ConnectionError(`Sink connection failed: ${detail}`, { cause: err });
  }
  return new WriteError(`Row insert failed: ${detail}`, { cause: err });
}
