/**
 * Error taxonomy for the ingestion pipeline.
 *
 * Queue saturation is deliberately absent: a full queue is an expected
 * condition under load and is reported by `tryEnqueue` returning false.
 */

/** Invalid or missing configuration. Fatal at startup. */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * The sink is unreachable or the connection dropped.
 * The worker recovers by closing the connector and reconnecting after a backoff.
 */
export class ConnectionError extends Error {
  override readonly name = 'ConnectionError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A single record failed to persist. The worker skips it and keeps draining. */
export class WriteError extends Error {
  override readonly name = 'WriteError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Raised to a waiting consumer when the queue is closed and empty. */
export class QueueClosedError extends Error {
  override readonly name = 'QueueClosedError';

  constructor() {
    super('Queue is closed');
  }
}
