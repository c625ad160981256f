import type { RequestRecord } from '../domain/index.js';

export type SinkState = 'disconnected' | 'connected-idle' | 'connected-prepared';

/**
 * Lifecycle of one durable-storage connection.
 *
 * Owned by the ingestion worker alone; implementations need no locking.
 * Implementations report failures and never retry or swallow them: `open`
 * and `verify` reject with ConnectionError, `write` with WriteError for a
 * row-level failure or ConnectionError when the connection is gone.
 */
export interface SinkConnector {
  readonly state: SinkState;
  open(): Promise<void>;
  verify(): Promise<void>;
  write(record: RequestRecord): Promise<void>;
  /** Idempotent. Never rejects. */
  close(): Promise<void>;
}
