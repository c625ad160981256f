import { vi } from 'vitest';
import type { BaseLogger } from 'pino';
import type { RequestMetadata, RequestRecord } from '../src/domain/index.js';
import { createRequestRecord } from '../src/domain/index.js';
import type { SinkConnector, SinkState } from '../src/application/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    level: 'info',
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
  } as unknown as BaseLogger;
}

/** Fixed "now" for deterministic record timestamps. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z');

let counter = 0;

/**
 * Factory for request metadata with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeMetadata(overrides: Partial<RequestMetadata> = {}): RequestMetadata {
  counter++;
  return {
    sourceAddress: '10.0.0.1:51000',
    userAgent: 'test-agent/1.0',
    path: `/items/${counter}`,
    method: 'GET',
    protocol: 'HTTP/1.1',
    host: 'api.test',
    acceptLanguage: 'en-US',
    referer: 'https://app.test/',
    contentType: 'application/json',
    contentLength: 0,
    ...overrides,
  };
}

export function makeRecord(
  overrides: Partial<RequestMetadata> = {},
  durationMs = 5,
  observedAt: Date = FIXED_NOW,
): RequestRecord {
  return createRequestRecord(makeMetadata(overrides), observedAt, durationMs);
}

/** Resolves once pending microtasks and one macrotask turn have run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * In-process SinkConnector.
 *
 * `openResults` and `verifyResults` script successive outcomes: an Error
 * rejects that attempt, `undefined` succeeds. Once exhausted every call
 * succeeds.
 * `writeImpl` overrides write() per record.
 */
export class FakeSinkConnector implements SinkConnector {
  state: SinkState = 'disconnected';
  readonly written: RequestRecord[] = [];
  openCalls = 0;
  verifyCalls = 0;
  closeCalls = 0;
  openResults: Array<Error | undefined> = [];
  verifyResults: Array<Error | undefined> = [];
  openImpl: (() => Promise<void>) | null = null;
  writeImpl: ((record: RequestRecord) => Promise<void>) | null = null;

  async open(): Promise<void> {
    this.openCalls++;
    if (this.openImpl !== null) {
      await this.openImpl();
    }
    const outcome = this.openResults.shift();
    if (outcome !== undefined) throw outcome;
    this.state = 'connected-prepared';
  }

  async verify(): Promise<void> {
    this.verifyCalls++;
    const outcome = this.verifyResults.shift();
    if (outcome !== undefined) throw outcome;
  }

  async write(record: RequestRecord): Promise<void> {
    if (this.writeImpl !== null) {
      await this.writeImpl(record);
    }
    this.written.push(record);
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.state = 'disconnected';
  }
}
