import type { BaseLogger } from 'pino';
import type { RequestRecord } from '../domain/index.js';
import { ConnectionError, QueueClosedError } from '../domain/index.js';
import type { BoundedQueue } from './bounded-queue.js';
import type { SinkConnector } from './sink-connector.js';

export const DEFAULT_BACKOFF_MS = 5000;
export const DEFAULT_DRAIN_TIMEOUT_MS = 5000;

export type WorkerState = 'idle' | 'connecting' | 'draining' | 'backoff' | 'stopped';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface IngestionWorkerOptions {
  queue: BoundedQueue<RequestRecord>;
  connector: SinkConnector;
  log: BaseLogger;
  /** Wait between a failed connection and the next attempt. */
  backoffMs?: number;
  /** When set, the wait doubles per consecutive failure up to this ceiling. */
  maxBackoffMs?: number;
  sleep?: Sleep;
}

export interface WorkerHandle {
  /** Settles when the loop exits. Never rejects. */
  readonly done: Promise<void>;
}

export interface StopOptions {
  /**
   * Close the queue and write what is already in it before exiting.
   * Honoured only while the worker is connected; otherwise queued records
   * are abandoned.
   */
  drain?: boolean;
  /**
   * Upper bound on a drain. When it elapses the worker is cancelled as if
   * stopped without drain, including any sink call still in flight.
   */
  timeoutMs?: number;
}

export interface WorkerStats {
  state: WorkerState;
  written: number;
  writeFailures: number;
  connectionFailures: number;
  consecutiveFailures: number;
  lastError: string | null;
}

/** setTimeout-based sleep that rejects with the signal's reason on abort. */
export function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settles like `task`, or rejects with the signal's reason once it aborts.
 * An abandoned task keeps running; its outcome is ignored.
 */
export function untilAborted<T>(task: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason);
    };
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    task.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Single background consumer: drains the queue into the sink connector.
 *
 * States:
 *   connecting → open() + verify(); success → draining, failure → backoff
 *   draining   → dequeue() + write(); row failure is logged and skipped,
 *                connection failure closes the connector → backoff
 *   backoff    → sleep, then connecting
 *
 * The loop only exits through stop(). Every sink call is raced against the
 * stop signal, so a hung connection cannot hold shutdown. Every failure is
 * logged and absorbed; none propagates to the request path.
 */
export class IngestionWorker {
  private readonly queue: BoundedQueue<RequestRecord>;
  private readonly connector: SinkConnector;
  private readonly log: BaseLogger;
  private readonly backoffMs: number;
  private readonly maxBackoffMs: number | undefined;
  private readonly sleep: Sleep;
  private readonly controller = new AbortController();

  private handle: WorkerHandle | null = null;
  private currentState: WorkerState = 'idle';
  private written = 0;
  private writeFailures = 0;
  private connectionFailures = 0;
  private consecutiveFailures = 0;
  private lastError: string | null = null;

  constructor(options: IngestionWorkerOptions) {
    this.queue = options.queue;
    this.connector = options.connector;
    this.log = options.log;
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
    this.maxBackoffMs = options.maxBackoffMs;
    this.sleep = options.sleep ?? abortableSleep;
  }

  get state(): WorkerState {
    return this.currentState;
  }

  /** Starts the loop once; later calls return the same handle. */
  start(): WorkerHandle {
    if (this.handle !== null) return this.handle;

    const done = this.run(this.controller.signal).catch((err: unknown) => {
      this.currentState = 'stopped';
      this.log.fatal({ err }, 'Ingestion worker crashed');
    });
    this.handle = { done };
    return this.handle;
  }

  async stop(options: StopOptions = {}): Promise<void> {
    const drain = options.drain === true && this.currentState === 'draining';
    if (!drain) {
      this.controller.abort(new Error('Ingestion worker stopped'));
    }
    // No new records either way; a draining worker exits once the queue runs dry
    this.queue.close();

    if (this.handle === null) {
      this.currentState = 'stopped';
      return;
    }
    if (!drain) {
      await this.handle.done;
      return;
    }

    const timeoutMs = options.timeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
    const timer = setTimeout(() => {
      this.log.warn({ timeoutMs, pending: this.queue.size }, 'Drain timed out, abandoning queued records');
      this.controller.abort(new Error('Ingestion worker drain timed out'));
    }, timeoutMs);
    try {
      await this.handle.done;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Computes the wait before the next connection attempt.
   * Fixed unless `maxBackoffMs` is set, in which case it doubles per
   * consecutive failure up to the ceiling.
   */
  nextBackoffMs(): number {
    if (this.maxBackoffMs === undefined) return this.backoffMs;
    const exponent = Math.max(this.consecutiveFailures - 1, 0);
    return Math.min(this.backoffMs * 2 ** exponent, this.maxBackoffMs);
  }

  stats(): WorkerStats {
    return {
      state: this.currentState,
      written: this.written,
      writeFailures: this.writeFailures,
      connectionFailures: this.connectionFailures,
      consecutiveFailures: this.consecutiveFailures,
      lastError: this.lastError,
    };
  }

  private async run(signal: AbortSignal): Promise<void> {
    this.log.info({ capacity: this.queue.capacity, backoffMs: this.backoffMs }, 'Ingestion worker started');

    while (!signal.aborted) {
      this.currentState = 'connecting';
      if (await this.connect(signal)) {
        this.currentState = 'draining';
        await this.drain(signal);
      }

      if (signal.aborted || this.queue.closed) break;

      this.currentState = 'backoff';
      await this.backoff(signal);
    }

    await this.connector.close();
    this.currentState = 'stopped';
    this.log.info(
      { written: this.written, abandoned: this.queue.size },
      'Ingestion worker stopped',
    );
  }

  private async connect(signal: AbortSignal): Promise<boolean> {
    try {
      await untilAborted(this.connector.open(), signal);
      await untilAborted(this.connector.verify(), signal);
    } catch (err: unknown) {
      // Interrupted by stop(); run() closes the connector on its way out
      if (signal.aborted) return false;

      this.recordConnectionFailure(err);
      this.log.error(
        { err, attempt: this.consecutiveFailures, retryInMs: this.nextBackoffMs() },
        'Failed to connect to sink',
      );
      await this.connector.close();
      return false;
    }

    if (this.consecutiveFailures > 0) {
      this.log.info({ attempts: this.consecutiveFailures + 1 }, 'Sink connection restored');
    } else {
      this.log.info('Sink connected');
    }
    this.consecutiveFailures = 0;
    return true;
  }

  /** Returns when the connection is lost, the signal aborts, or a closed queue runs dry. */
  private async drain(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let record: RequestRecord;
      try {
        record = await this.queue.dequeue(signal);
      } catch (err: unknown) {
        if (err instanceof QueueClosedError) {
          this.log.info({ written: this.written }, 'Telemetry queue drained');
          return;
        }
        if (signal.aborted) return;
        throw err;
      }

      try {
        await untilAborted(this.connector.write(record), signal);
        this.written++;
        this.log.debug({ path: record.path, method: record.method }, 'Request record persisted');
      } catch (err: unknown) {
        if (signal.aborted) {
          this.log.warn({ path: record.path }, 'Stopped during write, record abandoned');
          return;
        }
        if (err instanceof ConnectionError) {
          this.recordConnectionFailure(err);
          this.log.error({ err, retryInMs: this.nextBackoffMs() }, 'Sink connection lost, reconnecting');
          await this.connector.close();
          return;
        }
        // One bad row must not stop the stream
        this.writeFailures++;
        this.lastError = describeError(err);
        this.log.error({ err, path: record.path }, 'Failed to insert request record');
      }
    }
  }

  private async backoff(signal: AbortSignal): Promise<void> {
    try {
      await this.sleep(this.nextBackoffMs(), signal);
    } catch (err: unknown) {
      if (!signal.aborted) throw err;
    }
  }

  private recordConnectionFailure(err: unknown): void {
    this.connectionFailures++;
    this.consecutiveFailures++;
    this.lastError = describeError(err);
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
