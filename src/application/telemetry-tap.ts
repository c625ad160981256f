import type { BaseLogger } from 'pino';
import type { RequestMetadata, RequestRecord } from '../domain/index.js';
import { createRequestRecord } from '../domain/index.js';
import type { BoundedQueue } from './bounded-queue.js';

export interface TapStats {
  accepted: number;
  dropped: number;
}

/**
 * Producer half of the pipeline, shared by every host adapter.
 *
 * `capture` is synchronous and never throws: it builds the record and
 * offers it to the queue. A full queue means the record is discarded with
 * one warn line; after shutdown closes the queue, discards log at debug. Nothing here performs storage I/O.
 */
export class TelemetryTap {
  private accepted = 0;
  private dropped = 0;

  constructor(
    private readonly queue: BoundedQueue<RequestRecord>,
    private readonly log: BaseLogger,
  ) {}

  capture(metadata: RequestMetadata, observedAt: Date, durationMs: number): boolean {
    let record: RequestRecord;
    try {
      record = createRequestRecord(metadata, observedAt, durationMs);
    } catch (err: unknown) {
      this.dropped++;
      this.log.error({ err }, 'Failed to build telemetry record, discarding');
      return false;
    }

    if (this.queue.tryEnqueue(record)) {
      this.accepted++;
      return true;
    }

    this.dropped++;
    if (this.queue.closed) {
      // Expected for requests still in flight during shutdown
      this.log.debug({ path: record.path, method: record.method }, 'Telemetry pipeline stopped, discarding record');
    } else {
      this.log.warn(
        { path: record.path, method: record.method, capacity: this.queue.capacity },
        'Telemetry queue full, discarding record',
      );
    }
    return false;
  }

  stats(): TapStats {
    return { accepted: this.accepted, dropped: this.dropped };
  }
}
