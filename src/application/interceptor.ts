import type { BaseLogger } from 'pino';
import type { RequestMetadata } from '../domain/index.js';
import type { TelemetryTap } from './telemetry-tap.js';

/** The one capability the interceptor needs from its host. */
export interface RequestHandler<Req, Res> {
  handle(request: Req): Promise<Res>;
}

/** Wall clock for `observedAt` plus a monotonic clock for durations. */
export interface Clock {
  now(): Date;
  monotonicMs(): number;
}

export const systemClock: Clock = {
  now: () => new Date(),
  monotonicMs: () => performance.now(),
};

export interface InterceptorOptions<Req, Res> {
  next: RequestHandler<Req, Res>;
  /** Reads the request's observable attributes. Must not mutate the request. */
  describe: (request: Req) => RequestMetadata;
  tap: TelemetryTap;
  log: BaseLogger;
  clock?: Clock;
}

/**
 * Wraps a downstream handler by composition.
 *
 * Every call forwards to `next.handle` exactly once and returns its
 * response (or rethrows its error) untouched. The record is captured after
 * the downstream call settles, so its duration covers downstream work.
 * Telemetry failures are logged and never reach the caller.
 */
export class Interceptor<Req, Res> implements RequestHandler<Req, Res> {
  private readonly next: RequestHandler<Req, Res>;
  private readonly describe: (request: Req) => RequestMetadata;
  private readonly tap: TelemetryTap;
  private readonly log: BaseLogger;
  private readonly clock: Clock;

  constructor(options: InterceptorOptions<Req, Res>) {
    this.next = options.next;
    this.describe = options.describe;
    this.tap = options.tap;
    this.log = options.log;
    this.clock = options.clock ?? systemClock;
  }

  async handle(request: Req): Promise<Res> {
    const observedAt = this.clock.now();
    const startedAt = this.clock.monotonicMs();

    try {
      return await this.next.handle(request);
    } finally {
      this.record(request, observedAt, this.clock.monotonicMs() - startedAt);
    }
  }

  private record(request: Req, observedAt: Date, durationMs: number): void {
    let metadata: RequestMetadata;
    try {
      metadata = this.describe(request);
    } catch (err: unknown) {
      this.log.error({ err }, 'Failed to read request metadata, skipping telemetry');
      return;
    }
    this.tap.capture(metadata, observedAt, durationMs);
  }
}
