import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { RequestRecord } from '../../domain/index.js';
import {
  BoundedQueue,
  IngestionWorker,
  TelemetryTap,
} from '../../application/index.js';
import type { SinkConnector } from '../../application/index.js';
import { parseTelemetryConfig } from '../../config.js';
import type { TelemetryConfigInput } from '../../config.js';
import { PostgresSinkConnector } from '../sink/index.js';
import { describeIncomingMessage } from './request-metadata.js';

export interface TelemetryPluginOptions {
  config: TelemetryConfigInput;
  /** Replaces the PostgreSQL connector, e.g. with an in-process fake. */
  connector?: SinkConnector;
}

export interface Telemetry {
  queue: BoundedQueue<RequestRecord>;
  tap: TelemetryTap;
  worker: IngestionWorker;
}

/**
 * Fastify plugin that records every request into the telemetry pipeline.
 *
 * `onRequest` stamps the start instant; `onResponse` builds the record from
 * the raw request and Fastify's elapsed time and hands it to the tap. Neither
 * hook awaits anything, and neither can fail the request.
 *
 * Owns the queue and the ingestion worker. The worker starts on
 * registration and is stopped from `onClose` with a drain bounded by
 * `drainTimeoutMs`. Paths under `ignorePathPrefixes` (by default the
 * telemetry and request-log API) are not recorded.
 */
async function telemetryPlugin(fastify: FastifyInstance, options: TelemetryPluginOptions): Promise<void> {
  const config = parseTelemetryConfig(options.config);
  const log = fastify.log.child({ component: 'telemetry' });

  const queue = new BoundedQueue<RequestRecord>(config.queueCapacity);
  const tap = new TelemetryTap(queue, log);
  const connector = options.connector ?? new PostgresSinkConnector({
    databaseUrl: config.databaseUrl,
    ensureSchema: config.ensureSchema,
    log,
  });
  const worker = new IngestionWorker({
    queue,
    connector,
    log,
    backoffMs: config.backoffMs,
    maxBackoffMs: config.maxBackoffMs,
  });
  const ignoredPaths = new Set(config.ignorePaths);
  const ignoredPrefixes = config.ignorePathPrefixes;

  // A prefix covers the path itself and everything below it
  function isIgnored(path: string): boolean {
    if (ignoredPaths.has(path)) return true;
    return ignoredPrefixes.some((prefix) => path === prefix || path.startsWith(prefix.endsWith('/') ? prefix : `${prefix}/`));
  }

  fastify.decorate('telemetry', { queue, tap, worker });
  fastify.decorateRequest('telemetryObservedAt', null);

  fastify.addHook('onRequest', (request, _reply, done) => {
    request.telemetryObservedAt = new Date();
    done();
  });

  fastify.addHook('onResponse', (request, reply, done) => {
    captureRequest(request, reply);
    done();
  });

  fastify.addHook('onClose', async () => {
    await worker.stop({ drain: true, timeoutMs: config.drainTimeoutMs });
    fastify.log.info(tap.stats(), 'Telemetry pipeline stopped');
  });

  function captureRequest(request: FastifyRequest, reply: FastifyReply): void {
    try {
      const metadata = describeIncomingMessage(request.raw);
      if (isIgnored(metadata.path)) return;

      const durationMs = reply.elapsedTime;
      const observedAt = request.telemetryObservedAt ?? new Date(Date.now() - durationMs);
      tap.capture(metadata, observedAt, durationMs);
    } catch (err: unknown) {
      log.error({ err }, 'Failed to capture request telemetry');
    }
  }

  worker.start();
}

export default fp(telemetryPlugin, {
  name: 'telemetry',
  fastify: '5.x',
});

/** Extend Fastify's type system with the pipeline handles and the per-request start instant. */
declare module 'fastify' {
  interface FastifyInstance {
    telemetry: Telemetry;
  }

  interface FastifyRequest {
    telemetryObservedAt: Date | null;
  }
}
