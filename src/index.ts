import Fastify from 'fastify';
import pino from 'pino';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { ConfigurationError } from './domain/index.js';
import { dbPlugin, telemetryPlugin } from './infrastructure/index.js';
import { metricsRoutes, queryRoutes, telemetryRoutes } from './interfaces/http/index.js';

/** Grace period for the telemetry drain before the process is forced down. */
const SHUTDOWN_GRACE_MS = 10_000;

/**
 * Bootstrap Fastify server.
 *
 * Order:
 * 1) Load configuration (fatal on error)
 * 2) Telemetry pipeline + read-side database pool
 * 3) HTTP routes
 * 4) Shutdown signals
 * 5) listen()
 */
async function main(config: AppConfig): Promise<void> {
  const fastify = Fastify({
    logger: {
      level: config.server.logLevel,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(telemetryPlugin, { config: config.telemetry });
  await fastify.register(dbPlugin, { databaseUrl: config.telemetry.databaseUrl });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(telemetryRoutes);
  await fastify.register(queryRoutes);
  await fastify.register(metricsRoutes);

  // --------------------------------------------------
  // Graceful shutdown on SIGINT / SIGTERM
  // --------------------------------------------------

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    fastify.log.info({ signal }, 'Shutting down...');

    // Force exit if the drain hangs on an unresponsive sink
    setTimeout(() => {
      fastify.log.warn('Shutdown grace period elapsed, forcing exit');
      process.exit(1);
    }, SHUTDOWN_GRACE_MS).unref();

    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });
}

let config: AppConfig;
try {
  config = loadConfig();
} catch (err: unknown) {
  const log = pino();
  if (err instanceof ConfigurationError) {
    log.fatal({ err }, 'Refusing to start: invalid configuration');
  } else {
    log.fatal({ err }, 'Failed to load configuration');
  }
  process.exit(1);
}

main(config).catch((err: unknown) => {
  pino().fatal({ err }, 'Fatal: failed to start server');
  process.exit(1);
});
