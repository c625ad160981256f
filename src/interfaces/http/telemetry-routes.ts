import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /api/v1/telemetry/health: pipeline status.
 *
 * 200 while the worker is draining into the sink, 503 while it is
 * connecting, backing off or stopped. Request serving is unaffected either way.
 */
async function telemetryRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/v1/telemetry/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { queue, tap, worker } = fastify.telemetry;
      const workerStats = worker.stats();
      const healthy = workerStats.state === 'draining';

      return reply.status(healthy ? 200 : 503).send({
        status: healthy ? 'ok' : 'degraded',
        worker: workerStats,
        queue: { size: queue.size, capacity: queue.capacity, closed: queue.closed },
        tap: tap.stats(),
      });
    },
  );
}

export default fp(telemetryRoutes, {
  name: 'telemetry-routes',
  dependencies: ['telemetry'],
  fastify: '5.x',
});
