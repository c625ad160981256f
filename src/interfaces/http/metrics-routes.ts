import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { getMetrics } from '../../application/metrics.js';
import { metricsQuerySchema } from '../../application/metrics-schema.js';

/**
 * GET /api/v1/requests/metrics
 *
 * Query params: window_seconds, group_by, method, host. Rejects a malformed
 * query with 400 and the zod issues.
 */
async function metricsRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/v1/requests/metrics',
    async (request: FastifyRequest<{ Querystring: Record<string, string | undefined> }>, reply: FastifyReply) => {
      const parsed = metricsQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Invalid metrics query',
          issues: parsed.error.issues.map((issue) => issue.message),
        });
      }

      return reply.status(200).send(await getMetrics(fastify.db, parsed.data));
    },
  );
}

export default fp(metricsRoutes, {
  name: 'metrics-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
