import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { isIP } from 'node:net';
import { listRequests, getRequest } from '../../application/query-requests.js';

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values, `NaN` for malformed ones.
 */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/**
 * Returns true if `value` is a valid ISO-8601 date string.
 */
function isValidIso(value: string): boolean {
  const ms = Date.parse(value);
  return Number.isFinite(ms);
}

/**
 * Read-only query API over persisted request logs.
 *
 * GET /api/v1/requests       paginated list with filters
 * GET /api/v1/requests/:id   single row by id
 */
async function queryRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * GET /api/v1/requests
   *
   * Query params: limit, offset, path (prefix), ip, method, from, to
   */
  fastify.get(
    '/api/v1/requests',
    async (
      request: FastifyRequest<{
        Querystring: {
          limit?: string;
          offset?: string;
          path?: string;
          ip?: string;
          method?: string;
          from?: string;
          to?: string;
        };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      const limit = safeInt(q.limit);
      const offset = safeInt(q.offset);

      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }
      if (offset !== undefined && Number.isNaN(offset)) {
        return reply.status(400).send({ error: 'offset must be an integer' });
      }

      // An invalid inet literal would fail the query itself
      if (q.ip !== undefined && isIP(q.ip) === 0) {
        return reply.status(400).send({ error: 'ip must be a valid IPv4 or IPv6 address' });
      }

      // Validate from/to: must be parseable ISO-8601, and from <= to
      if (q.from !== undefined && !isValidIso(q.from)) {
        return reply.status(400).send({ error: 'from must be a valid ISO-8601 timestamp' });
      }
      if (q.to !== undefined && !isValidIso(q.to)) {
        return reply.status(400).send({ error: 'to must be a valid ISO-8601 timestamp' });
      }
      if (q.from !== undefined && q.to !== undefined && Date.parse(q.from) > Date.parse(q.to)) {
        return reply.status(400).send({ error: 'from must not be after to' });
      }

      const result = await listRequests(fastify.db, {
        limit,
        offset,
        path: q.path,
        ip: q.ip,
        method: q.method,
        from: q.from,
        to: q.to,
      });

      return reply.status(200).send(result);
    },
  );

  /**
   * GET /api/v1/requests/:id
   */
  fastify.get(
    '/api/v1/requests/:id',
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const id = safeInt(request.params.id);
      if (id === undefined || Number.isNaN(id) || id < 1) {
        return reply.status(400).send({ error: 'id must be a positive integer' });
      }

      const row = await getRequest(fastify.db, id);

      if (row === null) {
        return reply.status(404).send({ error: 'Request log not found' });
      }

      return reply.status(200).send(row);
    },
  );
}

export default fp(queryRoutes, {
  name: 'query-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
