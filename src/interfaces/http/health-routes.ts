import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

/**
 * GET /api/v1/health: liveness plus cache counters.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { cache } = fastify.engine;
      return reply.status(200).send({
        status: 'ok',
        cache: cache === undefined
          ? null
          : { size: cache.size, hits: cache.hits, misses: cache.misses },
      });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['engine'],
  fastify: '5.x',
});
