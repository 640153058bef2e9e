import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /health — batch worker status.
 *
 * 200 while the worker runs; 503 once it has stopped, since every
 * submission is refused from then on.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const status = fastify.pipeline.status();

      if (status.worker === 'shutdown') {
        return reply.status(503).send({ status: 'degraded', ...status });
      }

      return reply.status(200).send({ status: 'ok', ...status });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
