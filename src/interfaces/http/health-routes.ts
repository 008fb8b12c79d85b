import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

/**
 * Health check: verifies Redis is reachable via PING.
 *
 * GET /health: 200 when the raw stream can be written, 503 otherwise.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        const pong = await fastify.redis.ping();
        return reply.status(200).send({ status: 'ok', redis: pong });
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Redis health check failed');
        return reply.status(503).send({ status: 'degraded', redis: 'unreachable' });
      }
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['redis'],
  fastify: '5.x',
});
