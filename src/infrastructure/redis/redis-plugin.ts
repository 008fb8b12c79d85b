import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';

export interface RedisPluginOptions {
  redisUrl: string;
}

/**
 * Owns the submission edge's Redis connection: opened before routes are
 * registered, quit when the server closes. Exposed as `fastify.redis`.
 */
async function redisPlugin(fastify: FastifyInstance, opts: RedisPluginOptions): Promise<void> {
  const redis = new Redis(opts.redisUrl, {
    maxRetriesPerRequest: null,   // required for streams (no auto-fail)
    enableReadyCheck: true,
    lazyConnect: true,
  });

  const target = new URL(opts.redisUrl).host;
  redis.on('error', (err: Error) => {
    fastify.log.error({ err, target }, 'Redis connection error');
  });

  await redis.connect();
  fastify.log.info({ target }, 'Redis connected');

  fastify.decorate('redis', redis);

  fastify.addHook('onClose', async () => {
    await redis.quit();
    fastify.log.info({ target }, 'Redis disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.redis` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}
