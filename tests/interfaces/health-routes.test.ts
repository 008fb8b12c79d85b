import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { healthRoutes } from '../../src/interfaces/http/index.js';

describe('health routes', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  async function buildWith(redis: Redis): Promise<FastifyInstance> {
    const instance = Fastify({ logger: false });
    // Stands in for the redis plugin without opening a connection
    await instance.register(fp(async (f: FastifyInstance) => {
      f.decorate('redis', redis);
    }, { name: 'redis' }));
    await instance.register(healthRoutes);
    app = instance;
    return instance;
  }

  it('reports ok when Redis answers', async () => {
    const redis = new Redis({ lazyConnect: true });
    vi.spyOn(redis, 'ping').mockResolvedValue('PONG');

    const res = await (await buildWith(redis)).inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', redis: 'PONG' });
  });

  it('reports degraded when Redis is unreachable', async () => {
    const redis = new Redis({ lazyConnect: true });
    vi.spyOn(redis, 'ping').mockRejectedValue(new Error('connect ECONNREFUSED'));

    const res = await (await buildWith(redis)).inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ status: 'degraded', redis: 'unreachable' });
  });
});
