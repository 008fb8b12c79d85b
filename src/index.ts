import Fastify from 'fastify';
import { redisPlugin, enqueueRawMessage, loadTransportConfig } from './infrastructure/index.js';
import { submitRoutes, healthRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap the submission edge.
 *
 * Order:
 * 1) Infrastructure plugins
 * 2) HTTP routes
 * 3) listen()
 */
async function main(): Promise<void> {
  const transport = loadTransportConfig();

  const fastify = Fastify({
    logger: {
      level: process.env['LOG_LEVEL'] ?? 'info',
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin, { redisUrl: transport.redisUrl });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(submitRoutes, {
    enqueue: (message) => enqueueRawMessage(fastify.redis, transport.rawStream, message),
    contentField: process.env['CONTENT_FIELD'] ?? 'content',
    uriField: process.env['URI_FIELD'] ?? 'uri',
  });
  await fastify.register(healthRoutes);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 3000);

  await fastify.listen({ host, port });

  const close = (): void => {
    fastify.close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        fastify.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', close);
  process.on('SIGTERM', close);
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
