import { hostname } from 'node:os';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { MessageFields, RawMessage } from '../../domain/index.js';

export interface SubmitRoutesOptions {
  /** Persists a captured submission; resolves with the stream entry id. */
  enqueue: (message: RawMessage) => Promise<string>;
  contentField?: string;
  uriField?: string;
}

/** Request headers carried onto the raw message, keyed by field name. */
const CAPTURED_HEADERS = {
  'X-Forwarded-For': 'x-forwarded-for',
  'Host': 'host',
  'DNT': 'dnt',
  'Date': 'date',
  'X-PingSender-Version': 'x-pingsender-version',
} as const;

const EDGE_LOGGER = 'submission_edge';

/**
 * Registers the submission edge.
 *
 * POST /submit/* captures body and client metadata onto the raw stream.
 *
 * The body is taken as raw bytes whatever the declared content type
 * (pings arrive gzipped and as JSON alike); decoding happens in the worker.
 * The route answers only after the raw stream accepted the entry.
 */
async function submitRoutes(fastify: FastifyInstance, opts: SubmitRoutesOptions): Promise<void> {
  const contentField = opts.contentField ?? 'content';
  const uriField = opts.uriField ?? 'uri';
  const host = hostname();

  await fastify.register(async (scope) => {
    scope.removeAllContentTypeParsers();
    scope.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
      done(null, body);
    });

    scope.post(
      '/submit/*',
      async (request: FastifyRequest, reply: FastifyReply) => {
        const fields: MessageFields = {
          [contentField]: Buffer.isBuffer(request.body) ? request.body : new Uint8Array(0),
          [uriField]: request.url.split('?')[0] ?? request.url,
          RemoteAddr: request.ip,
        };

        for (const [field, header] of Object.entries(CAPTURED_HEADERS)) {
          const value = headerValue(request.headers[header]);
          if (value !== undefined) fields[field] = value;
        }

        const message: RawMessage = {
          timestamp: BigInt(Date.now()) * 1_000_000n,
          logger: EDGE_LOGGER,
          hostname: host,
          fields,
        };

        try {
          await opts.enqueue(message);
        } catch (err: unknown) {
          request.log.error({ err, uri: fields[uriField] }, 'Failed to enqueue submission');
          return reply.status(503).type('text/plain').send('Service Unavailable');
        }

        return reply.status(200).type('text/plain').send('OK');
      },
    );
  });
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value.join(', ') : value;
}

export default fp(submitRoutes, {
  name: 'submit-routes',
  fastify: '5.x',
});
