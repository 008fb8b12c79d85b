import { Redis } from 'ioredis';
import pino from 'pino';
import {
  DedupeFilter,
  GeoEnricher,
  SchemaRegistry,
  TelemetryDecoder,
} from './application/index.js';
import {
  PgDedupeSnapshotStore,
  RedisStreamSink,
  createDbClient,
  ensureTables,
  loadDecoderConfig,
  loadTransportConfig,
  openMaxmindDatabase,
  restoreDedupe,
  scheduleCheckpoints,
  startConsumer,
} from './infrastructure/index.js';
import type { Sql } from './infrastructure/index.js';

/**
 * Standalone decoder process: reads raw submissions from one Redis
 * Stream, decodes them and writes canonical records to another.
 *
 * Runs independently of the submission edge and can be scaled
 * horizontally by launching instances with different WORKER_ID values.
 * With de-duping enabled, each instance keeps its own filter and
 * checkpoints it to PostgreSQL.
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

// Abort controller for graceful shutdown
const ac = new AbortController();

let redis: Redis | undefined;
let sql: Sql | undefined;
let geo: GeoEnricher | undefined;
let stopCheckpoints: (() => Promise<void>) | undefined;

async function main(): Promise<void> {
  // Invalid configuration, schemas or geo database are fatal here
  const config = loadDecoderConfig();
  const transport = loadTransportConfig();

  const schemas = SchemaRegistry.load(config.schemaPath);
  log.info({ schemaPath: config.schemaPath, docTypes: schemas.docTypes }, 'Schemas loaded');

  if (config.cityDbFile !== undefined) {
    geo = await GeoEnricher.open(config.cityDbFile, openMaxmindDatabase, log);
  }

  let dedupe: DedupeFilter | undefined;
  if (config.dedupe) {
    dedupe = new DedupeFilter(config.dedupe);

    const client = createDbClient(transport.databaseUrl);
    sql = client.sql;
    await ensureTables(client.sql);
    log.info('Database ready (dedupe_partitions table)');

    const store = new PgDedupeSnapshotStore(client.db);
    await restoreDedupe(dedupe, store, log);
    stopCheckpoints = scheduleCheckpoints(dedupe, store, log, config.checkpointSeconds);
  }

  redis = new Redis(transport.redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });
  await redis.connect();
  log.info('Redis connected');

  const decoder = new TelemetryDecoder(
    {
      contentField: config.contentField,
      uriField: config.uriField,
      injectRaw: config.injectRaw,
    },
    {
      schemas,
      sink: new RedisStreamSink(redis, transport.outputStream),
      log,
      geo,
      dedupe,
    },
  );

  await startConsumer(redis, decoder, log, ac.signal, {
    stream: transport.rawStream,
    consumerName: transport.workerId,
  });
}

async function cleanup(): Promise<void> {
  if (stopCheckpoints) await stopCheckpoints();
  geo?.close();
  await redis?.quit().catch((err: unknown) => log.warn({ err }, 'Redis quit failed'));
  await sql?.end().catch((err: unknown) => log.warn({ err }, 'Database close failed'));
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  log.info('Shutting down worker...');
  ac.abort();

  // Give in-flight operations a moment, then flush state and exit
  setTimeout(() => {
    cleanup()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, 'Shutdown cleanup failed');
        process.exit(1);
      });
  }, 3000);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
