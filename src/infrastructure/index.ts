export { redisPlugin, enqueueRawMessage, RedisStreamSink, encodeMessage, decodeMessage, StreamCodecError } from './redis/index.js';
export { createDbClient, ensureTables, dedupePartitions, PgDedupeSnapshotStore, InMemoryDedupeSnapshotStore } from './db/index.js';
export type { Database, Sql, DedupeSnapshotStore } from './db/index.js';
export { startConsumer, restoreDedupe, checkpointDedupe, scheduleCheckpoints } from './worker/index.js';
export type { ConsumerOptions } from './worker/index.js';
export { openMaxmindDatabase } from './geo/index.js';
export { loadDecoderConfig, loadTransportConfig } from './config/index.js';
export type { DecoderConfig, TransportConfig } from './config/index.js';
