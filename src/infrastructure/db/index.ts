export { dedupePartitions } from './schema.js';
export { createDbClient, ensureTables } from './client.js';
export type { Database, Sql } from './client.js';
export { PgDedupeSnapshotStore, InMemoryDedupeSnapshotStore } from './dedupe-snapshot-repository.js';
export type { DedupeSnapshotStore } from './dedupe-snapshot-repository.js';
