import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management)
 * and the typed `db` instance (for queries).
 */
export function createDbClient(databaseUrl: string) {
  const sql = postgres(databaseUrl, {
    // Only the worker's checkpoints use this pool
    max: 2,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type Sql = ReturnType<typeof createDbClient>['sql'];

/** Creates the tables the worker needs if they are missing. */
export async function ensureTables(sql: Sql): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS dedupe_partitions (
      partition_index  INTEGER      PRIMARY KEY,
      partition_count  INTEGER      NOT NULL,
      items            INTEGER      NOT NULL,
      interval_size    INTEGER      NOT NULL,
      newest_interval  INTEGER      NOT NULL,
      fingerprints     BYTEA        NOT NULL,
      intervals        BYTEA        NOT NULL,
      updated_at       TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);
  // Rows written before the column existed never match a running count
  await sql.unsafe(
    'ALTER TABLE dedupe_partitions ADD COLUMN IF NOT EXISTS partition_count INTEGER NOT NULL DEFAULT 0',
  );
}
