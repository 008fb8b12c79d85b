import { sql } from 'drizzle-orm';
import type { PartitionSnapshot } from '../../application/index.js';
import type { Database } from './client.js';
import { dedupePartitions } from './schema.js';

/** Durable home for dedupe filter partitions across worker restarts. */
export interface DedupeSnapshotStore {
  load(): Promise<PartitionSnapshot[]>;
  save(snapshots: readonly PartitionSnapshot[]): Promise<void>;
}

/** Stores one row per partition in PostgreSQL, upserting on the partition index. */
export class PgDedupeSnapshotStore implements DedupeSnapshotStore {
  constructor(private readonly db: Database) {}

  async load(): Promise<PartitionSnapshot[]> {
    const rows = await this.db.select().from(dedupePartitions);
    return rows.map((row) => ({
      partition: row.partition_index,
      partitions: row.partition_count,
      snapshot: {
        items: row.items,
        intervalSize: row.interval_size,
        newestInterval: row.newest_interval,
        fingerprints: row.fingerprints,
        intervals: row.intervals,
      },
    }));
  }

  async save(snapshots: readonly PartitionSnapshot[]): Promise<void> {
    if (snapshots.length === 0) return;

    await this.db.transaction(async (tx) => {
      for (const { partition, partitions, snapshot } of snapshots) {
        const row = {
          partition_count: partitions,
          items: snapshot.items,
          interval_size: snapshot.intervalSize,
          newest_interval: snapshot.newestInterval,
          fingerprints: snapshot.fingerprints,
          intervals: snapshot.intervals,
          updated_at: sql`now()`,
        };
        await tx
          .insert(dedupePartitions)
          .values({ partition_index: partition, ...row })
          .onConflictDoUpdate({ target: dedupePartitions.partition_index, set: row });
      }
    });
  }
}

/** Process-local store; state lasts as long as the instance. */
export class InMemoryDedupeSnapshotStore implements DedupeSnapshotStore {
  private readonly rows = new Map<number, PartitionSnapshot>();

  async load(): Promise<PartitionSnapshot[]> {
    return [...this.rows.values()];
  }

  async save(snapshots: readonly PartitionSnapshot[]): Promise<void> {
    for (const entry of snapshots) {
      this.rows.set(entry.partition, entry);
    }
  }
}
