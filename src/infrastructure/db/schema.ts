import { customType, integer, pgTable, timestamp } from 'drizzle-orm/pg-core';

const bytea = customType<{ data: Uint8Array; driverData: Uint8Array }>({
  dataType() {
    return 'bytea';
  },
});

/**
 * Drizzle schema for the `dedupe_partitions` table.
 *
 * One row per dedupe filter partition. `partition_count`, `items` and
 * `interval_size` are the configuration the snapshot was taken with; a
 * worker started with a different one ignores the row and starts that
 * partition empty.
 */
export const dedupePartitions = pgTable('dedupe_partitions', {
  partition_index: integer('partition_index').primaryKey(),
  partition_count: integer('partition_count').notNull(),
  items: integer('items').notNull(),
  interval_size: integer('interval_size').notNull(),
  newest_interval: integer('newest_interval').notNull(),
  fingerprints: bytea('fingerprints').notNull(),
  intervals: bytea('intervals').notNull(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
