import type { Logger } from 'pino';
import type { DurationField } from '../domain/message.js';
import { ExpiringCuckooFilter } from '../domain/dedupe/expiring-cuckoo-filter.js';
import type { FilterSnapshot } from '../domain/dedupe/expiring-cuckoo-filter.js';

export const VALID_PARTITIONS = [1, 2, 4, 8, 16] as const;
export type PartitionCount = (typeof VALID_PARTITIONS)[number];

export interface DedupeFilterOptions {
  /** Capacity of each partition. */
  items: number;
  partitions: PartitionCount;
  /** Interval length in minutes. */
  intervalSize: number;
}

export type DedupeResult =
  | { readonly isNew: true }
  | { readonly isNew: false; readonly age: number };

export interface PartitionSnapshot {
  readonly partition: number;
  /** Partition count of the filter the snapshot came from. */
  readonly partitions: number;
  readonly snapshot: FilterSnapshot;
}

/**
 * Partitioned, time-windowed duplicate detector keyed by document id.
 *
 * Each partition is an independent filter. Because the partition is a
 * pure function of the id, partitions never need to coordinate.
 */
export class DedupeFilter {
  readonly options: DedupeFilterOptions;
  private readonly partitions: ExpiringCuckooFilter[];

  constructor(options: DedupeFilterOptions) {
    this.options = options;
    this.partitions = Array.from(
      { length: options.partitions },
      () => new ExpiringCuckooFilter({ items: options.items, intervalSize: options.intervalSize }),
    );
  }

  /**
   * Records `id` as seen at `timestampNs`.
   *
   * A repeat within the window is reported with its age in intervals.
   */
  testAndInsert(id: string, timestampNs: bigint): DedupeResult {
    const filter = this.partitions[partitionFor(id, this.options.partitions)];
    if (!filter) return { isNew: true };

    const result = filter.add(id, timestampNs);
    return result.added ? { isNew: true } : { isNew: false, age: result.delta };
  }

  /** Age unit for `duplicateDelta`, e.g. "6m". */
  get intervalUnit(): string {
    return `${this.options.intervalSize}m`;
  }

  duplicateDelta(age: number): DurationField {
    return { representation: this.intervalUnit, value: age };
  }

  snapshot(): PartitionSnapshot[] {
    const partitions = this.options.partitions;
    return this.partitions.map((filter, partition) => ({ partition, partitions, snapshot: filter.snapshot() }));
  }

  /**
   * Replaces partitions with stored state. Snapshots taken with a different
   * partition count or sizing are skipped, since ids would route to
   * partitions that never saw them.
   *
   * @returns the number of partitions restored
   */
  restore(snapshots: readonly PartitionSnapshot[], log: Logger): number {
    let restored = 0;
    for (const { partition, partitions, snapshot } of snapshots) {
      const current = this.partitions[partition];
      if (!current || partitions !== this.options.partitions || !current.isCompatible(snapshot)) {
        log.warn(
          { partition, partitions, items: snapshot.items, intervalSize: snapshot.intervalSize },
          'Discarding incompatible dedupe snapshot',
        );
        continue;
      }
      try {
        this.partitions[partition] = ExpiringCuckooFilter.fromSnapshot(snapshot);
        restored++;
      } catch (err: unknown) {
        log.warn({ err, partition }, 'Discarding unreadable dedupe snapshot');
      }
    }
    return restored;
  }
}

/**
 * Maps an id to a partition from its first byte.
 *
 * The byte is folded like a base-62 digit (lowercase letters shifted down
 * by 39, uppercase by 7) before taking it modulo the partition count.
 * Stored filters depend on this exact mapping.
 */
export function partitionFor(id: string, partitions: number): number {
  let code = Buffer.from(id, 'utf8')[0] ?? 0;
  if (code > 96) {
    code -= 39;
  } else if (code > 64) {
    code -= 7;
  }
  return code % partitions;
}
