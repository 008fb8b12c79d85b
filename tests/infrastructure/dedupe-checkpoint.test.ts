import { afterEach, describe, it, expect, vi } from 'vitest';
import { DedupeFilter } from '../../src/application/index.js';
import type { PartitionSnapshot } from '../../src/application/index.js';
import {
  InMemoryDedupeSnapshotStore,
  checkpointDedupe,
  restoreDedupe,
  scheduleCheckpoints,
} from '../../src/infrastructure/index.js';
import type { DedupeSnapshotStore } from '../../src/infrastructure/index.js';
import { BASE_TS, NS_PER_MINUTE, silentLogger } from '../helpers.js';

const OPTIONS = { items: 256, partitions: 2, intervalSize: 1 } as const;

describe('InMemoryDedupeSnapshotStore', () => {
  it('keeps the latest snapshot per partition', async () => {
    const store = new InMemoryDedupeSnapshotStore();
    const filter = new DedupeFilter(OPTIONS);

    await store.save(filter.snapshot());
    filter.testAndInsert('doc-1', BASE_TS);
    await store.save(filter.snapshot());

    const loaded = await store.load();
    expect(loaded.map((s) => s.partition).sort()).toEqual([0, 1]);
  });
});

describe('dedupe checkpoints', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('restores duplicate detection across filter instances', async () => {
    const store = new InMemoryDedupeSnapshotStore();
    const log = silentLogger();

    const before = new DedupeFilter(OPTIONS);
    before.testAndInsert('doc-1', BASE_TS);
    await expect(checkpointDedupe(before, store, log)).resolves.toBe(true);

    const after = new DedupeFilter(OPTIONS);
    await expect(restoreDedupe(after, store, log)).resolves.toBe(2);
    expect(after.testAndInsert('doc-1', BASE_TS + 2n * NS_PER_MINUTE)).toEqual({ isNew: false, age: 2 });
  });

  it('ignores rows left by a run with more partitions', async () => {
    const store = new InMemoryDedupeSnapshotStore();
    const log = silentLogger();

    const wide = new DedupeFilter({ ...OPTIONS, partitions: 4 });
    wide.testAndInsert('doc-1', BASE_TS);
    await checkpointDedupe(wide, store, log);

    const narrow = new DedupeFilter(OPTIONS);
    await checkpointDedupe(narrow, store, log);

    // Rows 0-1 now hold the 2-partition state; rows 2-3 are stale
    const after = new DedupeFilter(OPTIONS);
    await expect(restoreDedupe(after, store, log)).resolves.toBe(2);
    expect(after.testAndInsert('doc-1', BASE_TS)).toEqual({ isNew: true });
  });

  it('starts empty when nothing is stored', async () => {
    const filter = new DedupeFilter(OPTIONS);

    await expect(restoreDedupe(filter, new InMemoryDedupeSnapshotStore(), silentLogger())).resolves.toBe(0);
  });

  it('logs and reports a failed checkpoint', async () => {
    const store: DedupeSnapshotStore = {
      load: async () => [],
      save: async () => {
        throw new Error('connection refused');
      },
    };
    const log = silentLogger();
    const error = vi.spyOn(log, 'error');

    await expect(checkpointDedupe(new DedupeFilter(OPTIONS), store, log)).resolves.toBe(false);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('checkpoints periodically and once more on stop', async () => {
    vi.useFakeTimers();
    const saves: PartitionSnapshot[][] = [];
    const store: DedupeSnapshotStore = {
      load: async () => [],
      save: async (snapshots) => {
        saves.push([...snapshots]);
      },
    };

    const stop = scheduleCheckpoints(new DedupeFilter(OPTIONS), store, silentLogger(), 60);

    await vi.advanceTimersByTimeAsync(59_000);
    expect(saves).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(saves).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(120_000);
    expect(saves).toHaveLength(3);

    await stop();
    expect(saves).toHaveLength(4);

    await vi.advanceTimersByTimeAsync(600_000);
    expect(saves).toHaveLength(4);
  });
});
