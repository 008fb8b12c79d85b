import type { Logger } from 'pino';
import type { DedupeFilter } from '../../application/index.js';
import type { DedupeSnapshotStore } from '../db/index.js';

/**
 * Loads stored partitions into `filter`. Returns how many were restored;
 * partitions with no usable snapshot start empty.
 */
export async function restoreDedupe(
  filter: DedupeFilter,
  store: DedupeSnapshotStore,
  log: Logger,
): Promise<number> {
  const snapshots = await store.load();
  const restored = filter.restore(snapshots, log);
  log.info({ restored, stored: snapshots.length, partitions: filter.options.partitions }, 'Dedupe state restored');
  return restored;
}

/** Writes every partition; failures are logged and the next checkpoint tries again. */
export async function checkpointDedupe(
  filter: DedupeFilter,
  store: DedupeSnapshotStore,
  log: Logger,
): Promise<boolean> {
  try {
    await store.save(filter.snapshot());
    log.debug('Dedupe checkpoint written');
    return true;
  } catch (err: unknown) {
    log.error({ err }, 'Dedupe checkpoint failed');
    return false;
  }
}

/**
 * Checkpoints on a fixed period until the returned stop function runs.
 * Stopping waits for an in-flight checkpoint and then writes a final one.
 */
export function scheduleCheckpoints(
  filter: DedupeFilter,
  store: DedupeSnapshotStore,
  log: Logger,
  periodSeconds: number,
): () => Promise<void> {
  let inFlight: Promise<boolean> | undefined;

  const timer = setInterval(() => {
    // One checkpoint at a time
    if (inFlight) return;
    inFlight = checkpointDedupe(filter, store, log).finally(() => {
      inFlight = undefined;
    });
  }, periodSeconds * 1000);
  timer.unref();

  return async () => {
    clearInterval(timer);
    if (inFlight) await inFlight;
    await checkpointDedupe(filter, store, log);
  };
}
