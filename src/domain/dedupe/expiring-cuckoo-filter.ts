import { createHash } from 'node:crypto';

const BUCKET_SIZE = 4;
const MAX_KICKS = 500;

/** Number of intervals an entry stays live after the newest interval seen. */
export const WINDOW_INTERVALS = 256;

const NS_PER_MINUTE = 60_000_000_000n;

export interface ExpiringCuckooFilterOptions {
  /** Expected number of live items; the table is sized to the next power of two. */
  items: number;
  /** Interval length in minutes. The rolling window is WINDOW_INTERVALS intervals. */
  intervalSize: number;
}

export type AddResult =
  | { readonly added: true }
  | { readonly added: false; readonly delta: number };

/** Serializable partition state. Tables are raw bytes in host byte order. */
export interface FilterSnapshot {
  readonly items: number;
  readonly intervalSize: number;
  readonly newestInterval: number;
  readonly fingerprints: Uint8Array;
  readonly intervals: Uint8Array;
}

/**
 * Approximate-membership set whose entries expire on a rolling window.
 *
 * Each slot stores a 16-bit fingerprint and the interval the key was first
 * seen in. A slot is live while its interval is within WINDOW_INTERVALS of
 * the newest interval observed; stale slots are reused without a sweep.
 *
 * False positives happen at the usual cuckoo rate. When a bucket pair is
 * full and kicking fails, the last displaced entry is dropped, so a key
 * may be reported new again before it expires.
 */
export class ExpiringCuckooFilter {
  readonly items: number;
  readonly intervalSize: number;

  private readonly bucketMask: number;
  private readonly intervalNs: bigint;
  private readonly fingerprints: Uint16Array;
  private readonly intervals: Uint32Array;
  private newestInterval = 0;

  constructor(options: ExpiringCuckooFilterOptions) {
    if (!Number.isInteger(options.items) || options.items < 1) {
      throw new RangeError(`items must be a positive integer, got ${options.items}`);
    }
    if (!Number.isInteger(options.intervalSize) || options.intervalSize < 1) {
      throw new RangeError(`intervalSize must be a positive integer, got ${options.intervalSize}`);
    }

    this.items = options.items;
    this.intervalSize = options.intervalSize;
    this.intervalNs = BigInt(options.intervalSize) * NS_PER_MINUTE;

    const buckets = nextPowerOfTwo(Math.ceil(options.items / BUCKET_SIZE));
    this.bucketMask = buckets - 1;
    this.fingerprints = new Uint16Array(buckets * BUCKET_SIZE);
    this.intervals = new Uint32Array(buckets * BUCKET_SIZE);
  }

  /**
   * Inserts `key` seen at `timestampNs`.
   *
   * Returns `added: false` with the number of whole intervals since the
   * first sighting when the key is already live.
   */
  add(key: string, timestampNs: bigint): AddResult {
    const interval = Number(timestampNs / this.intervalNs);
    if (interval > this.newestInterval) this.newestInterval = interval;

    // Older than anything the window can still hold
    if (!this.isLive(interval)) return { added: true };

    const { primary, fingerprint } = this.hashKey(key);
    const alternate = this.alternateBucket(primary, fingerprint);

    const existing = this.findSlot(primary, fingerprint) ?? this.findSlot(alternate, fingerprint);
    if (existing !== undefined) {
      const firstSeen = this.intervals[existing] ?? interval;
      return { added: false, delta: Math.max(0, interval - firstSeen) };
    }

    this.insert(primary, alternate, fingerprint, interval);
    return { added: true };
  }

  snapshot(): FilterSnapshot {
    return {
      items: this.items,
      intervalSize: this.intervalSize,
      newestInterval: this.newestInterval,
      fingerprints: copyBytes(this.fingerprints),
      intervals: copyBytes(this.intervals),
    };
  }

  /** True when a snapshot was taken from a filter with the same sizing. */
  isCompatible(snapshot: FilterSnapshot): boolean {
    return snapshot.items === this.items && snapshot.intervalSize === this.intervalSize;
  }

  static fromSnapshot(snapshot: FilterSnapshot): ExpiringCuckooFilter {
    const filter = new ExpiringCuckooFilter({
      items: snapshot.items,
      intervalSize: snapshot.intervalSize,
    });
    loadBytes(snapshot.fingerprints, filter.fingerprints);
    loadBytes(snapshot.intervals, filter.intervals);
    filter.newestInterval = snapshot.newestInterval;
    return filter;
  }

  private isLive(interval: number): boolean {
    return this.newestInterval - interval < WINDOW_INTERVALS;
  }

  private hashKey(key: string): { primary: number; fingerprint: number } {
    const digest = createHash('sha1').update(key, 'utf8').digest();
    const primary = digest.readUInt32BE(0) & this.bucketMask;
    // 0 marks an empty slot
    const fingerprint = digest.readUInt16BE(4) || 1;
    return { primary, fingerprint };
  }

  private alternateBucket(bucket: number, fingerprint: number): number {
    return (bucket ^ (Math.imul(fingerprint, 0x5bd1e995) >>> 0)) & this.bucketMask;
  }

  private findSlot(bucket: number, fingerprint: number): number | undefined {
    const base = bucket * BUCKET_SIZE;
    for (let slot = base; slot < base + BUCKET_SIZE; slot++) {
      if (this.fingerprints[slot] === fingerprint && this.isLive(this.intervals[slot] ?? 0)) {
        return slot;
      }
    }
    return undefined;
  }

  private findFreeSlot(bucket: number): number | undefined {
    const base = bucket * BUCKET_SIZE;
    for (let slot = base; slot < base + BUCKET_SIZE; slot++) {
      if (this.fingerprints[slot] === 0 || !this.isLive(this.intervals[slot] ?? 0)) {
        return slot;
      }
    }
    return undefined;
  }

  private insert(primary: number, alternate: number, fingerprint: number, interval: number): void {
    const free = this.findFreeSlot(primary) ?? this.findFreeSlot(alternate);
    if (free !== undefined) {
      this.fingerprints[free] = fingerprint;
      this.intervals[free] = interval;
      return;
    }

    let bucket = primary;
    let carriedFingerprint = fingerprint;
    let carriedInterval = interval;

    for (let kick = 0; kick < MAX_KICKS; kick++) {
      const victim = bucket * BUCKET_SIZE + (kick % BUCKET_SIZE);
      const victimFingerprint = this.fingerprints[victim] ?? 0;
      const victimInterval = this.intervals[victim] ?? 0;

      this.fingerprints[victim] = carriedFingerprint;
      this.intervals[victim] = carriedInterval;
      carriedFingerprint = victimFingerprint;
      carriedInterval = victimInterval;

      bucket = this.alternateBucket(bucket, carriedFingerprint);
      const slot = this.findFreeSlot(bucket);
      if (slot !== undefined) {
        this.fingerprints[slot] = carriedFingerprint;
        this.intervals[slot] = carriedInterval;
        return;
      }
    }
    // Table saturated: the carried entry is evicted.
  }
}

function nextPowerOfTwo(n: number): number {
  let power = 1;
  while (power < n) power *= 2;
  return power;
}

function copyBytes(array: Uint16Array | Uint32Array): Uint8Array {
  return new Uint8Array(array.buffer, array.byteOffset, array.byteLength).slice();
}

function loadBytes(bytes: Uint8Array, target: Uint16Array | Uint32Array): void {
  if (bytes.byteLength !== target.byteLength) {
    throw new RangeError(`snapshot table is ${bytes.byteLength} bytes, expected ${target.byteLength}`);
  }
  new Uint8Array(target.buffer, target.byteOffset, target.byteLength).set(bytes);
}
