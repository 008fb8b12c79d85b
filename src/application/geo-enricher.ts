import type { Logger } from 'pino';
import { UNKNOWN_GEO } from '../domain/route.js';

export type GeoField = 'country' | 'city';

/** An open city/country database. */
export interface GeoDatabase {
  /** Returns the field for `address`, or undefined when there is no result. Must not throw. */
  lookup(address: string, field: GeoField): string | undefined;
  close(): void;
}

export type GeoDatabaseOpener = (file: string) => Promise<GeoDatabase>;

const MS_PER_HOUR = 3_600_000;

/**
 * Country/city enrichment keyed by client address.
 *
 * The database handle is reopened once the wall-clock hour changes so
 * updated database files are picked up. `refresh()` is called before
 * lookups; the new handle is swapped in only once it is fully open, and
 * the old one is closed after the swap. A lookup always runs against
 * whichever handle it read, so none ever sees a closed handle.
 */
export class GeoEnricher {
  private handle: GeoDatabase;
  private openedHour: number;
  private rotation: Promise<void> | undefined;

  private constructor(
    private readonly file: string,
    private readonly opener: GeoDatabaseOpener,
    private readonly log: Logger,
    private readonly clock: () => number,
    handle: GeoDatabase,
  ) {
    this.handle = handle;
    this.openedHour = hourOf(clock());
  }

  /** Opens the database; failure here is a startup error and propagates. */
  static async open(
    file: string,
    opener: GeoDatabaseOpener,
    log: Logger,
    clock: () => number = Date.now,
  ): Promise<GeoEnricher> {
    const handle = await opener(file);
    log.info({ file }, 'Geo database opened');
    return new GeoEnricher(file, opener, log, clock, handle);
  }

  /** Rotates the handle if the hour changed since it was opened. Concurrent callers share one rotation. */
  async refresh(): Promise<void> {
    const hour = hourOf(this.clock());
    if (hour === this.openedHour) return;

    this.rotation ??= this.rotate(hour).finally(() => {
      this.rotation = undefined;
    });
    await this.rotation;
  }

  country(xff: string | undefined, remoteAddr: string | undefined): string {
    return this.lookup(xff, remoteAddr, 'country');
  }

  city(xff: string | undefined, remoteAddr: string | undefined): string {
    return this.lookup(xff, remoteAddr, 'city');
  }

  close(): void {
    this.handle.close();
  }

  private lookup(xff: string | undefined, remoteAddr: string | undefined, field: GeoField): string {
    const db = this.handle;

    const forwarded = xff ? /[^, ]+/.exec(xff)?.[0] : undefined;
    const fromForwarded = forwarded ? db.lookup(forwarded, field) : undefined;
    if (fromForwarded) return fromForwarded;

    const fromRemote = remoteAddr ? db.lookup(remoteAddr, field) : undefined;
    return fromRemote || UNKNOWN_GEO;
  }

  private async rotate(hour: number): Promise<void> {
    try {
      const next = await this.opener(this.file);
      const previous = this.handle;
      this.handle = next;
      previous.close();
      this.log.info({ file: this.file, hour }, 'Geo database reopened');
    } catch (err: unknown) {
      // Keep serving from the old handle; try again next hour.
      this.log.error({ err, file: this.file }, 'Geo database reopen failed');
    } finally {
      this.openedHour = hour;
    }
  }
}

function hourOf(ms: number): number {
  return Math.floor(ms / MS_PER_HOUR);
}
