import { describe, it, expect, vi } from 'vitest';
import { GeoEnricher } from '../../src/application/index.js';
import type { GeoDatabase, GeoField } from '../../src/application/index.js';
import { silentLogger } from '../helpers.js';

const HOUR = 3_600_000;

type Entries = Record<string, Partial<Record<GeoField, string>>>;

class FakeGeoDatabase implements GeoDatabase {
  closed = false;

  constructor(private readonly entries: Entries) {}

  lookup(address: string, field: GeoField): string | undefined {
    return this.entries[address]?.[field];
  }

  close(): void {
    this.closed = true;
  }
}

const ENTRIES: Entries = {
  '203.0.113.7': { country: 'DE', city: 'Berlin' },
  '198.51.100.2': { country: 'FR', city: 'Paris' },
  '192.0.2.9': { country: 'US' },
};

describe('GeoEnricher', () => {
  async function openWith(entries: Entries, clock: () => number = () => 10 * HOUR) {
    const db = new FakeGeoDatabase(entries);
    const geo = await GeoEnricher.open('city.mmdb', async () => db, silentLogger(), clock);
    return { geo, db };
  }

  it('prefers the first forwarded address', async () => {
    const { geo } = await openWith(ENTRIES);

    expect(geo.country('203.0.113.7, 198.51.100.2', '198.51.100.2')).toBe('DE');
    expect(geo.city('203.0.113.7 198.51.100.2', undefined)).toBe('Berlin');
  });

  it('falls back to the remote address', async () => {
    const { geo } = await openWith(ENTRIES);

    expect(geo.country('10.0.0.1', '198.51.100.2')).toBe('FR');
    expect(geo.country(undefined, '198.51.100.2')).toBe('FR');
    expect(geo.city('192.0.2.9', '198.51.100.2')).toBe('Paris');
  });

  it('returns the unknown sentinel without a result', async () => {
    const { geo } = await openWith(ENTRIES);

    expect(geo.country('10.0.0.1', '10.0.0.2')).toBe('??');
    expect(geo.city(undefined, undefined)).toBe('??');
    expect(geo.city('', '')).toBe('??');
  });

  it('propagates a failure to open at startup', async () => {
    const opener = async (): Promise<GeoDatabase> => {
      throw new Error('no such file');
    };

    await expect(GeoEnricher.open('missing.mmdb', opener, silentLogger())).rejects.toThrow('no such file');
  });

  describe('refresh', () => {
    it('keeps the handle within the same hour', async () => {
      const opener = vi.fn(async () => new FakeGeoDatabase(ENTRIES));
      const now = 10 * HOUR;
      const geo = await GeoEnricher.open('city.mmdb', opener, silentLogger(), () => now + HOUR - 1);

      await geo.refresh();

      expect(opener).toHaveBeenCalledTimes(1);
    });

    it('reopens once the hour changes and closes the old handle after the swap', async () => {
      let now = 10 * HOUR;
      const first = new FakeGeoDatabase(ENTRIES);
      const second = new FakeGeoDatabase({ '203.0.113.7': { country: 'NL' } });
      const opener = vi.fn<(file: string) => Promise<GeoDatabase>>()
        .mockResolvedValueOnce(first)
        .mockResolvedValueOnce(second);

      const geo = await GeoEnricher.open('city.mmdb', opener, silentLogger(), () => now);
      now += HOUR;
      await geo.refresh();

      expect(opener).toHaveBeenCalledTimes(2);
      expect(opener).toHaveBeenLastCalledWith('city.mmdb');
      expect(first.closed).toBe(true);
      expect(second.closed).toBe(false);
      expect(geo.country('203.0.113.7', undefined)).toBe('NL');

      await geo.refresh();
      expect(opener).toHaveBeenCalledTimes(2);
    });

    it('shares one reopen between concurrent callers', async () => {
      let now = 10 * HOUR;
      const opener = vi.fn(async () => new FakeGeoDatabase(ENTRIES));
      const geo = await GeoEnricher.open('city.mmdb', opener, silentLogger(), () => now);

      now += HOUR;
      await Promise.all([geo.refresh(), geo.refresh(), geo.refresh()]);

      expect(opener).toHaveBeenCalledTimes(2);
    });

    it('keeps serving from the old handle when the reopen fails', async () => {
      let now = 10 * HOUR;
      const first = new FakeGeoDatabase(ENTRIES);
      const opener = vi.fn<(file: string) => Promise<GeoDatabase>>()
        .mockResolvedValueOnce(first)
        .mockRejectedValueOnce(new Error('truncated file'));
      const log = silentLogger();
      const error = vi.spyOn(log, 'error');

      const geo = await GeoEnricher.open('city.mmdb', opener, log, () => now);
      now += HOUR;
      await geo.refresh();

      expect(error).toHaveBeenCalledTimes(1);
      expect(first.closed).toBe(false);
      expect(geo.country('203.0.113.7', undefined)).toBe('DE');

      // No second attempt within the same hour
      await geo.refresh();
      expect(opener).toHaveBeenCalledTimes(2);
    });
  });

  it('closes the current handle', async () => {
    const { geo, db } = await openWith(ENTRIES);
    geo.close();
    expect(db.closed).toBe(true);
  });
});
