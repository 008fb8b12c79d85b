import { Reader } from '@maxmind/geoip2-node';
import type { ReaderModel } from '@maxmind/geoip2-node';
import type { GeoDatabase, GeoField } from '../../application/geo-enricher.js';

/**
 * GeoDatabase over a MaxMind City database (.mmdb).
 *
 * The whole file is read into memory on open, so closing only drops the
 * reader reference.
 */
class MaxmindDatabase implements GeoDatabase {
  constructor(private reader: ReaderModel | undefined) {}

  lookup(address: string, field: GeoField): string | undefined {
    if (!this.reader) return undefined;
    try {
      const result = this.reader.city(address);
      return field === 'country' ? result.country?.isoCode : result.city?.names.en;
    } catch {
      // AddressNotFoundError or an unparseable address
      return undefined;
    }
  }

  close(): void {
    this.reader = undefined;
  }
}

export async function openMaxmindDatabase(file: string): Promise<GeoDatabase> {
  const reader = await Reader.open(file);
  return new MaxmindDatabase(reader);
}
