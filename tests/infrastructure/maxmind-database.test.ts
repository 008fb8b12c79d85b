import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { describe, it, expect } from 'vitest';
import { openMaxmindDatabase } from '../../src/infrastructure/index.js';

describe('openMaxmindDatabase', () => {
  it('fails when the database file is missing', async () => {
    await expect(openMaxmindDatabase(join(tmpdir(), 'missing-city.mmdb'))).rejects.toThrow();
  });
});
