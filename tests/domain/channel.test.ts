import { describe, it, expect } from 'vitest';
import { normalizeChannel } from '../../src/domain/index.js';

describe('normalizeChannel', () => {
  it.each(['release', 'esr', 'beta', 'aurora', 'nightly'])('keeps %s', (channel) => {
    expect(normalizeChannel(channel)).toBe(channel);
  });

  it('folds partner builds into their base channel', () => {
    expect(normalizeChannel('release-cck-acme')).toBe('release');
    expect(normalizeChannel('beta-cck-example')).toBe('beta');
  });

  it('maps everything else to Other', () => {
    expect(normalizeChannel('default')).toBe('Other');
    expect(normalizeChannel('nightly-ux')).toBe('Other');
    expect(normalizeChannel('Release')).toBe('Other');
    expect(normalizeChannel('')).toBe('Other');
    expect(normalizeChannel(undefined)).toBe('Other');
    expect(normalizeChannel(3)).toBe('Other');
  });
});
