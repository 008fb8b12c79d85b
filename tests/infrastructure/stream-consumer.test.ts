import { describe, it, expect } from 'vitest';
import { toStreamEntries } from '../../src/infrastructure/worker/index.js';

describe('toStreamEntries', () => {
  it('flattens entries from every stream in the reply', () => {
    const reply = [
      ['telemetry_raw', [
        ['1-0', ['Timestamp', '1', 'Fields', '{}']],
        ['1-1', ['Timestamp', '2', 'Fields', '{}']],
      ]],
    ];

    expect(toStreamEntries(reply)).toEqual([
      ['1-0', ['Timestamp', '1', 'Fields', '{}']],
      ['1-1', ['Timestamp', '2', 'Fields', '{}']],
    ]);
  });

  it('maps entries deleted while pending to empty field lists', () => {
    expect(toStreamEntries([['telemetry_raw', [['1-0', null]]]])).toEqual([['1-0', []]]);
  });

  it('ignores anything that is not a stream reply', () => {
    expect(toStreamEntries(null)).toEqual([]);
    expect(toStreamEntries('OK')).toEqual([]);
    expect(toStreamEntries([['telemetry_raw', 'nope'], 5, [['no-id']]])).toEqual([]);
  });
});
