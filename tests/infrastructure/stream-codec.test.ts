import { describe, it, expect } from 'vitest';
import { StreamCodecError, decodeMessage, encodeMessage } from '../../src/infrastructure/index.js';
import { jsonField } from '../../src/domain/index.js';
import type { Message } from '../../src/domain/index.js';

describe('stream codec', () => {
  it('writes headers and a JSON field map', () => {
    const entry = encodeMessage({
      timestamp: 1_700_000_000_000_000_123n,
      logger: 'telemetry',
      type: 'telemetry',
      fields: {
        documentId: 'doc-1',
        creationTimestamp: 1_480_586_400_000_000_000n,
        content: new Uint8Array([104, 105]),
        telemetryEnabled: false,
      },
    });

    expect(entry).toEqual([
      'Timestamp', '1700000000000000123',
      'Logger', 'telemetry',
      'Type', 'telemetry',
      'Fields', '{"documentId":"doc-1","creationTimestamp":"1480586400000000000","content":{"base64":"aGk="},"telemetryEnabled":false}',
    ]);
  });

  it('restores bytes, tagged values and headers', () => {
    const message: Message = {
      timestamp: 1_700_000_000_000_000_123n,
      logger: 'telemetry',
      type: 'telemetry.duplicate',
      hostname: 'edge-1',
      envVersion: '1',
      fields: {
        content: new Uint8Array([0, 255, 31, 139]),
        submission: jsonField({ a: [1, { b: null }] }),
        duplicateDelta: { representation: '6m', value: 2 },
        sampleId: 42,
      },
    };

    const decoded = decodeMessage(encodeMessage(message));

    expect(decoded.timestamp).toBe(1_700_000_000_000_000_123n);
    expect(decoded.hostname).toBe('edge-1');
    expect(decoded.envVersion).toBe('1');
    expect(decoded.fields['content']).toEqual(new Uint8Array([0, 255, 31, 139]));
    expect(decoded.fields['submission']).toEqual(jsonField({ a: [1, { b: null }] }));
    expect(decoded.fields['duplicateDelta']).toEqual({ representation: '6m', value: 2 });
    expect(decoded.fields['sampleId']).toBe(42);
  });

  it('leaves absent headers undefined', () => {
    const decoded = decodeMessage(['Timestamp', '5', 'Fields', '{}']);

    expect(decoded).toEqual({ timestamp: 5n, fields: {} });
    expect(decoded.logger).toBeUndefined();
  });

  it('rejects entries without a valid timestamp', () => {
    expect(() => decodeMessage(['Fields', '{}'])).toThrow(StreamCodecError);
    expect(() => decodeMessage(['Timestamp', '-1', 'Fields', '{}'])).toThrow('entry has no valid Timestamp');
  });

  it('writes and reads large integers inside JSON fields digit for digit', () => {
    const entry = encodeMessage({ timestamp: 1n, fields: { doc: jsonField({ seq: 12_345_678_901_234_567_890n }) } });

    expect(entry).toEqual([
      'Timestamp', '1',
      'Fields', '{"doc":{"representation":"json","value":{"seq":12345678901234567890}}}',
    ]);
    expect(decodeMessage(entry).fields['doc']).toEqual(jsonField({ seq: 12_345_678_901_234_567_890n }));
  });

  it('accepts timestamps up to the int64 maximum', () => {
    const decoded = decodeMessage(['Timestamp', '9223372036854775807', 'Fields', '{}']);

    expect(decoded.timestamp).toBe(9_223_372_036_854_775_807n);
  });

  it('rejects timestamps beyond int64', () => {
    expect(() => decodeMessage(['Timestamp', '9223372036854775808', 'Fields', '{}'])).toThrow(StreamCodecError);
    expect(() => decodeMessage([
      'Timestamp', '99999999999999999999999999',
      'Fields', '{"uri":"/submit/x","content":"{}"}',
    ])).toThrow('entry has no valid Timestamp');
  });

  it('rejects unparseable or ill-typed fields', () => {
    expect(() => decodeMessage(['Timestamp', '1', 'Fields', '{oops'])).toThrow('entry Fields is not valid JSON');
    expect(() => decodeMessage(['Timestamp', '1', 'Fields', '{"a":null}'])).toThrow(StreamCodecError);
    expect(() => decodeMessage(['Timestamp', '1', 'Fields', '{"a":[1]}'])).toThrow(StreamCodecError);
  });
});
