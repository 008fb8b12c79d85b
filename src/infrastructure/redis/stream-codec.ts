import { z } from 'zod';
import { parseJson, stringifyJson } from '../../application/json-document.js';
import { jsonField } from '../../domain/message.js';
import type { FieldValue, Message, MessageFields } from '../../domain/message.js';

/**
 * Wire format for messages on Redis Streams.
 *
 * Stream entries are flat [key, value, key, value, ...] string lists.
 * Header values are stored as-is; `Fields` is one JSON document in which
 * bytes become `{ "base64": "..." }` and bigint fields become decimal
 * strings. Bigints inside a JSON field stay JSON numbers, digit for digit.
 */

const fieldValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.object({ base64: z.string() }).strict(),
  z.object({ representation: z.literal('json'), value: z.unknown() }),
  z.object({ representation: z.string(), value: z.number() }),
]);

const fieldsSchema = z.record(z.string(), fieldValueSchema);

const INT64_MAX = 9_223_372_036_854_775_807n;

const timestampSchema = z
  .string()
  .regex(/^\d+$/, 'Timestamp must be integer nanoseconds')
  .refine((value) => /^\d{1,19}$/.test(value) && BigInt(value) <= INT64_MAX, 'Timestamp exceeds int64');

export class StreamCodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StreamCodecError';
  }
}

export function encodeMessage(message: Message): string[] {
  const entry = ['Timestamp', message.timestamp.toString()];
  if (message.logger !== undefined) entry.push('Logger', message.logger);
  if (message.type !== undefined) entry.push('Type', message.type);
  if (message.hostname !== undefined) entry.push('Hostname', message.hostname);
  if (message.envVersion !== undefined) entry.push('EnvVersion', message.envVersion);
  const wire: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(message.fields)) {
    wire[name] = toWire(value);
  }
  entry.push('Fields', stringifyJson(wire));
  return entry;
}

/** @throws {StreamCodecError} when the entry is not a valid message */
export function decodeMessage(entry: readonly string[]): Message {
  const map = new Map<string, string>();
  for (let i = 0; i < entry.length; i += 2) {
    const key = entry[i];
    const value = entry[i + 1];
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }

  const timestamp = timestampSchema.safeParse(map.get('Timestamp'));
  if (!timestamp.success) {
    throw new StreamCodecError('entry has no valid Timestamp');
  }

  let rawFields: unknown;
  try {
    rawFields = parseJson(map.get('Fields') ?? '{}');
  } catch {
    throw new StreamCodecError('entry Fields is not valid JSON');
  }

  const parsed = fieldsSchema.safeParse(rawFields);
  if (!parsed.success) {
    throw new StreamCodecError(`entry Fields rejected: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const fields: MessageFields = {};
  for (const [name, value] of Object.entries(parsed.data)) {
    fields[name] = reviveField(value);
  }

  return {
    timestamp: BigInt(timestamp.data),
    logger: map.get('Logger'),
    type: map.get('Type'),
    hostname: map.get('Hostname'),
    envVersion: map.get('EnvVersion'),
    fields,
  };
}

function reviveField(value: z.infer<typeof fieldValueSchema>): FieldValue {
  if (typeof value !== 'object') return value;
  if ('base64' in value) return new Uint8Array(Buffer.from(value.base64, 'base64'));
  if (value.representation === 'json') return jsonField(value.value);
  return {
    representation: value.representation,
    value: typeof value.value === 'number' ? value.value : 0,
  };
}

function toWire(value: FieldValue): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return { base64: Buffer.from(value).toString('base64') };
  return value;
}
