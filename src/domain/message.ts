/**
 * Core message types shared by the transport and the decoder pipeline.
 *
 * A message is the unit carried on both the raw and the decoded streams.
 * Timestamps are nanoseconds since the epoch and kept as `bigint` so
 * they survive the round trip without losing precision.
 */

/** A complete JSON document carried as a single field. */
export interface JsonField {
  readonly representation: 'json';
  readonly value: unknown;
}

/** A duration expressed in multiples of the unit named by `representation` (e.g. "6m"). */
export interface DurationField {
  readonly representation: string;
  readonly value: number;
}

export type FieldValue =
  | string
  | number
  | boolean
  | bigint
  | Uint8Array
  | JsonField
  | DurationField;

export type MessageFields = Record<string, FieldValue>;

export interface Message {
  readonly timestamp: bigint; // ns since epoch
  readonly logger?: string | undefined;
  readonly type?: string | undefined;
  readonly hostname?: string | undefined;
  readonly envVersion?: string | undefined;
  readonly fields: Readonly<MessageFields>;
}

/** Input message as delivered by the transport. Read-only to the pipeline. */
export type RawMessage = Message;

export function jsonField(value: unknown): JsonField {
  return { representation: 'json', value };
}

/** Reads a metadata field as text. Bytes are decoded as UTF-8; tagged values are not text. */
export function readStringField(msg: Message, name: string): string | undefined {
  const value = msg.fields[name];
  if (value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (value instanceof Uint8Array) return Buffer.from(value).toString('utf8');
  if (typeof value === 'object') return undefined;
  return String(value);
}

/** Formats a nanosecond timestamp as the UTC calendar day `YYYYMMDD`. */
export function submissionDate(timestampNs: bigint): string {
  const ms = Number(timestampNs / 1_000_000n);
  return new Date(ms).toISOString().slice(0, 10).replace(/-/g, '');
}
