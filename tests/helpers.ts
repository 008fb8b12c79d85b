import { fileURLToPath } from 'node:url';
import pino from 'pino';
import type { Logger } from 'pino';
import type { MessageSink } from '../src/application/index.js';
import type { Message, MessageFields, RawMessage } from '../src/domain/index.js';

export const SCHEMA_FIXTURES = fileURLToPath(new URL('./fixtures/schemas', import.meta.url));

/** 2023-11-14T22:13:20Z in nanoseconds. */
export const BASE_TS = 1_700_000_000_000_000_000n;

export const NS_PER_MINUTE = 60_000_000_000n;

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** Collects everything emitted; optionally rejects records of the given types. */
export class MemorySink implements MessageSink {
  readonly messages: Message[] = [];

  constructor(private readonly rejectTypes: readonly string[] = []) {}

  async emit(message: Message): Promise<void> {
    if (message.type !== undefined && this.rejectTypes.includes(message.type)) {
      throw new Error(`sink rejected ${message.type}`);
    }
    this.messages.push(message);
  }

  ofType(type: string): Message[] {
    return this.messages.filter((m) => m.type === type);
  }
}

/**
 * Factory for raw submissions with sensible defaults.
 * `content` may be a string, bytes or omitted via `null`.
 */
export function makeRaw(
  uri: string,
  content: string | Uint8Array | null = '{}',
  extra: MessageFields = {},
  timestamp: bigint = BASE_TS,
): RawMessage {
  const fields: MessageFields = { uri, ...extra };
  if (content !== null) fields['content'] = content;
  return {
    timestamp,
    logger: 'submission_edge',
    hostname: 'edge-1',
    fields,
  };
}
