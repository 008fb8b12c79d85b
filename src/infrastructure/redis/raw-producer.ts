import type { Redis } from 'ioredis';
import type { RawMessage } from '../../domain/index.js';
import { encodeMessage } from './stream-codec.js';

/**
 * Appends a captured submission to the raw stream.
 *
 * Uses `XADD` with auto-generated stream IDs (`*`).
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function enqueueRawMessage(
  redis: Redis,
  stream: string,
  message: RawMessage,
): Promise<string> {
  const entryId = await redis.xadd(stream, '*', ...encodeMessage(message));
  // xadd only returns null when NOMKSTREAM/MAXLEN options suppress the write
  if (entryId === null) {
    throw new Error(`XADD to ${stream} returned no entry id`);
  }
  return entryId;
}
