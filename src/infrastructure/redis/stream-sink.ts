import type { Redis } from 'ioredis';
import type { MessageSink } from '../../application/index.js';
import type { Message } from '../../domain/index.js';
import { encodeMessage } from './stream-codec.js';

/**
 * Decoder output written to a Redis Stream.
 *
 * Decoded, duplicate and error records share the stream; consumers
 * branch on the `Type` header.
 */
export class RedisStreamSink implements MessageSink {
  constructor(
    private readonly redis: Redis,
    private readonly stream: string,
  ) {}

  async emit(message: Message): Promise<void> {
    await this.redis.xadd(this.stream, '*', ...encodeMessage(message));
  }
}
