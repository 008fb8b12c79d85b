export { default as redisPlugin } from './redis-plugin.js';
export { enqueueRawMessage } from './raw-producer.js';
export { RedisStreamSink } from './stream-sink.js';
export { encodeMessage, decodeMessage, StreamCodecError } from './stream-codec.js';
