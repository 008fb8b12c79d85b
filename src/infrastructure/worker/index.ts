export { startConsumer, toStreamEntries } from './stream-consumer.js';
export type { ConsumerOptions } from './stream-consumer.js';
export { restoreDedupe, checkpointDedupe, scheduleCheckpoints } from './dedupe-checkpoint.js';
