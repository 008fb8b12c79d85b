import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { TelemetryDecoder } from '../../application/index.js';
import { StreamCodecError, decodeMessage } from '../redis/stream-codec.js';

const GROUP_NAME = 'telemetry_decoder';

// How long to block waiting for new messages (ms)
const BLOCK_MS = 5000;
// Max messages to read per iteration
const BATCH_SIZE = 100;

export interface ConsumerOptions {
  stream: string;
  consumerName: string;
}

/** Dependencies bundled for internal functions. */
interface ConsumerDeps {
  redis: Redis;
  decoder: TelemetryDecoder;
  log: Logger;
  stream: string;
  consumerName: string;
}

/**
 * Ensures the consumer group exists on the raw stream.
 *
 * Start ID "$" = only deliver submissions arriving after group creation.
 * Crash recovery is handled separately via processPending(), which
 * re-reads this consumer's own pending entries list (PEL).
 *
 * Uses MKSTREAM so the stream is created if it doesn't exist yet.
 * Ignores BUSYGROUP errors (group already exists).
 */
async function ensureConsumerGroup(redis: Redis, stream: string, log: Logger): Promise<void> {
  try {
    await redis.xgroup('CREATE', stream, GROUP_NAME, '$', 'MKSTREAM');
    log.info({ group: GROUP_NAME, stream }, 'Consumer group created (from $)');
  } catch (err: unknown) {
    // BUSYGROUP = group already exists, safe to ignore
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      log.debug({ group: GROUP_NAME }, 'Consumer group already exists');
      return;
    }
    throw err;
  }
}

/**
 * Main consumer loop.
 *
 * 1. XREADGROUP with BLOCK: waits for new submissions on the raw stream.
 * 2. For each entry: decode → run the decoder (which emits its own
 *    output or diagnostic record) → XACK.
 *
 * Every per-message failure the decoder knows about ends in a diagnostic
 * record, so those entries are acknowledged. An unexpected exception
 * leaves the entry unacknowledged for redelivery.
 *
 * The loop runs until `signal` is aborted (graceful shutdown).
 */
export async function startConsumer(
  redis: Redis,
  decoder: TelemetryDecoder,
  log: Logger,
  signal: AbortSignal,
  options: ConsumerOptions,
): Promise<void> {
  const deps: ConsumerDeps = { redis, decoder, log, ...options };

  await ensureConsumerGroup(redis, options.stream, log);

  log.info(
    { consumer: options.consumerName, group: GROUP_NAME, stream: options.stream },
    'Consumer started',
  );

  // First, claim any pending messages from previous crashes
  await processPending(deps);

  while (!signal.aborted) {
    try {
      const response = await readGroup(deps, '>', BLOCK_MS);

      // null = timeout with no new messages
      if (response === null) continue;

      for (const [streamId, fields] of response) {
        await processEntry(deps, streamId, fields);
      }
    } catch (err: unknown) {
      if (signal.aborted) break;
      log.error({ err }, 'Consumer loop error, retrying in 1s');
      await sleep(1000);
    }
  }

  log.info('Consumer stopped');
}

type StreamEntry = [id: string, fields: string[]];

/** XREADGROUP with an optional BLOCK; null on timeout. */
async function readGroup(deps: ConsumerDeps, cursor: string, blockMs?: number): Promise<StreamEntry[] | null> {
  const block: (string | number)[] = blockMs === undefined ? [] : ['BLOCK', blockMs];
  const response: unknown = await deps.redis.call(
    'XREADGROUP',
    'GROUP', GROUP_NAME, deps.consumerName,
    'COUNT', BATCH_SIZE,
    ...block,
    'STREAMS', deps.stream,
    cursor,
  );
  if (response === null) return null;
  return toStreamEntries(response);
}

/**
 * Flattens an XREADGROUP reply ([[stream, [[id, fields], ...]], ...]).
 * Entries deleted while pending come back with nil fields and map to [].
 */
export function toStreamEntries(response: unknown): StreamEntry[] {
  const entries: StreamEntry[] = [];
  if (!Array.isArray(response)) return entries;

  for (const streamReply of response) {
    if (!Array.isArray(streamReply)) continue;
    const streamEntries: unknown = streamReply[1];
    if (!Array.isArray(streamEntries)) continue;

    for (const entry of streamEntries) {
      if (!Array.isArray(entry)) continue;
      const [id, fields]: unknown[] = entry;
      if (typeof id !== 'string') continue;
      entries.push([id, Array.isArray(fields) ? fields.filter(isString) : []]);
    }
  }
  return entries;
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/**
 * Processes pending (previously delivered but unacknowledged) entries.
 * This handles recovery after a crash or restart.
 */
async function processPending(deps: ConsumerDeps): Promise<void> {
  deps.log.info('Checking for pending entries...');

  // '0' = re-read pending entries for this consumer
  const response = await readGroup(deps, '0');
  if (response === null) return;

  let count = 0;
  for (const [streamId, fields] of response) {
    if (fields.length === 0) continue; // already acked, skip nil entries
    await processEntry(deps, streamId, fields);
    count++;
  }

  if (count > 0) {
    deps.log.info({ count }, 'Recovered pending entries');
  }
}

/**
 * Processes a single stream entry: decode → transform → ACK.
 *
 * An entry that cannot be decoded into a message has nothing to annotate;
 * it is logged and acknowledged so it does not block the group.
 */
async function processEntry(
  deps: ConsumerDeps,
  streamId: string,
  fields: string[],
): Promise<void> {
  try {
    const raw = decodeMessage(fields);
    const outcome = await deps.decoder.transform(raw);

    await deps.redis.xack(deps.stream, GROUP_NAME, streamId);

    if (outcome.status === 'error') {
      deps.log.debug({ streamId, tag: outcome.tag, error: outcome.message }, 'Submission rejected');
    } else {
      deps.log.debug({ streamId, documentId: outcome.documentId, status: outcome.status }, 'Submission decoded');
    }
  } catch (err: unknown) {
    if (err instanceof StreamCodecError) {
      deps.log.error({ err, streamId }, 'Dropping undecodable stream entry');
      await deps.redis.xack(deps.stream, GROUP_NAME, streamId);
      return;
    }
    // Do NOT ack: entry stays in pending list for redelivery
    deps.log.error({ err, streamId }, 'Failed to process entry');
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
