import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { EventSubmission } from '../../domain/index.js';
import { StorageFailureError, isStreamEngineError } from '../../domain/index.js';
import type { StreamEngine } from '../../application/index.js';
import { eventSubmissionSchema, toSubmission } from '../../application/index.js';
import { SUBMISSION_STREAM_KEY } from '../redis/event-producer.js';

export const GROUP_NAME = 'stream_resolver';

// How long to block waiting for new messages (ms)
const BLOCK_MS = 5000;
// Max messages to read per iteration
const BATCH_SIZE = 100;

/** Dependencies bundled for internal functions. */
export interface ConsumerDeps {
  redis: Redis;
  engine: Pick<StreamEngine, 'submitEvent'>;
  log: Logger;
  consumerName: string;
}

export type EntryOutcome = 'submitted' | 'rejected' | 'retry';

/**
 * Ensures the consumer group exists on the stream.
 *
 * Start ID "$" = only deliver messages arriving after group creation.
 * Crash recovery goes through processPending(), which re-reads this
 * consumer's own pending entries list (PEL) with cursor "0".
 *
 * Uses MKSTREAM so the stream is created if it doesn't exist yet.
 * Ignores BUSYGROUP errors (group already exists).
 */
async function ensureConsumerGroup(redis: Redis, log: Logger): Promise<void> {
  try {
    await redis.xgroup('CREATE', SUBMISSION_STREAM_KEY, GROUP_NAME, '$', 'MKSTREAM');
    log.info({ group: GROUP_NAME, stream: SUBMISSION_STREAM_KEY }, 'Consumer group created (from $)');
  } catch (err: unknown) {
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      log.debug({ group: GROUP_NAME }, 'Consumer group already exists');
      return;
    }
    throw err;
  }
}

/**
 * Parses a raw Redis Stream entry into a submission.
 * Stream entries arrive as flat [field, value, field, value, ...] arrays.
 *
 * Returns a reason string when the entry can never be submitted.
 */
export function parseStreamEntry(fields: string[]): EventSubmission | string {
  const map = new Map<string, string>();
  for (let i = 0; i < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }

  const raw = map.get('submission');
  if (raw === undefined) return 'missing submission field';

  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch {
    return 'submission is not valid JSON';
  }

  const parsed = eventSubmissionSchema.safeParse(body);
  if (!parsed.success) {
    return parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
  }
  return toSubmission(parsed.data);
}

/**
 * Flattens an XREADGROUP reply (`[[stream, [[id, fields], ...]], ...]`)
 * into `[id, fields]` pairs. Anything not shaped like an entry is skipped.
 */
export function readEntries(response: unknown): Array<[string, string[]]> {
  const entries: Array<[string, string[]]> = [];
  if (!Array.isArray(response)) return entries;

  for (const streamReply of response) {
    if (!Array.isArray(streamReply)) continue;
    const items: unknown = streamReply[1];
    if (!Array.isArray(items)) continue;

    for (const item of items) {
      if (!Array.isArray(item) || typeof item[0] !== 'string') continue;
      const rawFields: unknown = item[1];
      const fields = Array.isArray(rawFields)
        ? rawFields.filter((field): field is string => typeof field === 'string')
        : [];
      entries.push([item[0], fields]);
    }
  }
  return entries;
}

/**
 * Main consumer loop.
 *
 * 1. XREADGROUP with BLOCK waits for new messages on the stream.
 * 2. For each message: parse → submit through the engine → XACK.
 *
 * Never ACK a submission that hit a storage failure: it stays in the
 * pending entries list and is replayed on the next start. Submitting is
 * idempotent, so a replay of an already-committed event reports duplicate.
 *
 * The loop runs until `signal` is aborted (graceful shutdown).
 */
export async function startConsumer(deps: ConsumerDeps, signal: AbortSignal): Promise<void> {
  const { redis, log, consumerName } = deps;

  await ensureConsumerGroup(redis, log);

  log.info({ consumer: consumerName, group: GROUP_NAME, stream: SUBMISSION_STREAM_KEY }, 'Consumer started');

  await processPending(deps);

  while (!signal.aborted) {
    try {
      const response = await redis.xreadgroup(
        'GROUP', GROUP_NAME, consumerName,
        'COUNT', BATCH_SIZE,
        'BLOCK', BLOCK_MS,
        'STREAMS', SUBMISSION_STREAM_KEY,
        '>',  // only new, undelivered messages
      );

      // null = timeout with no new messages
      if (response === null) continue;

      for (const [entryId, fields] of readEntries(response)) {
        await processEntry(deps, entryId, fields);
      }
    } catch (err: unknown) {
      if (signal.aborted) break;
      log.error({ err }, 'Consumer loop error, retrying in 1s');
      await sleep(1000);
    }
  }

  log.info('Consumer stopped');
}

/**
 * Processes pending (previously delivered but unacknowledged) entries.
 * This handles recovery after a crash or a storage outage.
 */
export async function processPending(deps: ConsumerDeps): Promise<number> {
  deps.log.info('Checking for pending entries...');

  const response = await deps.redis.xreadgroup(
    'GROUP', GROUP_NAME, deps.consumerName,
    'COUNT', BATCH_SIZE,
    'STREAMS', SUBMISSION_STREAM_KEY,
    '0',  // '0' = re-read pending entries for this consumer
  );

  if (response === null) return 0;

  let count = 0;
  for (const [entryId, fields] of readEntries(response)) {
    if (fields.length === 0) continue; // trimmed from the stream, nothing to replay
    await processEntry(deps, entryId, fields);
    count++;
  }

  if (count > 0) {
    deps.log.info({ count }, 'Recovered pending entries');
  }
  return count;
}

/**
 * Processes a single stream entry.
 *
 * - submitted: any engine result (applied, conflict, duplicate) → XACK.
 * - rejected: unparseable entry or a permanent engine error → XACK, warn.
 * - retry: storage failure or unexpected error → no XACK, stays pending.
 */
export async function processEntry(
  deps: ConsumerDeps,
  entryId: string,
  fields: string[],
): Promise<EntryOutcome> {
  const submission = parseStreamEntry(fields);

  if (typeof submission === 'string') {
    deps.log.warn({ entryId, reason: submission }, 'Unparseable submission, discarding');
    await deps.redis.xack(SUBMISSION_STREAM_KEY, GROUP_NAME, entryId);
    return 'rejected';
  }

  const cid = submission.event.cid;

  try {
    const result = await deps.engine.submitEvent(submission);
    await deps.redis.xack(SUBMISSION_STREAM_KEY, GROUP_NAME, entryId);

    if (result.status === 'conflict') {
      deps.log.warn({ cid, entryId, stream_id: result.stream_id, tip: result.tip }, 'Submission lost tip race');
    } else {
      deps.log.debug({ cid, entryId, stream_id: result.stream_id, status: result.status }, 'Submission processed');
    }
    return 'submitted';
  } catch (err: unknown) {
    if (isStreamEngineError(err) && !(err instanceof StorageFailureError)) {
      deps.log.warn({ err, cid, entryId, code: err.code }, 'Submission rejected');
      await deps.redis.xack(SUBMISSION_STREAM_KEY, GROUP_NAME, entryId);
      return 'rejected';
    }

    // Do NOT ack: message stays in pending list for redelivery
    deps.log.error({ err, cid, entryId }, 'Failed to submit event');
    return 'retry';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
