import type { Redis } from 'ioredis';
import type { EventSubmissionInput } from '../../application/index.js';

export const SUBMISSION_STREAM_KEY = 'event_submissions';

/**
 * Appends a wire-validated submission to the ingestion stream.
 *
 * Blocks stay base64 inside the JSON body; the worker decodes them with
 * the same schema the HTTP route uses.
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function enqueueSubmission(redis: Redis, submission: EventSubmissionInput): Promise<string> {
  const entryId = await redis.xadd(
    SUBMISSION_STREAM_KEY,
    '*',
    'cid', submission.cid,
    'submission', JSON.stringify(submission),
  );

  // XADD only returns null with NOMKSTREAM, which is not used here
  if (entryId === null) {
    throw new Error(`XADD to ${SUBMISSION_STREAM_KEY} returned no entry id`);
  }
  return entryId;
}
