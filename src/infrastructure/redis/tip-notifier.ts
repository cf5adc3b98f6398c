import type { Redis } from 'ioredis';
import type { BaseLogger } from 'pino';
import type { TipNotifier } from '../../application/index.js';
import type { TipAdvanced } from '../../domain/index.js';

export const TIP_CHANNEL = 'stream_updates';

/**
 * Publishes committed tip advancements on the "stream_updates" Pub/Sub channel.
 *
 * Best-effort: publish failures are logged but never propagated, so a
 * Redis outage cannot fail a submission that already committed.
 */
export class RedisTipNotifier implements TipNotifier {
  constructor(
    private readonly redis: Redis,
    private readonly log: BaseLogger,
  ) {}

  async publish(update: TipAdvanced): Promise<void> {
    try {
      await this.redis.publish(TIP_CHANNEL, JSON.stringify(update));
      this.log.debug({ channel: TIP_CHANNEL, stream_id: update.stream_id, tip: update.tip }, 'Published tip update');
    } catch (err: unknown) {
      this.log.warn({ err, stream_id: update.stream_id, tip: update.tip }, 'Failed to publish tip update');
    }
  }
}
