export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { enqueueSubmission, SUBMISSION_STREAM_KEY } from './event-producer.js';
export { RedisTipNotifier, TIP_CHANNEL } from './tip-notifier.js';
