export { startConsumer, processPending, processEntry, parseStreamEntry, readEntries, GROUP_NAME } from './stream-consumer.js';
export type { ConsumerDeps, EntryOutcome } from './stream-consumer.js';
