export { eventSubmissionSchema, eventBatchSchema, toSubmission, encodeBlock } from './event-schema.js';
export type { EventSubmissionInput } from './event-schema.js';
export { signalQuerySchema, listStreamsQuerySchema } from './query-schema.js';
export type { SignalQueryInput, ListStreamsQueryInput } from './query-schema.js';
export { validateEvent, MAX_CID_LENGTH } from './event-validator.js';
export { linkEvent, ancestry, toChain } from './chain-linker.js';
export type { Linkage } from './chain-linker.js';
export { resolveTip } from './tip-resolver.js';
export type { TipResolution, ResolveTipInput } from './tip-resolver.js';
export { StreamProjector, describeState, DEFAULT_PROJECTION_CACHE_SIZE } from './stream-projector.js';
export type { StreamDescriptor } from './stream-projector.js';
export { deriveSignal, maintainIndex, jsonContains } from './index-maintainer.js';
export { decodeEnvelope, encodePayload, jsonValueSchema, patchOperationSchema } from './payload.js';
export type { Envelope, GenesisEnvelope, SignedEnvelope, AnchorEnvelope } from './payload.js';
export { FoldCache } from './fold-cache.js';
export { clampPagination, DEFAULT_LIMIT, MAX_LIMIT } from './pagination.js';
export { StreamEngine } from './stream-engine.js';
export type { StreamEngineOptions, TipNotifier, ListStreamsParams, QueryBySignalParams } from './stream-engine.js';
export type {
  StreamStore,
  StoreReader,
  StoreTransaction,
  TipUpdate,
  PaginationParams,
  StreamFilters,
  SignalFilters,
} from './stream-store.js';
