export type {
  JsonValue,
  JsonObject,
  Event,
  Stream,
  IndexFolder,
  LogEntry,
  LogEntryType,
  StreamState,
  EventSubmission,
  SubmitStatus,
  SubmitResult,
  TipAdvanced,
} from './event.js';
export {
  StreamEngineError,
  MalformedEventError,
  ChainIntegrityError,
  UnknownStreamError,
  StorageFailureError,
  isStreamEngineError,
} from './errors.js';
export type { StreamEngineErrorCode } from './errors.js';
export { StreamId, StreamType, DEFAULT_STREAM_TYPE, isStreamType } from './stream-id.js';
export type { StreamTypeName, StreamTypeCode } from './stream-id.js';
