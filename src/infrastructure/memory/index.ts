export { InMemoryStreamStore } from './in-memory-stream-store.js';
