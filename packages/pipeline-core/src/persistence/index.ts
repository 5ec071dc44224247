export type { EntrySink } from './types.js';
export { entryFingerprint, stableStringify } from './fingerprint.js';
export { toPersistedEntry, isTerminalStatus } from './projection.js';
export { InMemoryEntrySink } from './memory-sink.js';
export type { FailureInjector } from './memory-sink.js';
