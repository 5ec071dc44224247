export { canonicalizeIdentityKey } from './identity-key.js';
export { IdSequence } from './id-sequence.js';
export type { IdSequenceOptions } from './id-sequence.js';
export { deduplicate } from './deduplicate.js';
export type { DedupResult, DuplicateRecord } from './deduplicate.js';
