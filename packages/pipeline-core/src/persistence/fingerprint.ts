/**
 * FILE PURPOSE: Content fingerprint for idempotent upserts
 *
 * HOW: SHA-256 over key-sorted JSON of the entry's content fields.
 *      Timestamps are left out so rewriting identical content is detectable
 *      as a no-op.
 */

import { createHash } from 'node:crypto';
import type { PersistedEntry } from '@curate/shared-types';

export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => stableStringify(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function entryFingerprint(entry: PersistedEntry): string {
  const content = {
    identityKey: entry.identityKey,
    sourceLocator: entry.sourceLocator,
    status: entry.status,
    annotation: entry.annotation,
    attempts: entry.attempts,
    lastError: entry.lastError,
    metadata: entry.metadata,
  };
  return createHash('sha256').update(stableStringify(content)).digest('hex');
}
