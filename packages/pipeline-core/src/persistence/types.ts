/**
 * FILE PURPOSE: Contract between the coordinator and a durable entry store
 *
 * Implementations must:
 *   - treat `upsert` as an idempotent keyed write on `id` (same content twice
 *     is reported `unchanged` and leaves stored values alone)
 *   - keep upserts for different ids independent of each other
 *   - report failures as PersistenceError and never retry internally; the
 *     retry budget belongs to the caller
 */

import type { PersistedEntry, UpsertOutcome } from '@curate/shared-types';

export interface EntrySink {
  /** True when an entry for this identity key or id exists with a non-null annotation. */
  alreadyProcessed(identityKeyOrId: string): Promise<boolean>;
  findEntry(identityKeyOrId: string): Promise<PersistedEntry | null>;
  upsert(entry: PersistedEntry): Promise<UpsertOutcome>;
  /** Every stored id starting with `prefix`, whatever its identity key. */
  idsWithPrefix(prefix: string): Promise<string[]>;
}
