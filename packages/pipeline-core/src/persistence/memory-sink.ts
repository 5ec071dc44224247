/**
 * FILE PURPOSE: In-process EntrySink
 *
 * WHY: Reference implementation of the sink contract. Used for dry runs and
 *      as the store in coordinator tests, where `failWith()` simulates an
 *      unreachable database.
 */

import type { PersistedEntry, UpsertOutcome } from '@curate/shared-types';
import { PersistenceError } from '../errors.js';
import { entryFingerprint } from './fingerprint.js';
import type { EntrySink } from './types.js';

type SinkOperation = 'alreadyProcessed' | 'findEntry' | 'upsert' | 'idsWithPrefix';

/** Return an error to make the operation fail, or null to let it through. */
export type FailureInjector = (operation: SinkOperation, key: string) => PersistenceError | null;

interface StoredEntry {
  entry: PersistedEntry;
  fingerprint: string;
}

export class InMemoryEntrySink implements EntrySink {
  private readonly byId = new Map<string, StoredEntry>();
  private readonly idByIdentityKey = new Map<string, string>();
  private injector: FailureInjector | null = null;
  private upsertCalls = 0;

  constructor(seed: readonly PersistedEntry[] = []) {
    for (const entry of seed) {
      this.store(entry);
    }
  }

  failWith(injector: FailureInjector | null): void {
    this.injector = injector;
  }

  async alreadyProcessed(identityKeyOrId: string): Promise<boolean> {
    this.check('alreadyProcessed', identityKeyOrId);
    const entry = this.lookup(identityKeyOrId);
    return entry !== null && entry.annotation !== null;
  }

  async findEntry(identityKeyOrId: string): Promise<PersistedEntry | null> {
    this.check('findEntry', identityKeyOrId);
    const entry = this.lookup(identityKeyOrId);
    return entry ? cloneEntry(entry) : null;
  }

  async upsert(entry: PersistedEntry): Promise<UpsertOutcome> {
    this.upsertCalls++;
    this.check('upsert', entry.id);

    const existing = this.byId.get(entry.id);
    const fingerprint = entryFingerprint(entry);
    if (existing && existing.fingerprint === fingerprint) {
      return 'unchanged';
    }

    this.store(existing ? { ...entry, createdAt: existing.entry.createdAt } : entry);
    return existing ? 'updated' : 'inserted';
  }

  async idsWithPrefix(prefix: string): Promise<string[]> {
    this.check('idsWithPrefix', prefix);
    return [...this.byId.keys()].filter((id) => id.startsWith(prefix));
  }

  /** Stored entries in insertion order. */
  entries(): PersistedEntry[] {
    return [...this.byId.values()].map(({ entry }) => cloneEntry(entry));
  }

  get size(): number {
    return this.byId.size;
  }

  /** Number of upsert calls received, including failed and unchanged ones. */
  get upsertCount(): number {
    return this.upsertCalls;
  }

  private check(operation: SinkOperation, key: string): void {
    const error = this.injector?.(operation, key);
    if (error) throw error;
  }

  private lookup(identityKeyOrId: string): PersistedEntry | null {
    const id = this.byId.has(identityKeyOrId) ? identityKeyOrId : this.idByIdentityKey.get(identityKeyOrId);
    if (id === undefined) return null;
    return this.byId.get(id)?.entry ?? null;
  }

  private store(entry: PersistedEntry): void {
    const copy = cloneEntry(entry);
    const previousKey = this.byId.get(copy.id)?.entry.identityKey;
    if (previousKey !== undefined && previousKey !== copy.identityKey && this.idByIdentityKey.get(previousKey) === copy.id) {
      this.idByIdentityKey.delete(previousKey);
    }
    this.byId.set(copy.id, { entry: copy, fingerprint: entryFingerprint(copy) });
    this.idByIdentityKey.set(copy.identityKey, copy.id);
  }
}

function cloneEntry(entry: PersistedEntry): PersistedEntry {
  return structuredClone(entry);
}
