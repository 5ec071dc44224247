/**
 * FILE PURPOSE: Postgres-backed EntrySink (annotated_entries)
 *
 * HOW: upsert is a single `INSERT ... ON CONFLICT (id) DO UPDATE ... WHERE
 *      content_hash differs`. No row back means the stored content already
 *      matched; `xmax = 0` on the returned row tells an insert from an update.
 *      Every driver error is wrapped in PersistenceError and never retried
 *      here. Constraint, data and schema errors are marked non-retryable.
 */

import { and, desc, eq, isNotNull, like, or, sql } from 'drizzle-orm';
import type { AnnotationValue, PersistedEntry, UpsertOutcome } from '@curate/shared-types';
import { PersistenceError, describeError, entryFingerprint } from '@curate/pipeline-core';
import type { EntrySink } from '@curate/pipeline-core';
import { db, annotatedEntries } from '../db/index.js';
import type { AnnotatedEntryRow, NewAnnotatedEntryRow } from '../db/index.js';

// SQLSTATE classes that will fail the same way on every retry.
const PERMANENT_SQLSTATE = ['22', '23', '42'];

function sqlState(err: unknown): string | null {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

export function toPersistenceError(operation: string, err: unknown): PersistenceError {
  const code = sqlState(err);
  const retryable = code === null || !PERMANENT_SQLSTATE.some((prefix) => code.startsWith(prefix));
  return new PersistenceError(`${operation} failed: ${describeError(err)}`, { retryable, cause: err });
}

function projectText(annotation: AnnotationValue | null, ...keys: string[]): string | null {
  if (!annotation) return null;
  for (const key of keys) {
    const value = annotation[key];
    if (typeof value === 'string') return value;
  }
  return null;
}

export function toRow(entry: PersistedEntry): NewAnnotatedEntryRow {
  return {
    id: entry.id,
    identityKey: entry.identityKey,
    sourceLocator: entry.sourceLocator,
    status: entry.status,
    title: projectText(entry.annotation, 'title'),
    category: projectText(entry.annotation, 'category'),
    content: projectText(entry.annotation, 'content', 'summary'),
    annotation: entry.annotation,
    metadata: entry.metadata,
    contentHash: entryFingerprint(entry),
    attempts: entry.attempts,
    lastError: entry.lastError,
    createdAt: entry.createdAt,
    updatedAt: entry.updatedAt,
  };
}

export function fromRow(row: AnnotatedEntryRow): PersistedEntry {
  return {
    id: row.id,
    identityKey: row.identityKey,
    sourceLocator: row.sourceLocator,
    status: row.status,
    annotation: row.annotation ?? null,
    attempts: row.attempts,
    lastError: row.lastError,
    metadata: row.metadata,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class DrizzleEntrySink implements EntrySink {
  async alreadyProcessed(identityKeyOrId: string): Promise<boolean> {
    try {
      const rows = await db
        .select({ id: annotatedEntries.id })
        .from(annotatedEntries)
        .where(and(matchesKey(identityKeyOrId), isNotNull(annotatedEntries.annotation)))
        .limit(1);
      return rows.length > 0;
    } catch (err) {
      throw toPersistenceError('alreadyProcessed', err);
    }
  }

  async findEntry(identityKeyOrId: string): Promise<PersistedEntry | null> {
    try {
      const [row] = await db
        .select()
        .from(annotatedEntries)
        .where(matchesKey(identityKeyOrId))
        .orderBy(desc(annotatedEntries.updatedAt))
        .limit(1);
      return row ? fromRow(row) : null;
    } catch (err) {
      throw toPersistenceError('findEntry', err);
    }
  }

  async idsWithPrefix(prefix: string): Promise<string[]> {
    try {
      const rows = await db
        .select({ id: annotatedEntries.id })
        .from(annotatedEntries)
        .where(like(annotatedEntries.id, `${escapeLike(prefix)}%`));
      return rows.map((row) => row.id);
    } catch (err) {
      throw toPersistenceError('idsWithPrefix', err);
    }
  }

  async upsert(entry: PersistedEntry): Promise<UpsertOutcome> {
    const row = toRow(entry);
    try {
      const [written] = await db
        .insert(annotatedEntries)
        .values(row)
        .onConflictDoUpdate({
          target: annotatedEntries.id,
          set: {
            identityKey: row.identityKey,
            sourceLocator: row.sourceLocator,
            status: row.status,
            title: row.title,
            category: row.category,
            content: row.content,
            annotation: row.annotation,
            metadata: row.metadata,
            contentHash: row.contentHash,
            attempts: row.attempts,
            lastError: row.lastError,
            updatedAt: row.updatedAt,
          },
          setWhere: sql`${annotatedEntries.contentHash} <> excluded.content_hash`,
        })
        .returning({ inserted: sql<boolean>`(xmax = 0)` });

      if (!written) return 'unchanged';
      return written.inserted ? 'inserted' : 'updated';
    } catch (err) {
      throw toPersistenceError(`upsert of ${entry.id}`, err);
    }
  }
}

/** LIKE treats `_` and `%` as wildcards; the id separator is `_`. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}

function matchesKey(identityKeyOrId: string) {
  return or(eq(annotatedEntries.id, identityKeyOrId), eq(annotatedEntries.identityKey, identityKeyOrId));
}
