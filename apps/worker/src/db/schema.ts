/**
 * FILE PURPOSE: Database schema for persisted annotation entries
 *
 * HOW: Drizzle ORM schema definitions. Run `npm run db:push -w @curate/worker`
 *      to sync to DB.
 *
 * Tables: annotated_entries.
 */

import {
  pgTable,
  text,
  integer,
  timestamp,
  index,
  jsonb,
} from 'drizzle-orm/pg-core';
import type { AnnotationValue, TerminalStatus } from '@curate/shared-types';

// ─── annotated_entries ──────────────────────────────────────────────────────
// One row per record id. Failed and exhausted records are stored too, with
// last_error as the failure marker and a null annotation. title / category /
// content are projected from the annotation for querying; the full value
// lives in `annotation`. content_hash is the entry fingerprint: an upsert
// with the same hash leaves the row untouched.
export const annotatedEntries = pgTable(
  'annotated_entries',
  {
    id: text('id').primaryKey(),
    identityKey: text('identity_key').notNull(),
    sourceLocator: text('source_locator').notNull(),
    status: text('status').$type<TerminalStatus>().notNull(),
    title: text('title'),
    category: text('category'),
    content: text('content'),
    annotation: jsonb('annotation').$type<AnnotationValue>(),
    metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default({}),
    contentHash: text('content_hash').notNull(),
    attempts: integer('attempts').notNull().default(0),
    lastError: text('last_error'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('idx_annotated_identity_key').on(table.identityKey),
    index('idx_annotated_status').on(table.status, table.updatedAt),
  ],
);

export type AnnotatedEntryRow = typeof annotatedEntries.$inferSelect;
export type NewAnnotatedEntryRow = typeof annotatedEntries.$inferInsert;
