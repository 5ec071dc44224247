export { db, closeDatabase } from './connection.js';
export type { Database } from './connection.js';
export { annotatedEntries } from './schema.js';
export type { AnnotatedEntryRow, NewAnnotatedEntryRow } from './schema.js';
