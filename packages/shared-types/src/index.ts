/**
 * FILE PURPOSE: Shared data model for the annotation pipeline
 *
 * WHY: The core package, the worker app and its Postgres sink all exchange the
 *      same Record / PersistedEntry / RunSummary shapes. One definition here
 *      keeps them from drifting.
 */

// ─── Records ────────────────────────────────────────────────────────────────

/** Lifecycle status of a record. Only the scheduler moves a record out of `new`. */
export type RecordStatus = 'new' | 'annotated' | 'failed' | 'exhausted' | 'skipped';

/** Statuses a record can end the annotation stage in. */
export type TerminalStatus = 'annotated' | 'failed' | 'exhausted';

/** One item yielded by an acquisition source. */
export interface RawRecord {
  /** Pre-existing identifier, kept verbatim when present. */
  id?: string;
  /** Natural identifier (usually the source URL); canonicalized by dedup. */
  identityKey: string;
  rawPayload: string | Uint8Array;
  sourceLocator: string;
}

export interface PipelineRecord {
  readonly id: string;
  identityKey: string;
  rawPayload: string | Uint8Array;
  sourceLocator: string;
  status: RecordStatus;
  annotation: AnnotationValue | null;
  attempts: number;
  lastError: string | null;
  createdAt: Date;
  updatedAt: Date;
}

// ─── Annotation schema ──────────────────────────────────────────────────────

interface FieldBase {
  name: string;
  /** Defaults to true. */
  required?: boolean;
  description?: string;
}

export interface StringField extends FieldBase {
  type: 'string';
}

export interface BooleanField extends FieldBase {
  type: 'boolean';
}

export interface EnumField extends FieldBase {
  type: 'enum';
  values: readonly string[];
}

export interface ListField extends FieldBase {
  type: 'list';
  items: AnnotationSchema;
}

export type AnnotationField = StringField | BooleanField | EnumField | ListField;

export type FieldType = AnnotationField['type'];

/** Expected shape of structured output. Field order is preserved in prompts and output. */
export interface AnnotationSchema {
  name: string;
  fields: readonly AnnotationField[];
}

export type AnnotationFieldValue = string | boolean | AnnotationValue[];

/** A value that has passed validation against an AnnotationSchema. */
export interface AnnotationValue {
  [field: string]: AnnotationFieldValue;
}

// ─── Jobs ───────────────────────────────────────────────────────────────────

export type JobState = 'pending' | 'in_flight' | 'succeeded' | 'failed' | 'exhausted';

// ─── Persistence ────────────────────────────────────────────────────────────

/** Durable projection of a record. Primary key is `id`. */
export interface PersistedEntry {
  id: string;
  identityKey: string;
  sourceLocator: string;
  status: TerminalStatus;
  annotation: AnnotationValue | null;
  attempts: number;
  lastError: string | null;
  metadata: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

export type UpsertOutcome = 'inserted' | 'updated' | 'unchanged';

// ─── Runs ───────────────────────────────────────────────────────────────────

export type RunStage =
  | 'loading'
  | 'deduplicating'
  | 'filtering'
  | 'annotating'
  | 'persisting'
  | 'completed'
  | 'failed'
  | 'cancelled';

export interface StageTransition {
  stage: RunStage;
  at: Date;
}

export interface RunCounts {
  skippedDuplicate: number;
  skippedAlreadyProcessed: number;
  annotated: number;
  failed: number;
  exhausted: number;
  /** Records never brought to a terminal state because the run stopped. */
  abandoned: number;
  persisted: number;
}

export interface DuplicateReport {
  identityKey: string;
  sourceLocator: string;
  /** Id of the first occurrence that was kept. */
  keptId: string;
}

export interface FailureReport {
  id: string;
  identityKey: string;
  status: 'failed' | 'exhausted';
  lastError: string;
}

export interface RunUsage {
  /** Responses that parsed directly vs. needed the fenced stage or a repair. */
  parse: { direct: number; fallback: number; fallbackRate: number };
  /** Null when no cost ledger was attached to the run. */
  costUSD: number | null;
  annotationCalls: number;
}

export interface RunSummary {
  runId: string;
  stage: RunStage;
  counts: RunCounts;
  duplicates: DuplicateReport[];
  alreadyProcessed: string[];
  failures: FailureReport[];
  stages: StageTransition[];
  startedAt: Date;
  finishedAt: Date;
  usage: RunUsage;
  /** Set when the run ended in `failed` or `cancelled`. */
  error: string | null;
}
