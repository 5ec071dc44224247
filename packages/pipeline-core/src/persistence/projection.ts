import type { PersistedEntry, PipelineRecord, RecordStatus, TerminalStatus } from '@curate/shared-types';
import { IllegalTransitionError } from '../errors.js';

export function isTerminalStatus(status: RecordStatus): status is TerminalStatus {
  return status === 'annotated' || status === 'failed' || status === 'exhausted';
}

/**
 * Durable projection of a record that has reached a terminal annotation state.
 * Failed and exhausted records are persisted too, with `lastError` as the failure marker.
 */
export function toPersistedEntry(
  record: PipelineRecord,
  metadata: Record<string, unknown> = {},
): PersistedEntry {
  const { status } = record;
  if (!isTerminalStatus(status)) {
    throw new IllegalTransitionError(`record ${record.id}`, status, 'persisted');
  }
  return {
    id: record.id,
    identityKey: record.identityKey,
    sourceLocator: record.sourceLocator,
    status,
    annotation: status === 'annotated' ? record.annotation : null,
    attempts: record.attempts,
    lastError: record.lastError,
    metadata,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}
