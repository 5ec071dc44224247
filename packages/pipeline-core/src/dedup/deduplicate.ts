/**
 * FILE PURPOSE: Identity assignment + first-occurrence-wins deduplication
 *
 * HOW: Single pass to find survivors by canonical identity key, then ids.
 *      Conflict policy: when two raw records share an identity key, the first
 *      one encountered is kept with all of its original field values; later
 *      ones are reported as duplicates and never merged field by field.
 *      Survivors keep any pre-existing id; the rest get the next sequence
 *      value in encounter order. Touches nothing but the sequence.
 */

import type { PipelineRecord, RawRecord } from '@curate/shared-types';
import { ValidationError } from '../errors.js';
import { canonicalizeIdentityKey } from './identity-key.js';
import type { IdSequence } from './id-sequence.js';

export interface DuplicateRecord {
  identityKey: string;
  sourceLocator: string;
  /** Position in the input. */
  index: number;
  /** Id of the kept first occurrence. */
  keptId: string;
}

export interface DedupResult {
  /** Survivors, in original encounter order, status `new`. */
  records: PipelineRecord[];
  /** Discarded records, in original encounter order. */
  duplicates: DuplicateRecord[];
}

export function deduplicate(
  raws: readonly RawRecord[],
  sequence: IdSequence,
  now: () => Date = () => new Date(),
): DedupResult {
  const firstByKey = new Map<string, number>();
  const survivors: Array<{ raw: RawRecord; key: string }> = [];
  const duplicateRefs: Array<{ raw: RawRecord; key: string; index: number; survivor: number }> = [];

  raws.forEach((raw, index) => {
    const key = canonicalizeIdentityKey(raw.identityKey);
    if (key === '') {
      throw new ValidationError(`Record at index ${index} has an empty identity key`, raw.sourceLocator);
    }
    const survivor = firstByKey.get(key);
    if (survivor !== undefined) {
      duplicateRefs.push({ raw, key, index, survivor });
      return;
    }
    firstByKey.set(key, survivors.length);
    survivors.push({ raw, key });
  });

  const owners = new Map<string, string>();
  for (const { raw, key } of survivors) {
    if (raw.id === undefined) continue;
    const owner = owners.get(raw.id);
    if (owner !== undefined) {
      throw new ValidationError(
        `Id ${raw.id} is used by two different identity keys (${owner}, ${key})`,
        raw.sourceLocator,
      );
    }
    owners.set(raw.id, key);
    sequence.claim(raw.id);
  }

  const timestamp = now();
  const records = survivors.map(({ raw, key }): PipelineRecord => ({
    id: raw.id ?? sequence.next(),
    identityKey: key,
    rawPayload: raw.rawPayload,
    sourceLocator: raw.sourceLocator,
    status: 'new',
    annotation: null,
    attempts: 0,
    lastError: null,
    createdAt: timestamp,
    updatedAt: timestamp,
  }));

  const duplicates: DuplicateRecord[] = duplicateRefs.map(({ raw, key, index, survivor }) => ({
    identityKey: key,
    sourceLocator: raw.sourceLocator,
    index,
    keptId: records[survivor]?.id ?? '',
  }));

  return { records, duplicates };
}
