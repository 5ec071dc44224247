import type { RawRecord } from '@curate/shared-types';

/**
 * Where raw records come from. `records()` must be restartable: every call
 * yields the same finite sequence from the beginning.
 */
export interface AcquisitionSource {
  records(): AsyncIterable<RawRecord> | Iterable<RawRecord>;
  /** Human-readable origin for logs, e.g. a file path. */
  describe?(): string;
}

export function arraySource(raws: readonly RawRecord[], label = 'in-memory'): AcquisitionSource {
  return {
    records: () => raws.map((raw) => ({ ...raw })),
    describe: () => label,
  };
}

export async function drainSource(source: AcquisitionSource): Promise<RawRecord[]> {
  const out: RawRecord[] = [];
  for await (const raw of source.records()) {
    out.push(raw);
  }
  return out;
}
