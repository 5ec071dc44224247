import type { RunStage } from '@curate/shared-types';
import { IllegalTransitionError } from '../errors.js';

const HALT: readonly RunStage[] = ['failed', 'cancelled'];

const NEXT: Record<RunStage, readonly RunStage[]> = {
  loading: ['deduplicating', ...HALT],
  deduplicating: ['filtering', ...HALT],
  filtering: ['annotating', ...HALT],
  annotating: ['persisting', ...HALT],
  persisting: ['completed', ...HALT],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isFinalStage(stage: RunStage): boolean {
  return NEXT[stage].length === 0;
}

/** Throws IllegalTransitionError unless `to` may follow `from` (null = not started). */
export function assertStageTransition(runId: string, from: RunStage | null, to: RunStage): void {
  const allowed = from === null ? to === 'loading' : NEXT[from].includes(to);
  if (!allowed) {
    throw new IllegalTransitionError(`run ${runId}`, from ?? 'idle', to);
  }
}
