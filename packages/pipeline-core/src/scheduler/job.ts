import type { JobState, PipelineRecord } from '@curate/shared-types';
import { IllegalTransitionError } from '../errors.js';

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  pending: ['in_flight'],
  in_flight: ['pending', 'succeeded', 'failed', 'exhausted'],
  succeeded: [],
  failed: [],
  exhausted: [],
};

/**
 * One record's trip through the annotation capability. Owned by the
 * scheduler for its lifetime; a terminal state is reached at most once.
 */
export class AnnotationJob {
  private current: JobState = 'pending';
  private attemptCount = 0;

  constructor(readonly record: PipelineRecord) {}

  get state(): JobState {
    return this.current;
  }

  get attempt(): number {
    return this.attemptCount;
  }

  /** pending → in_flight, counting the attempt. */
  begin(): number {
    this.transition('in_flight');
    this.attemptCount++;
    return this.attemptCount;
  }

  transition(to: JobState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new IllegalTransitionError(`job ${this.record.id}`, this.current, to);
    }
    this.current = to;
  }
}
