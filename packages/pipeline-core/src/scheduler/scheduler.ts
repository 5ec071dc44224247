/**
 * FILE PURPOSE: Drive the annotation capability across records with bounded
 *               concurrency and explicit retry
 *
 * HOW: runPool() caps jobs in flight at `concurrency`. Each job wraps one
 *      record in an AnnotationJob and runs its attempts through runWithRetry():
 *      call the capability, hand the text to parseAnnotation(), throw the
 *      typed error on failure so the policy decides whether to go again.
 *
 * TERMINAL MAPPING:
 * - parsed and valid                         → annotated
 * - ParseError / ValidationError on last try → failed
 * - non-retryable TransportError             → failed
 * - transport failures on every attempt      → exhausted (ExhaustedError)
 * - FatalError from the capability           → record abandoned, run halted
 *
 * Stop signal: no new jobs and no new retries; untouched records stay `new`
 * and are reported as abandoned. Abort signal: passed to in-flight calls.
 */

import type {
  AnnotationSchema,
  AnnotationValue,
  FailureReport,
  JobState,
  PipelineRecord,
  TerminalStatus,
} from '@curate/shared-types';
import {
  ExhaustedError,
  FatalError,
  TransportError,
  ValidationError,
  describeError,
  isAbortError,
  toError,
} from '../errors.js';
import { ANNOTATION_PARSE_FEATURE, FallbackMonitor } from '../fallback-monitor.js';
import { silentLogger } from '../logger.js';
import type { PipelineLogger } from '../logger.js';
import { describeSchema } from '../parsing/schema-definition.js';
import { parseAnnotation } from '../parsing/validator.js';
import { AnnotationJob } from './job.js';
import { runWithRetry } from './retry.js';
import type { RetryPolicy, Sleep } from './retry.js';
import { linkSignals } from './signals.js';
import { runPool } from './worker-pool.js';

export interface AnnotationRequest {
  recordId: string;
  promptContext: string;
  payload: string | Uint8Array;
  schema: AnnotationSchema;
  attempt: number;
  signal: AbortSignal;
}

/** Returns the raw response text, or rejects with TransportError / FatalError. No internal retry. */
export type AnnotationCapability = (request: AnnotationRequest) => Promise<string>;

export interface SchedulerOptions {
  annotate: AnnotationCapability;
  schema: AnnotationSchema;
  concurrency: number;
  retry: RetryPolicy;
  /** Defaults to an instruction built from describeSchema(). */
  promptContext?: string;
  logger?: PipelineLogger;
  monitor?: FallbackMonitor;
  sleep?: Sleep;
  random?: () => number;
  now?: () => Date;
}

export interface JobOutcome {
  record: PipelineRecord;
  /** Null when the record was abandoned before reaching a terminal state. */
  status: TerminalStatus | null;
  state: JobState;
  attempts: number;
  error: Error | null;
}

export interface SchedulerRunOptions {
  /** No new jobs or retries once aborted. */
  stopSignal?: AbortSignal;
  /** Cancels calls that are in flight. */
  abortSignal?: AbortSignal;
  /** Called once per record that reaches a terminal status. */
  onSettled?: (outcome: JobOutcome) => void;
}

export interface SchedulerCounts {
  annotated: number;
  failed: number;
  exhausted: number;
  abandoned: number;
  /** Capability calls made, retries included. */
  calls: number;
}

export interface SchedulerReport {
  /** Indexed like the input records. */
  outcomes: JobOutcome[];
  counts: SchedulerCounts;
  failures: FailureReport[];
  peakInFlight: number;
  fatal: FatalError | null;
}

export function defaultPromptContext(schema: AnnotationSchema): string {
  return [
    `Annotate the content below as "${schema.name}".`,
    `Respond with a single JSON object of this shape: ${describeSchema(schema)}`,
  ].join('\n');
}

export class AnnotationScheduler {
  private readonly logger: PipelineLogger;
  private readonly monitor: FallbackMonitor;
  private readonly promptContext: string;
  private readonly now: () => Date;

  constructor(private readonly options: SchedulerOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.logger = options.logger ?? silentLogger;
    this.monitor = options.monitor ?? new FallbackMonitor();
    this.promptContext = options.promptContext ?? defaultPromptContext(options.schema);
    this.now = options.now ?? (() => new Date());
  }

  async run(records: readonly PipelineRecord[], runOptions: SchedulerRunOptions = {}): Promise<SchedulerReport> {
    const counts: SchedulerCounts = { annotated: 0, failed: 0, exhausted: 0, abandoned: 0, calls: 0 };
    let fatal: FatalError | null = null;

    // Stops intake on operator stop, hard abort, or a fatal error from any job.
    const halt = linkSignals(runOptions.stopSignal, runOptions.abortSignal);
    const callSignal = runOptions.abortSignal ?? new AbortController().signal;

    const escalate = (error: FatalError): void => {
      fatal ??= error;
      halt.controller.abort(error);
    };

    const settle = (outcome: JobOutcome): JobOutcome => {
      if (outcome.status === null) {
        counts.abandoned++;
        return outcome;
      }
      counts[outcome.status]++;
      try {
        runOptions.onSettled?.(outcome);
      } catch (err) {
        escalate(err instanceof FatalError ? err : new FatalError(describeError(err), { cause: err }));
      }
      return outcome;
    };

    try {
      const pool = await runPool(
        records,
        this.options.concurrency,
        async (record) => settle(await this.runJob(record, halt.controller.signal, callSignal, counts, escalate)),
        { signal: halt.controller.signal },
      );

      const outcomes = pool.results.map((outcome, index): JobOutcome => {
        if (outcome) return outcome;
        const record = records[index];
        if (!record) throw new RangeError(`No record at index ${index}`);
        counts.abandoned++;
        return { record, status: null, state: 'pending', attempts: 0, error: null };
      });

      const failures: FailureReport[] = [];
      for (const outcome of outcomes) {
        if (outcome.status === 'failed' || outcome.status === 'exhausted') {
          failures.push({
            id: outcome.record.id,
            identityKey: outcome.record.identityKey,
            status: outcome.status,
            lastError: outcome.record.lastError ?? 'unknown error',
          });
        }
      }

      return { outcomes, counts, failures, peakInFlight: pool.peakInFlight, fatal };
    } finally {
      halt.dispose();
    }
  }

  private async runJob(
    record: PipelineRecord,
    haltSignal: AbortSignal,
    callSignal: AbortSignal,
    counts: SchedulerCounts,
    escalate: (error: FatalError) => void,
  ): Promise<JobOutcome> {
    const job = new AnnotationJob(record);
    const { annotate, schema, retry } = this.options;

    const result = await runWithRetry<AnnotationValue>(
      async () => {
        const attempt = job.begin();
        counts.calls++;
        const text = await annotate({
          recordId: record.id,
          promptContext: this.promptContext,
          payload: record.rawPayload,
          schema,
          attempt,
          signal: callSignal,
        });

        const parsed = parseAnnotation(text, schema);
        if (!parsed.ok) throw parsed.error;

        if (parsed.strategy === 'direct' && !parsed.repaired) {
          this.monitor.recordPrimary(ANNOTATION_PARSE_FEATURE);
        } else {
          this.monitor.recordFallback(ANNOTATION_PARSE_FEATURE, parsed.repaired ? `${parsed.strategy}+repair` : parsed.strategy);
        }
        return parsed.value;
      },
      retry,
      {
        signal: haltSignal,
        sleep: this.options.sleep,
        random: this.options.random,
        shouldRetry: (error) => {
          if (error instanceof FatalError || isAbortError(error)) return false;
          if (error instanceof TransportError) return error.retryable;
          return true;
        },
        onRetry: (error, attempt, delayMs) => {
          job.transition('pending');
          this.logger.warn(
            `Attempt ${attempt}/${retry.maxAttempts} for ${record.id} failed (${describeError(error)}), retrying in ${delayMs}ms`,
          );
        },
      },
    );

    record.attempts = job.attempt;
    record.updatedAt = this.now();

    if (result.ok) {
      job.transition('succeeded');
      record.status = 'annotated';
      record.annotation = result.value;
      record.lastError = null;
      return { record, status: 'annotated', state: job.state, attempts: job.attempt, error: null };
    }

    const error = result.error;
    if (error instanceof FatalError) {
      escalate(error);
      this.logger.error(`Run halted by ${record.id}: ${describeError(error)}`);
      return this.abandon(record, job, error);
    }
    if (result.aborted || isAbortError(error)) {
      return this.abandon(record, job, error);
    }

    if (error instanceof ValidationError || (error instanceof TransportError && !error.retryable)) {
      job.transition('failed');
      record.status = 'failed';
      record.lastError = describeError(error);
      this.logger.warn(`${record.id} failed after ${job.attempt} attempt(s): ${record.lastError}`);
      return { record, status: 'failed', state: job.state, attempts: job.attempt, error };
    }

    const exhausted = new ExhaustedError(job.attempt, toError(error));
    job.transition('exhausted');
    record.status = 'exhausted';
    record.lastError = describeError(exhausted);
    this.logger.warn(`${record.id} exhausted: ${record.lastError}`);
    return { record, status: 'exhausted', state: job.state, attempts: job.attempt, error: exhausted };
  }

  private abandon(record: PipelineRecord, job: AnnotationJob, error: Error): JobOutcome {
    return { record, status: null, state: job.state, attempts: job.attempt, error };
  }
}
