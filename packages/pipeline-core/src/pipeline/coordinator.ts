/**
 * FILE PURPOSE: One pipeline run, from acquisition to persisted entries
 *
 * STAGES: loading → deduplicating → filtering → annotating → persisting →
 *         completed. `failed` is reachable from any stage on a FatalError,
 *         `cancelled` after cancel().
 *
 * HOW:
 * - deduplicating: identity keys that already have a persisted entry reuse
 *   its id, so a re-run upserts over the same rows. The IdSequence is owned
 *   by the run and skips every id the sink already holds.
 * - filtering: annotated entries are skipped; failed entries are skipped
 *   unless `retryFailed`; exhausted and unknown ones go on to annotation.
 * - annotating: each record is handed to the sink as soon as it reaches a
 *   terminal state, so an interrupted run keeps everything finished so far.
 * - persisting: waits for the outstanding upserts.
 * Every sink call runs through the persistence retry policy; a sink that
 * still fails after it is a FatalError and halts the run.
 */

import { randomUUID } from 'node:crypto';
import type {
  AnnotationSchema,
  DuplicateReport,
  PipelineRecord,
  RawRecord,
  RunCounts,
  RunStage,
  RunSummary,
  RunUsage,
  StageTransition,
  FailureReport,
} from '@curate/shared-types';
import type { PipelineConfig } from '../config.js';
import type { CostLedger } from '../cost-ledger.js';
import { canonicalizeIdentityKey } from '../dedup/identity-key.js';
import { IdSequence } from '../dedup/id-sequence.js';
import { deduplicate } from '../dedup/deduplicate.js';
import type { DedupResult } from '../dedup/deduplicate.js';
import { FatalError, PersistenceError, describeError } from '../errors.js';
import { ANNOTATION_PARSE_FEATURE, FallbackMonitor } from '../fallback-monitor.js';
import { silentLogger } from '../logger.js';
import type { PipelineLogger } from '../logger.js';
import { toPersistedEntry } from '../persistence/projection.js';
import type { EntrySink } from '../persistence/types.js';
import { AnnotationScheduler } from '../scheduler/scheduler.js';
import type { AnnotationCapability, JobOutcome, SchedulerReport } from '../scheduler/scheduler.js';
import { runWithRetry } from '../scheduler/retry.js';
import type { Sleep } from '../scheduler/retry.js';
import { drainSource } from './sources.js';
import type { AcquisitionSource } from './sources.js';
import { assertStageTransition, isFinalStage } from './stages.js';

export interface CoordinatorOptions {
  source: AcquisitionSource;
  sink: EntrySink;
  annotate: AnnotationCapability;
  schema: AnnotationSchema;
  config: PipelineConfig;
  logger?: PipelineLogger;
  monitor?: FallbackMonitor;
  ledger?: CostLedger;
  promptContext?: string;
  /** Extra data stored with each entry. Defaults to `{ schema: schema.name }`. */
  metadata?: (record: PipelineRecord) => Record<string, unknown>;
  onStageChange?: (transition: StageTransition) => void;
  runId?: string;
  sleep?: Sleep;
  random?: () => number;
  now?: () => Date;
}

class RunCancelled extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'RunCancelled';
  }
}

export class PipelineCoordinator {
  readonly runId: string;
  private currentStage: RunStage | null = null;
  private readonly stages: StageTransition[] = [];
  private readonly stop = new AbortController();
  private readonly hardAbort = new AbortController();
  private graceTimer: NodeJS.Timeout | null = null;
  private cancelReason: string | null = null;
  private fatal: FatalError | null = null;
  private started = false;

  private readonly logger: PipelineLogger;
  private readonly monitor: FallbackMonitor;
  private readonly now: () => Date;

  private readonly counts: RunCounts = {
    skippedDuplicate: 0,
    skippedAlreadyProcessed: 0,
    annotated: 0,
    failed: 0,
    exhausted: 0,
    abandoned: 0,
    persisted: 0,
  };
  private duplicates: DuplicateReport[] = [];
  private readonly alreadyProcessed: string[] = [];
  private failures: FailureReport[] = [];
  private annotationCalls = 0;
  private readonly writes: Array<Promise<void>> = [];

  constructor(private readonly options: CoordinatorOptions) {
    this.runId = options.runId ?? `run_${randomUUID()}`;
    this.logger = options.logger ?? silentLogger;
    this.monitor = options.monitor ?? new FallbackMonitor();
    this.now = options.now ?? (() => new Date());
  }

  get stage(): RunStage | null {
    return this.currentStage;
  }

  /**
   * Stop submitting work. In-flight annotation calls get
   * `shutdownGraceMs` to finish before their abort signal fires.
   */
  cancel(reason = 'Cancelled by operator'): void {
    if (this.stop.signal.aborted) return;
    if (this.currentStage !== null && isFinalStage(this.currentStage)) return;
    this.cancelReason ??= reason;
    this.logger.warn(`Run ${this.runId} stopping: ${reason}`);
    this.halt();
  }

  async run(): Promise<RunSummary> {
    if (this.started) {
      throw new Error(`Run ${this.runId} has already been started`);
    }
    this.started = true;
    const startedAt = this.now();

    try {
      this.enter('loading');
      const raws = await this.load();

      this.enter('deduplicating');
      const records = await this.dedup(raws);

      this.enter('filtering');
      const pending = await this.filter(records);

      this.enter('annotating');
      const report = await this.annotate(pending);
      if (report.fatal) this.fatal ??= report.fatal;

      this.enter('persisting');
      await Promise.all(this.writes);
      if (this.fatal) throw this.fatal;
      this.throwIfCancelled();

      this.enter('completed');
    } catch (err) {
      this.finishWithError(err);
    } finally {
      this.clearGraceTimer();
    }

    return this.summary(startedAt);
  }

  // ─── Stages ─────────────────────────────────────────────────────────────

  private async load(): Promise<RawRecord[]> {
    let raws: RawRecord[];
    try {
      raws = await drainSource(this.options.source);
    } catch (err) {
      throw new FatalError(`Acquisition source failed: ${describeError(err)}`, { cause: err });
    }
    if (raws.length === 0) {
      throw new FatalError('Acquisition source yielded no records');
    }
    const origin = this.options.source.describe?.() ?? 'source';
    this.logger.info(`Loaded ${raws.length} raw record(s) from ${origin}`);
    this.throwIfCancelled();
    return raws;
  }

  private async dedup(raws: RawRecord[]): Promise<PipelineRecord[]> {
    const { config } = this.options;
    const sequence = new IdSequence({ prefix: config.idPrefix, width: config.idWidth });

    const persistedIds = new Map<string, string>();
    for (const raw of raws) {
      if (raw.id !== undefined) continue;
      const key = canonicalizeIdentityKey(raw.identityKey);
      if (key === '' || persistedIds.has(key)) continue;
      const entry = await this.withSink(`lookup of ${key}`, () => this.options.sink.findEntry(key));
      if (entry) persistedIds.set(key, entry.id);
      this.throwIfCancelled();
    }

    // Ids stored under other identity keys (earlier runs over other input) must not be handed out again.
    const idPrefix = `${config.idPrefix}_`;
    const storedIds = await this.withSink(`id scan for ${idPrefix}`, () => this.options.sink.idsWithPrefix(idPrefix));
    for (const id of storedIds) sequence.claim(id);
    this.throwIfCancelled();

    const withIds = raws.map((raw): RawRecord => {
      if (raw.id !== undefined) return raw;
      const id = persistedIds.get(canonicalizeIdentityKey(raw.identityKey));
      return id === undefined ? raw : { ...raw, id };
    });

    let result: DedupResult;
    try {
      result = deduplicate(withIds, sequence, this.now);
    } catch (err) {
      throw new FatalError(`Deduplication failed: ${describeError(err)}`, { cause: err });
    }

    this.duplicates = result.duplicates.map(({ identityKey, sourceLocator, keptId }) => ({
      identityKey,
      sourceLocator,
      keptId,
    }));
    this.counts.skippedDuplicate = result.duplicates.length;
    this.logger.info(`${result.records.length} unique record(s), ${result.duplicates.length} duplicate(s) skipped`);
    return result.records;
  }

  private async filter(records: PipelineRecord[]): Promise<PipelineRecord[]> {
    const { sink, config } = this.options;
    const pending: PipelineRecord[] = [];

    for (const record of records) {
      this.throwIfCancelled();
      const key = record.identityKey;
      const done = await this.withSink(`check of ${key}`, () => sink.alreadyProcessed(key));
      let skip = done;
      if (!done && !config.retryFailed) {
        const entry = await this.withSink(`lookup of ${key}`, () => sink.findEntry(key));
        skip = entry?.status === 'failed';
      }

      if (skip) {
        this.alreadyProcessed.push(key);
      } else {
        pending.push(record);
      }
    }

    this.counts.skippedAlreadyProcessed = this.alreadyProcessed.length;
    this.logger.info(`${pending.length} record(s) to annotate, ${this.alreadyProcessed.length} already processed`);
    return pending;
  }

  private async annotate(pending: PipelineRecord[]): Promise<SchedulerReport> {
    const { config } = this.options;
    const scheduler = new AnnotationScheduler({
      annotate: this.options.annotate,
      schema: this.options.schema,
      concurrency: config.concurrency,
      retry: config.annotationRetry,
      promptContext: this.options.promptContext,
      logger: this.logger,
      monitor: this.monitor,
      sleep: this.options.sleep,
      random: this.options.random,
      now: this.now,
    });

    const report = await scheduler.run(pending, {
      stopSignal: this.stop.signal,
      abortSignal: this.hardAbort.signal,
      onSettled: (outcome) => this.writes.push(this.persist(outcome)),
    });

    this.counts.annotated = report.counts.annotated;
    this.counts.failed = report.counts.failed;
    this.counts.exhausted = report.counts.exhausted;
    this.counts.abandoned = report.counts.abandoned;
    this.failures = report.failures;
    this.annotationCalls = report.counts.calls;
    this.logger.info(
      `Annotation finished: ${report.counts.annotated} annotated, ${report.counts.failed} failed, ` +
      `${report.counts.exhausted} exhausted, ${report.counts.abandoned} abandoned (peak in flight ${report.peakInFlight})`,
    );
    const alert = this.monitor.getAlertLevel(ANNOTATION_PARSE_FEATURE);
    if (alert !== 'ok') {
      const rate = Math.round(this.monitor.getFallbackRate(ANNOTATION_PARSE_FEATURE) * 100);
      this.logger.warn(`Parse fallback rate ${rate}% is at alert level ${alert}; check the prompt and schema description`);
    }
    return report;
  }

  /** Never rejects: a sink failure past its budget halts the run instead. */
  private async persist(outcome: JobOutcome): Promise<void> {
    const { record } = outcome;
    const metadata = this.options.metadata?.(record) ?? { schema: this.options.schema.name };
    const entry = toPersistedEntry(record, metadata);
    try {
      const result = await this.withSink(`upsert of ${record.id}`, () => this.options.sink.upsert(entry));
      this.counts.persisted++;
      if (result !== 'unchanged') {
        this.logger.info(`${result === 'inserted' ? 'Inserted' : 'Updated'} ${record.id} (${record.status})`);
      }
    } catch (err) {
      if (err instanceof FatalError) {
        this.fatal ??= err;
        this.halt();
        return;
      }
      this.logger.warn(`${record.id} not persisted: ${describeError(err)}`);
    }
  }

  // ─── Helpers ────────────────────────────────────────────────────────────

  /** Runs a sink call under the persistence retry budget; FatalError once it is spent. */
  private async withSink<T>(label: string, op: () => Promise<T>): Promise<T> {
    const policy = this.options.config.persistRetry;
    const outcome = await runWithRetry(op, policy, {
      signal: this.hardAbort.signal,
      sleep: this.options.sleep,
      random: this.options.random,
      shouldRetry: (error) => !(error instanceof PersistenceError) || error.retryable,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(`Sink ${label} failed (attempt ${attempt}/${policy.maxAttempts}): ${describeError(error)}, retrying in ${delayMs}ms`);
      },
    });

    if (outcome.ok) return outcome.value;
    if (outcome.aborted) {
      throw new RunCancelled(`Sink ${label} aborted`);
    }
    throw new FatalError(
      `Sink ${label} failed after ${outcome.attempts} attempt(s): ${describeError(outcome.error)}`,
      { cause: outcome.error },
    );
  }

  private enter(stage: RunStage): void {
    assertStageTransition(this.runId, this.currentStage, stage);
    this.currentStage = stage;
    const transition = { stage, at: this.now() };
    this.stages.push(transition);
    this.options.onStageChange?.(transition);
  }

  private halt(): void {
    if (this.stop.signal.aborted) return;
    this.stop.abort();
    const grace = this.options.config.shutdownGraceMs;
    this.graceTimer = setTimeout(() => {
      this.logger.warn(`Grace period of ${grace}ms elapsed, aborting in-flight work`);
      this.hardAbort.abort();
    }, grace);
    this.graceTimer.unref();
  }

  private clearGraceTimer(): void {
    if (this.graceTimer) {
      clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }
  }

  private throwIfCancelled(): void {
    if (this.fatal) throw this.fatal;
    if (this.stop.signal.aborted) {
      throw new RunCancelled(this.cancelReason ?? 'Run stopped');
    }
  }

  private finishWithError(err: unknown): void {
    const fatal = this.fatal ?? (err instanceof RunCancelled ? null : err);
    if (fatal === null) {
      this.enter('cancelled');
      this.logger.warn(`Run ${this.runId} cancelled: ${this.cancelReason ?? 'stopped'}`);
      return;
    }
    if (!(fatal instanceof FatalError)) {
      // Programming errors still end the run in a recorded state.
      this.fatal = new FatalError(describeError(fatal), { cause: fatal });
    } else {
      this.fatal = fatal;
    }
    this.enter('failed');
    this.logger.error(`Run ${this.runId} failed: ${this.fatal.message}`);
  }

  private usage(): RunUsage {
    const parse = this.monitor.getStats(ANNOTATION_PARSE_FEATURE);
    return {
      parse: {
        direct: parse.primaryCount,
        fallback: parse.fallbackCount,
        fallbackRate: parse.fallbackRate,
      },
      costUSD: this.options.ledger ? this.options.ledger.getReport().totalCostUSD : null,
      annotationCalls: this.annotationCalls,
    };
  }

  private summary(startedAt: Date): RunSummary {
    const stage = this.currentStage ?? 'failed';
    let error: string | null = null;
    if (stage === 'failed') error = this.fatal?.message ?? 'unknown error';
    if (stage === 'cancelled') error = this.cancelReason ?? 'Run stopped';

    return {
      runId: this.runId,
      stage,
      counts: { ...this.counts },
      duplicates: [...this.duplicates],
      alreadyProcessed: [...this.alreadyProcessed],
      failures: [...this.failures],
      stages: [...this.stages],
      startedAt,
      finishedAt: this.now(),
      usage: this.usage(),
      error,
    };
  }
}
