/**
 * FILE PURPOSE: Build a PipelineCoordinator from environment and arguments
 *
 * HOW: Config from env, schema from a JSON file, records from a JSONL file,
 *      annotations through the LiteLLM proxy, entries into Postgres (or an
 *      in-memory sink with --dry-run). The database module is only loaded when
 *      it is used, so dry runs need no DATABASE_URL.
 */

import type { RunStage, RunSummary } from '@curate/shared-types';
import {
  CostLedger,
  InMemoryEntrySink,
  PipelineCoordinator,
  createLLMClient,
  createStderrLogger,
  loadPipelineConfig,
} from '@curate/pipeline-core';
import type { AcquisitionSource, AnnotationCapability, EntrySink, PipelineLogger } from '@curate/pipeline-core';
import { createLlmAnnotator } from './annotator.js';
import { loadAnnotationSchema } from './schema-loader.js';
import { JsonlFileSource } from './sources/jsonl-source.js';

type Env = Record<string, string | undefined>;

export const DEFAULT_MODEL = 'claude-haiku';

export interface PipelineSetupOptions {
  inputPath: string;
  schemaPath?: string;
  dryRun?: boolean;
  env?: Env;
  logger?: PipelineLogger;
  /** Overrides for tests; default to the JSONL file, the LLM annotator and Postgres. */
  source?: AcquisitionSource;
  annotate?: AnnotationCapability;
  sink?: EntrySink;
}

export interface PipelineSetup {
  coordinator: PipelineCoordinator;
  ledger: CostLedger;
  /** Release resources (database pool). Safe to call more than once. */
  close: () => Promise<void>;
}

export async function createPipeline(options: PipelineSetupOptions): Promise<PipelineSetup> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createStderrLogger();
  const config = loadPipelineConfig(env);
  const schema = await loadAnnotationSchema(options.schemaPath);

  const maxCost = Number.parseFloat(env.MAX_COST ?? '10.00');
  const ledger = new CostLedger(Number.isFinite(maxCost) ? maxCost : 10);
  const model = env.ANNOTATION_MODEL?.trim() || DEFAULT_MODEL;
  const annotate = options.annotate ?? createLlmAnnotator({
    client: createLLMClient({ baseURL: env.LITELLM_PROXY_URL, apiKey: env.LITELLM_API_KEY }),
    model,
    ledger,
  });

  let sink = options.sink;
  let close = async (): Promise<void> => undefined;
  if (!sink) {
    if (options.dryRun) {
      sink = new InMemoryEntrySink();
    } else {
      const [{ DrizzleEntrySink }, { closeDatabase }] = await Promise.all([
        import('./sink/drizzle-sink.js'),
        import('./db/connection.js'),
      ]);
      sink = new DrizzleEntrySink();
      close = closeDatabase;
    }
  }

  const coordinator = new PipelineCoordinator({
    source: options.source ?? new JsonlFileSource(options.inputPath),
    sink,
    annotate,
    schema,
    config,
    logger,
    ledger,
    onStageChange: ({ stage }) => logger.info(`Stage: ${stage}`),
  });

  let closed = false;
  return {
    coordinator,
    ledger,
    close: async () => {
      if (closed) return;
      closed = true;
      await close();
    },
  };
}

/** 0 completed, 1 failed, 130 cancelled (conventional SIGINT status). */
export function exitCodeFor(stage: RunStage): number {
  switch (stage) {
    case 'completed':
      return 0;
    case 'cancelled':
      return 130;
    default:
      return 1;
  }
}

export function formatSummary(summary: RunSummary): string {
  const { counts } = summary;
  const lines = [
    `Run ${summary.runId}: ${summary.stage}${summary.error ? ` (${summary.error})` : ''}`,
    `  annotated=${counts.annotated} failed=${counts.failed} exhausted=${counts.exhausted} ` +
      `abandoned=${counts.abandoned} persisted=${counts.persisted}`,
    `  skipped: duplicate=${counts.skippedDuplicate} already-processed=${counts.skippedAlreadyProcessed}`,
    `  parse fallbacks: ${summary.usage.parse.fallback}/${summary.usage.parse.direct + summary.usage.parse.fallback}` +
      (summary.usage.costUSD !== null ? `, cost $${summary.usage.costUSD.toFixed(4)}` : ''),
  ];
  for (const duplicate of summary.duplicates) {
    lines.push(`  duplicate ${duplicate.sourceLocator} -> ${duplicate.keptId}`);
  }
  for (const failure of summary.failures) {
    lines.push(`  ${failure.status} ${failure.id} (${failure.identityKey}): ${failure.lastError}`);
  }
  return `${lines.join('\n')}\n`;
}
