/**
 * FILE PURPOSE: Annotation pipeline process entry
 *
 * USAGE: npm run start -w @curate/worker -- --input records.jsonl [--schema schema.json] [--dry-run]
 *
 * HOW: One run per process. SIGINT / SIGTERM call cancel(): no new work is
 *      submitted and in-flight calls get PIPELINE_SHUTDOWN_GRACE_MS to finish.
 *      A second signal exits immediately. The summary goes to stdout; logs
 *      to stderr. Exit code: 0 completed, 1 failed, 130 cancelled.
 */

import { parseArgs } from 'node:util';
import * as Sentry from '@sentry/node';
import { describeError } from '@curate/pipeline-core';
import { createPipeline, exitCodeFor, formatSummary } from './pipeline.js';

// Sentry: no-op when DSN not set
const sentryDsn = process.env.SENTRY_DSN;
if (sentryDsn) {
  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.NODE_ENV ?? 'production',
    sendDefaultPii: false,
  });
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      input: { type: 'string', short: 'i' },
      schema: { type: 'string', short: 's' },
      'dry-run': { type: 'boolean', default: false },
    },
  });

  const inputPath = values.input ?? process.env.PIPELINE_INPUT;
  if (!inputPath) {
    process.stderr.write('FATAL: --input <file.jsonl> (or PIPELINE_INPUT) is required\n');
    return 1;
  }

  const { coordinator, close } = await createPipeline({
    inputPath,
    schemaPath: values.schema,
    dryRun: values['dry-run'],
  });

  let signalled = false;
  const onSignal = (signal: NodeJS.Signals): void => {
    if (signalled) {
      process.stderr.write(`WARN: ${signal} received again, exiting now\n`);
      process.exit(exitCodeFor('cancelled'));
    }
    signalled = true;
    coordinator.cancel(`${signal} received`);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const summary = await coordinator.run();
    process.stdout.write(formatSummary(summary));
    if (summary.stage === 'failed' && sentryDsn) {
      Sentry.captureMessage(`Run ${summary.runId} failed: ${summary.error ?? 'unknown error'}`, 'error');
    }
    return exitCodeFor(summary.stage);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await close();
  }
}

main()
  .then(async (code) => {
    if (sentryDsn) await Sentry.flush(2000);
    process.exitCode = code;
  })
  .catch(async (err: unknown) => {
    process.stderr.write(`ERROR: ${describeError(err)}\n`);
    if (sentryDsn) {
      Sentry.captureException(err);
      await Sentry.flush(2000);
    }
    process.exitCode = 1;
  });
