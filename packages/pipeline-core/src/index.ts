/**
 * FILE PURPOSE: Public surface of the annotation pipeline core
 *
 * Import: `import { PipelineCoordinator, loadPipelineConfig } from '@curate/pipeline-core'`
 */

export { PipelineCoordinator, arraySource, drainSource, isFinalStage } from './pipeline/index.js';
export type { AcquisitionSource, CoordinatorOptions } from './pipeline/index.js';

export {
  AnnotationScheduler,
  AnnotationJob,
  DEFAULT_RETRY_POLICY,
  computeBackoffDelay,
  createRetryPolicy,
  defaultPromptContext,
  runPool,
  runWithRetry,
  sleep,
} from './scheduler/index.js';
export type {
  AnnotationCapability,
  AnnotationRequest,
  JobOutcome,
  RetryOptions,
  RetryOutcome,
  RetryPolicy,
  SchedulerReport,
  Sleep,
} from './scheduler/index.js';

export {
  extractJson,
  findFencedBlock,
  parseAnnotation,
  validateAnnotation,
  parseSchemaDefinition,
  describeSchema,
} from './parsing/index.js';
export type { ExtractionResult, ParseOutcome, ValidationOutcome } from './parsing/index.js';

export { canonicalizeIdentityKey, IdSequence, deduplicate } from './dedup/index.js';
export type { DedupResult, DuplicateRecord } from './dedup/index.js';

export {
  InMemoryEntrySink,
  entryFingerprint,
  stableStringify,
  toPersistedEntry,
  isTerminalStatus,
} from './persistence/index.js';
export type { EntrySink, FailureInjector } from './persistence/index.js';

export {
  TransportError,
  ParseError,
  ValidationError,
  ExhaustedError,
  PersistenceError,
  FatalError,
  CostLimitExceededError,
  ConfigError,
  IllegalTransitionError,
  describeError,
  toError,
  isAbortError,
} from './errors.js';
export type { ValidationIssue } from './errors.js';

export { loadPipelineConfig } from './config.js';
export type { PipelineConfig } from './config.js';

export { createStderrLogger, silentLogger } from './logger.js';
export type { PipelineLogger } from './logger.js';

export { createLLMClient } from './llm-client.js';
export type { LLMClientOptions, OpenAI } from './llm-client.js';

export { CostLedger } from './cost-ledger.js';
export type { CostReport, TokenUsage } from './cost-ledger.js';

export { FallbackMonitor, ANNOTATION_PARSE_FEATURE } from './fallback-monitor.js';
export type { AlertLevel, FallbackEvent, FallbackStats } from './fallback-monitor.js';
