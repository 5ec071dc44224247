/**
 * FILE PURPOSE: Error taxonomy for the annotation pipeline
 *
 * HOW: Per-record errors (transport, parse, validation, exhausted) stay local
 *      to that record's terminal state. PersistenceError is surfaced to the
 *      coordinator, which owns the retry budget. FatalError (and subclasses)
 *      is the only kind that moves a run to `failed`.
 */

const PREVIEW_LENGTH = 200;

/** Truncate raw text for diagnostics, newlines flattened. */
export function previewText(text: string, max = PREVIEW_LENGTH): string {
  const flat = text.replace(/\n/g, ' ');
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

/** Normalize anything thrown into an Error. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  if (typeof value === 'string') return new Error(value);
  try {
    return new Error(JSON.stringify(value) ?? String(value));
  } catch {
    return new Error(String(value));
  }
}

/** One-line rendering used for `lastError` and log lines. */
export function describeError(value: unknown): string {
  const err = toError(value);
  return `${err.name}: ${err.message}`;
}

export class TransportError extends Error {
  readonly retryable: boolean;
  readonly status: number | undefined;

  constructor(message: string, options: { retryable?: boolean; status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.retryable = options.retryable ?? true;
    this.status = options.status;
  }
}

export interface ValidationIssue {
  /** Dotted path into the value, e.g. `authors[1].name`; empty for the root. */
  path: string;
  message: string;
}

export class ValidationError extends Error {
  readonly issues: readonly ValidationIssue[];
  readonly rawPreview: string;

  constructor(message: string, rawText: string, issues: readonly ValidationIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
    this.rawPreview = previewText(rawText);
  }
}

/** The text could not be parsed at all. A ValidationError subtype so callers can treat both alike. */
export class ParseError extends ValidationError {
  constructor(message: string, rawText: string) {
    super(message, rawText);
    this.name = 'ParseError';
  }
}

export class ExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, lastError: Error) {
    super(`Gave up after ${attempts} attempt(s): ${lastError.message}`, { cause: lastError });
    this.name = 'ExhaustedError';
    this.attempts = attempts;
  }
}

export class PersistenceError extends Error {
  readonly retryable: boolean;

  constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'PersistenceError';
    this.retryable = options.retryable ?? true;
  }
}

export class FatalError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FatalError';
  }
}

export class CostLimitExceededError extends FatalError {
  constructor(currentCost: number, limit: number) {
    super(`Cost limit exceeded: $${currentCost.toFixed(4)} (Limit: $${limit.toFixed(2)})`);
    this.name = 'CostLimitExceededError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class IllegalTransitionError extends Error {
  constructor(subject: string, from: string, to: string) {
    super(`Illegal transition for ${subject}: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/** True when an operation failed because its abort signal fired. */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'AbortedError');
}
