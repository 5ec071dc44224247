/**
 * FILE PURPOSE: Total validation of annotation output against an AnnotationSchema
 *
 * HOW: parseAnnotation() = extractJson() + validateAnnotation(). The result
 *      is a tagged union: a fully-typed value, or a ParseError /
 *      ValidationError carrying every issue found and a preview of the raw
 *      text. Unknown fields are dropped from the value, never reported.
 *      Pure: no I/O, inputs are not mutated.
 */

import type {
  AnnotationField,
  AnnotationFieldValue,
  AnnotationSchema,
  AnnotationValue,
} from '@curate/shared-types';
import { ParseError, ValidationError } from '../errors.js';
import type { ValidationIssue } from '../errors.js';
import { extractJson } from './json-extractor.js';
import type { ExtractionStrategy } from './json-extractor.js';

export type ParseOutcome =
  | { ok: true; value: AnnotationValue; strategy: ExtractionStrategy; repaired: boolean }
  | { ok: false; error: ParseError | ValidationError };

export type ValidationOutcome =
  | { ok: true; value: AnnotationValue }
  | { ok: false; issues: ValidationIssue[] };

export function parseAnnotation(text: string, schema: AnnotationSchema): ParseOutcome {
  const extracted = extractJson(text);
  if (!extracted.ok) {
    return { ok: false, error: new ParseError(extracted.reason, text) };
  }

  const validated = validateAnnotation(extracted.data, schema);
  if (!validated.ok) {
    const first = validated.issues[0];
    const summary = first ? `${formatPath(first.path)}${first.message}` : 'invalid value';
    const more = validated.issues.length > 1 ? ` (+${validated.issues.length - 1} more)` : '';
    return {
      ok: false,
      error: new ValidationError(
        `Output does not match schema "${schema.name}": ${summary}${more}`,
        text,
        validated.issues,
      ),
    };
  }

  return {
    ok: true,
    value: validated.value,
    strategy: extracted.strategy,
    repaired: extracted.repaired,
  };
}

export function validateAnnotation(value: unknown, schema: AnnotationSchema): ValidationOutcome {
  const issues: ValidationIssue[] = [];
  const result = validateObject(value, schema, '', issues);
  if (issues.length > 0 || result === null) {
    return { ok: false, issues };
  }
  return { ok: true, value: result };
}

function formatPath(path: string): string {
  return path ? `${path}: ` : '';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function joinPath(parent: string, key: string): string {
  return parent ? `${parent}.${key}` : key;
}

function validateObject(
  value: unknown,
  schema: AnnotationSchema,
  path: string,
  issues: ValidationIssue[],
): AnnotationValue | null {
  if (!isPlainObject(value)) {
    issues.push({ path, message: `expected object, got ${describeType(value)}` });
    return null;
  }

  const out: AnnotationValue = {};
  for (const field of schema.fields) {
    const fieldPath = joinPath(path, field.name);
    const raw = Object.prototype.hasOwnProperty.call(value, field.name) ? value[field.name] : undefined;

    if (raw === undefined || raw === null) {
      if (field.required !== false) {
        issues.push({ path: fieldPath, message: 'required field is missing' });
      }
      continue;
    }

    const checked = validateField(raw, field, fieldPath, issues);
    if (checked !== null) {
      // defineProperty so a field named `__proto__` lands as an own key, not the prototype.
      Object.defineProperty(out, field.name, { value: checked, enumerable: true, writable: true, configurable: true });
    }
  }
  return out;
}

function validateField(
  raw: unknown,
  field: AnnotationField,
  path: string,
  issues: ValidationIssue[],
): AnnotationFieldValue | null {
  switch (field.type) {
    case 'string':
      if (typeof raw === 'string') return raw;
      issues.push({ path, message: `expected string, got ${describeType(raw)}` });
      return null;

    case 'boolean':
      if (typeof raw === 'boolean') return raw;
      issues.push({ path, message: `expected boolean, got ${describeType(raw)}` });
      return null;

    case 'enum':
      if (typeof raw === 'string' && field.values.includes(raw)) return raw;
      issues.push({
        path,
        message: `expected one of [${field.values.join(', ')}], got ${typeof raw === 'string' ? JSON.stringify(raw) : describeType(raw)}`,
      });
      return null;

    case 'list': {
      if (!Array.isArray(raw)) {
        issues.push({ path, message: `expected list, got ${describeType(raw)}` });
        return null;
      }
      const items: AnnotationValue[] = [];
      raw.forEach((item: unknown, index) => {
        const checked = validateObject(item, field.items, `${path}[${index}]`, issues);
        if (checked !== null) items.push(checked);
      });
      return items;
    }
  }
}
