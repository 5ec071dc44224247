/**
 * FILE PURPOSE: Load and describe AnnotationSchema definitions
 *
 * WHY: Schemas ship as JSON files next to the worker. A malformed schema file
 *      must fail at startup, not as a validation error on every record.
 */

import type { AnnotationField, AnnotationSchema } from '@curate/shared-types';
import { ConfigError } from '../errors.js';

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const RESERVED_NAMES = new Set(['__proto__', 'constructor', 'prototype']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validate an untrusted schema definition (e.g. parsed from JSON). Throws ConfigError. */
export function parseSchemaDefinition(input: unknown, path = 'schema'): AnnotationSchema {
  if (!isRecord(input)) throw new ConfigError(`${path}: expected an object`);

  const { name, fields } = input;
  if (typeof name !== 'string' || name.trim() === '') {
    throw new ConfigError(`${path}.name: expected a non-empty string`);
  }
  if (!Array.isArray(fields) || fields.length === 0) {
    throw new ConfigError(`${path}.fields: expected a non-empty array`);
  }

  const seen = new Set<string>();
  const parsed = fields.map((field: unknown, index) => {
    const result = parseField(field, `${path}.fields[${index}]`);
    if (seen.has(result.name)) {
      throw new ConfigError(`${path}.fields[${index}]: duplicate field "${result.name}"`);
    }
    seen.add(result.name);
    return result;
  });

  return { name, fields: parsed };
}

function parseField(input: unknown, path: string): AnnotationField {
  if (!isRecord(input)) throw new ConfigError(`${path}: expected an object`);

  const { name, type, required, description } = input;
  if (typeof name !== 'string' || !FIELD_NAME.test(name)) {
    throw new ConfigError(`${path}.name: expected an identifier`);
  }
  if (RESERVED_NAMES.has(name)) {
    throw new ConfigError(`${path}.name: "${name}" is reserved`);
  }
  if (required !== undefined && typeof required !== 'boolean') {
    throw new ConfigError(`${path}.required: expected a boolean`);
  }
  if (description !== undefined && typeof description !== 'string') {
    throw new ConfigError(`${path}.description: expected a string`);
  }

  const base = {
    name,
    ...(required !== undefined ? { required } : {}),
    ...(description !== undefined ? { description } : {}),
  };

  switch (type) {
    case 'string':
      return { ...base, type };
    case 'boolean':
      return { ...base, type };
    case 'enum': {
      const { values } = input;
      if (!Array.isArray(values) || values.length === 0) {
        throw new ConfigError(`${path}.values: expected a non-empty array of strings`);
      }
      const strings = values.filter((v: unknown): v is string => typeof v === 'string');
      if (strings.length !== values.length) {
        throw new ConfigError(`${path}.values: expected a non-empty array of strings`);
      }
      return { ...base, type, values: strings };
    }
    case 'list':
      return { ...base, type, items: parseSchemaDefinition(input.items, `${path}.items`) };
    default:
      throw new ConfigError(`${path}.type: unsupported field type ${JSON.stringify(type)}`);
  }
}

/**
 * Render a schema as the compact JSON-shape description placed in prompts.
 *
 * EXAMPLE: `{ "title": string, "category": "news" | "research", "tags"?: [ { "name": string } ] }`
 */
export function describeSchema(schema: AnnotationSchema): string {
  const parts = schema.fields.map((field) => {
    const key = field.required === false ? `"${field.name}"?` : `"${field.name}"`;
    return `${key}: ${describeFieldType(field)}`;
  });
  return `{ ${parts.join(', ')} }`;
}

function describeFieldType(field: AnnotationField): string {
  switch (field.type) {
    case 'string':
      return 'string';
    case 'boolean':
      return 'boolean';
    case 'enum':
      return field.values.map((v) => JSON.stringify(v)).join(' | ');
    case 'list':
      return `[ ${describeSchema(field.items)} ]`;
  }
}
