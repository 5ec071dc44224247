import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { AnnotationSchema } from '@curate/shared-types';
import { ConfigError, parseSchemaDefinition } from '@curate/pipeline-core';

export const DEFAULT_SCHEMA_PATH = fileURLToPath(new URL('../schemas/publication.json', import.meta.url));

/** Read and validate an AnnotationSchema JSON file. Throws ConfigError. */
export async function loadAnnotationSchema(path: string = DEFAULT_SCHEMA_PATH): Promise<AnnotationSchema> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read schema file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Schema file ${path} is not valid JSON`);
  }
  return parseSchemaDefinition(parsed, path);
}
