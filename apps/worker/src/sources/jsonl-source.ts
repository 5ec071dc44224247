/**
 * FILE PURPOSE: Acquisition source over a JSON Lines file
 *
 * Each non-blank line is one object:
 *   { "url" | "identityKey": string, "text" | "payload": string, "id"?: string, "locator"?: string }
 * The file is re-read on every records() call, so the source is restartable.
 */

import { readFile } from 'node:fs/promises';
import type { RawRecord } from '@curate/shared-types';
import { FatalError } from '@curate/pipeline-core';
import type { AcquisitionSource } from '@curate/pipeline-core';

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

export function parseJsonlLine(line: string, origin: string): RawRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    throw new FatalError(`${origin}: line is not valid JSON`, { cause: err });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new FatalError(`${origin}: expected a JSON object`);
  }

  const fields = new Map<string, unknown>(Object.entries(parsed));
  const url = optionalString(fields.get('url'));
  const identityKey = optionalString(fields.get('identityKey')) ?? url;
  const payload = fields.get('payload') ?? fields.get('text');
  if (identityKey === undefined) {
    throw new FatalError(`${origin}: missing "url" or "identityKey"`);
  }
  if (typeof payload !== 'string') {
    throw new FatalError(`${origin}: missing "text" or "payload" string`);
  }

  const id = optionalString(fields.get('id'));
  return {
    ...(id !== undefined ? { id } : {}),
    identityKey,
    rawPayload: payload,
    sourceLocator: optionalString(fields.get('locator')) ?? url ?? origin,
  };
}

export class JsonlFileSource implements AcquisitionSource {
  constructor(private readonly path: string) {}

  describe(): string {
    return this.path;
  }

  async *records(): AsyncIterable<RawRecord> {
    const text = await readFile(this.path, 'utf8');
    const lines = text.split(/\r?\n/);
    for (const [index, line] of lines.entries()) {
      if (line.trim() === '') continue;
      yield parseJsonlLine(line, `${this.path}:${index + 1}`);
    }
  }
}
