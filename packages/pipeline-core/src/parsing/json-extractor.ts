/**
 * FILE PURPOSE: Two-stage JSON extraction from annotation responses
 *
 * WHY: Models wrap JSON in markdown, add trailing commas or comments, and
 *      sometimes answer in prose. Treating the fence fallback as an explicit
 *      second strategy (instead of a nested try/catch) lets callers see which
 *      path produced the value and count fallbacks.
 *
 * HOW: Stage `direct` parses the whole trimmed text. Stage `fenced` looks for
 *      the first fenced block: a JSON_OUTPUT_START...JSON_OUTPUT_END envelope
 *      first, then a ``` / ```json markdown fence. Each candidate goes through
 *      progressive repair (JSON.parse → manual fixes → jsonrepair), but only
 *      when it already looks like JSON, so prose is never coerced into a value.
 *
 * DEPENDENCIES: jsonrepair (npm)
 */

import { jsonrepair } from 'jsonrepair';

export type ExtractionStrategy = 'direct' | 'fenced';

export type ExtractionResult =
  | { ok: true; data: unknown; strategy: ExtractionStrategy; repaired: boolean }
  | { ok: false; reason: string };

const ENVELOPE_START = 'JSON_OUTPUT_START';
const ENVELOPE_END = 'JSON_OUTPUT_END';
const MARKDOWN_FENCE = /```[a-zA-Z]*[^\S\n]*\n?([\s\S]*?)```/;

/**
 * Extract a JSON value from raw response text. Never throws.
 *
 * EXAMPLE:
 * ```typescript
 * extractJson('Sure!\n```json\n{"title": "A",}\n```');
 * // { ok: true, data: { title: 'A' }, strategy: 'fenced', repaired: true }
 * ```
 */
export function extractJson(text: string): ExtractionResult {
  const direct = parseCandidate(text.trim());
  if (direct) return { ok: true, ...direct, strategy: 'direct' };

  const block = findFencedBlock(text);
  if (block === null) {
    return { ok: false, reason: 'Response is not JSON and contains no fenced block' };
  }

  const fenced = parseCandidate(block);
  if (fenced) return { ok: true, ...fenced, strategy: 'fenced' };

  return { ok: false, reason: 'Fenced block does not contain parsable JSON' };
}

/** Contents of the first recognized fenced block, or null. */
export function findFencedBlock(text: string): string | null {
  const startIdx = text.indexOf(ENVELOPE_START);
  if (startIdx !== -1) {
    const endIdx = text.indexOf(ENVELOPE_END, startIdx + ENVELOPE_START.length);
    if (endIdx !== -1) {
      return text.slice(startIdx + ENVELOPE_START.length, endIdx).trim();
    }
  }

  const match = MARKDOWN_FENCE.exec(text);
  if (match?.[1] !== undefined) {
    return match[1].trim();
  }
  return null;
}

function looksLikeJson(candidate: string): boolean {
  return candidate.startsWith('{') || candidate.startsWith('[');
}

function parseCandidate(candidate: string): { data: unknown; repaired: boolean } | null {
  if (!looksLikeJson(candidate)) return null;

  try {
    return { data: JSON.parse(candidate), repaired: false };
  } catch {
    // fall through to repair
  }

  let repaired = candidate;
  repaired = repaired.replace(/,(\s*[}\]])/g, '$1');     // Trailing commas
  repaired = repaired.replace(/^\s*\/\/[^\n]*$/gm, '');   // Whole-line comments
  repaired = repaired.replace(/\/\*[\s\S]*?\*\//g, '');   // Block comments

  try {
    return { data: JSON.parse(repaired), repaired: true };
  } catch {
    // fall through to jsonrepair
  }

  try {
    return { data: JSON.parse(jsonrepair(repaired)), repaired: true };
  } catch {
    return null;
  }
}
