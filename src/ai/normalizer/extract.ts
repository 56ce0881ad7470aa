// src/ai/normalizer/extract.ts
// Pull one JSON object out of free-form provider text.
//
// Tolerates: code fences, prose before/after the object, trailing commas,
// single-quoted keys/strings (one retry with ' → ").

import { createLogger } from '../../observability/logger.js';

const log = createLogger('ai/normalizer');

/* ---------- Types ---------- */

export type ExtractionFailureReason =
  | 'empty_response'
  | 'no_json_object'
  | 'invalid_json'
  | 'not_an_object';

export type ExtractionResult =
  | { kind: 'mapping'; mapping: Record<string, unknown> }
  | { kind: 'none'; reason: ExtractionFailureReason; detail?: string };

/* ---------- Helpers ---------- */

/** Drop a leading ``` fence (with optional language tag) and the closing fence. */
export function stripCodeFences(s: string): string {
  let out = s.trim();
  if (out.startsWith('```')) {
    const firstNl = out.indexOf('\n');
    out = firstNl !== -1 ? out.slice(firstNl + 1) : out.replace(/^```[\w-]*/, '');
    const lastFence = out.lastIndexOf('```');
    if (lastFence !== -1) out = out.slice(0, lastFence);
    out = out.trim();
  }
  return out;
}

/**
 * Text of the first balanced {...} object, or null. Braces inside
 * double-quoted strings are ignored.
 */
export function findBalancedObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/** `{"a":1,}` → `{"a":1}`, `[1,2, ]` → `[1,2]` */
export function removeTrailingCommas(json: string): string {
  return json.replace(/,\s*([}\]])/g, '$1');
}

function isPlainObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/* ---------- Extraction ---------- */

export function extractRecord(raw: string | null | undefined): ExtractionResult {
  const text = stripCodeFences(raw ?? '');
  if (!text) {
    return { kind: 'none', reason: 'empty_response' };
  }

  const candidate = findBalancedObject(text);
  if (!candidate) {
    log.warn({ preview: text.slice(0, 200) }, 'No JSON object found in provider response');
    return { kind: 'none', reason: 'no_json_object' };
  }

  const cleaned = removeTrailingCommas(candidate);
  let parsed = tryParse(cleaned);
  if (!parsed.ok) {
    parsed = tryParse(cleaned.replace(/'/g, '"'));
  }
  if (!parsed.ok) {
    log.warn({ error: parsed.error, preview: cleaned.slice(0, 200) }, 'Provider response is not valid JSON');
    return { kind: 'none', reason: 'invalid_json', detail: parsed.error };
  }

  if (!isPlainObject(parsed.value)) {
    return { kind: 'none', reason: 'not_an_object' };
  }
  return { kind: 'mapping', mapping: Object.fromEntries(Object.entries(parsed.value)) };
}
