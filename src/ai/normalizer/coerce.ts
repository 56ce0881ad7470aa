// src/ai/normalizer/coerce.ts
// Map an arbitrary key/value mapping onto the canonical record.

import { CANONICAL_FIELDS, NA, emptyRecord, resolveFieldName, type CanonicalRecord } from './schema.js';

const PLACEHOLDERS = new Set(['na', 'n/a', 'null', 'none', 'undefined']);

/**
 * Render any JSON-ish value as a record cell. Absent, empty and placeholder
 * values become N/A; arrays become newline-separated lines.
 */
export function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) return NA;

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!trimmed || PLACEHOLDERS.has(trimmed.toLowerCase())) return NA;
    return trimmed;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : NA;
  }

  if (typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }

  if (Array.isArray(value)) {
    const lines = value.map(stringifyValue).filter((line) => line !== NA);
    return lines.length > 0 ? lines.join('\n') : NA;
  }

  if (typeof value === 'object') {
    return Object.keys(value).length > 0 ? JSON.stringify(value) : NA;
  }

  return NA;
}

/**
 * Coerce to exactly the canonical field set, in canonical order.
 * Exact names are applied before aliases and fuzzy matches; the first
 * non-N/A value a field receives is kept. Unknown keys are dropped.
 */
export function coerce(raw: Readonly<Record<string, unknown>>): CanonicalRecord {
  const record = emptyRecord();
  const exact: Array<[string, unknown]> = [];
  const rest: Array<[string, unknown]> = [];

  for (const entry of Object.entries(raw)) {
    (CANONICAL_FIELDS.includes(entry[0]) ? exact : rest).push(entry);
  }

  for (const [key, value] of [...exact, ...rest]) {
    const field = resolveFieldName(key);
    if (!field || record[field] !== NA) continue;
    record[field] = stringifyValue(value);
  }

  return record;
}
