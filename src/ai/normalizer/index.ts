// src/ai/normalizer/index.ts
// Raw provider text → canonical record with derived fields.

import { extractRecord, type ExtractionFailureReason } from './extract.js';
import { coerce } from './coerce.js';
import { applyDerivedFields, type DeriveContext } from './derive.js';
import type { CanonicalRecord } from './schema.js';

export type NormalizeResult =
  | { kind: 'record'; record: CanonicalRecord }
  | { kind: 'none'; reason: ExtractionFailureReason; detail?: string };

export function normalizeResponse(rawText: string, ctx: DeriveContext = {}): NormalizeResult {
  const extracted = extractRecord(rawText);
  if (extracted.kind === 'none') {
    return extracted;
  }
  return { kind: 'record', record: applyDerivedFields(coerce(extracted.mapping), ctx) };
}

export * from './schema.js';
export { extractRecord, stripCodeFences, findBalancedObject, removeTrailingCommas } from './extract.js';
export type { ExtractionResult, ExtractionFailureReason } from './extract.js';
export { coerce, stringifyValue } from './coerce.js';
export { applyDerivedFields, computeScoreTotals, deriveDateFromFileName, parseScore } from './derive.js';
export type { DeriveContext } from './derive.js';
