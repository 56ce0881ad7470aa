// src/ai/normalizer/derive.ts
// Derived fields: meeting date from the file name, score totals.
// Date is derived first, then scores.

import { FIELD, NA, SCORE_FIELDS, type CanonicalRecord } from './schema.js';

/* ---------- Date ---------- */

// 2025-08-31, 2025_8_31, 2025.08.31
const YMD_PATTERN = /(?<!\d)(\d{4})[-_/.](\d{1,2})[-_/.](\d{1,2})(?!\d)/g;
// 31-08-25, 31_8_2025
const DMY_PATTERN = /(?<!\d)(\d{1,2})[-_/.](\d{1,2})[-_/.](\d{4}|\d{2})(?!\d)/g;

function toIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return d.toISOString().slice(0, 10);
}

/**
 * First real calendar date embedded in a file name, as YYYY-MM-DD.
 * Year-first forms are tried before day-first ones; two-digit years are 20xx.
 */
export function deriveDateFromFileName(fileName: string): string | null {
  for (const m of fileName.matchAll(YMD_PATTERN)) {
    const iso = toIsoDate(Number(m[1]), Number(m[2]), Number(m[3]));
    if (iso) return iso;
  }
  for (const m of fileName.matchAll(DMY_PATTERN)) {
    const yearText = m[3];
    const year = yearText.length === 2 ? 2000 + Number(yearText) : Number(yearText);
    const iso = toIsoDate(year, Number(m[2]), Number(m[1]));
    if (iso) return iso;
  }
  return null;
}

/* ---------- Scores ---------- */

export const MAX_SUB_SCORE = 10;
export const MAX_TOTAL_SCORE = MAX_SUB_SCORE * 5;

/**
 * First number in the value, rounded and clamped to [0, 10]:
 * "8.4" → 8, "7/10" → 7, "8 out of 10" → 8. Null when there is none.
 */
export function parseScore(value: string): number | null {
  if (!value || value === NA) return null;
  const match = /-?\d+(?:\.\d+)?/.exec(value);
  if (!match) return null;
  const n = Number.parseFloat(match[0]);
  return Math.min(MAX_SUB_SCORE, Math.max(0, Math.round(n)));
}

export function computeScoreTotals(
  record: CanonicalRecord
): { total: number; percent: string } | null {
  let total = 0;
  for (const field of SCORE_FIELDS) {
    const score = parseScore(record[field] ?? NA);
    if (score === null) return null;
    total += score;
  }
  return { total, percent: `${((total / MAX_TOTAL_SCORE) * 100).toFixed(1)}%` };
}

/* ---------- Apply ---------- */

export interface DeriveContext {
  fileName?: string;
}

export function applyDerivedFields(record: CanonicalRecord, ctx: DeriveContext = {}): CanonicalRecord {
  const out: Record<string, string> = { ...record };

  if (out[FIELD.date] === NA && ctx.fileName) {
    const date = deriveDateFromFileName(ctx.fileName);
    if (date) out[FIELD.date] = date;
  }

  const totals = computeScoreTotals(out);
  if (totals) {
    out[FIELD.totalScore] = String(totals.total);
    out[FIELD.percentScore] = totals.percent;
  }

  return out;
}
