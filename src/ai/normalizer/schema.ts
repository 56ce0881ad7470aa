// src/ai/normalizer/schema.ts
// Canonical meeting-record schema: ordered field list, score fields and key
// aliases, loaded from data/canonical-schema.json.

import fs from 'node:fs';

const SCHEMA_URL = new URL('../../../data/canonical-schema.json', import.meta.url);

/** Sentinel for an absent or empty value. */
export const NA = 'N/A';

/** One value per canonical field, keys in canonical order. */
export type CanonicalRecord = Readonly<Record<string, string>>;

/* ---------- Loading ---------- */

interface CanonicalSchema {
  fields: string[];
  scoreFields: string[];
  aliases: Record<string, string>;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function readSchema(): CanonicalSchema {
  const parsed: unknown = JSON.parse(fs.readFileSync(SCHEMA_URL, 'utf8'));
  if (!parsed || typeof parsed !== 'object') {
    throw new Error('canonical-schema.json must contain an object');
  }
  const fields: unknown = Reflect.get(parsed, 'fields');
  const scoreFields: unknown = Reflect.get(parsed, 'scoreFields');
  const aliasesRaw: unknown = Reflect.get(parsed, 'aliases');
  if (!isStringArray(fields) || !isStringArray(scoreFields)) {
    throw new Error('canonical-schema.json: fields and scoreFields must be string arrays');
  }
  const aliases: Record<string, string> = {};
  if (aliasesRaw && typeof aliasesRaw === 'object') {
    for (const [alias, target] of Object.entries(aliasesRaw)) {
      if (typeof target === 'string' && fields.includes(target)) {
        aliases[alias] = target;
      }
    }
  }
  for (const f of scoreFields) {
    if (!fields.includes(f)) throw new Error(`canonical-schema.json: unknown score field "${f}"`);
  }
  return { fields, scoreFields, aliases };
}

const schema = readSchema();

export const CANONICAL_FIELDS: readonly string[] = Object.freeze([...schema.fields]);
export const SCORE_FIELDS: readonly string[] = Object.freeze([...schema.scoreFields]);

/* ---------- Fields the pipeline writes by name ---------- */

export const FIELD = {
  date: 'Date',
  societyName: 'Society Name',
  totalScore: 'Total Score',
  percentScore: '% Score',
  owner: 'Owner (Who handled the meeting)',
  emailId: 'Email Id',
  manager: 'Manager',
  team: 'Team',
  managerEmail: 'Manager Email',
  mediaLink: 'Media Link',
  duration: 'Meeting duration (min)',
  missedOpportunities: 'Missed Opportunities',
  featureCoverage: 'Feature Checklist Coverage',
  fileName: 'File Name',
  fileId: 'File ID',
} as const;

export type NamedField = (typeof FIELD)[keyof typeof FIELD];

for (const name of Object.values(FIELD)) {
  if (!CANONICAL_FIELDS.includes(name)) {
    throw new Error(`canonical-schema.json is missing required field "${name}"`);
  }
}

/* ---------- Key normalization ---------- */

/** Lower-case and drop spaces/underscores: "Owner_Name" → "ownername". */
export function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[\s_]+/g, '');
}

/** alias (lower-cased) → canonical field */
export const ALIASES: ReadonlyMap<string, string> = new Map(
  Object.entries(schema.aliases).map(([alias, field]) => [alias.toLowerCase(), field])
);

/** normalized alias → canonical field */
const NORMALIZED_ALIASES: ReadonlyMap<string, string> = new Map(
  Object.entries(schema.aliases).map(([alias, field]) => [normalizeKey(alias), field])
);

/** normalized canonical name → canonical field */
const NORMALIZED_FIELDS: ReadonlyMap<string, string> = new Map(
  CANONICAL_FIELDS.map((f) => [normalizeKey(f), f])
);

/**
 * Canonical field for an input key, or undefined when nothing matches.
 * Order: exact name, alias (case-insensitive), normalized alias, normalized name.
 */
export function resolveFieldName(key: string): string | undefined {
  if (CANONICAL_FIELDS.includes(key)) return key;
  const lowered = key.trim().toLowerCase();
  const alias = ALIASES.get(lowered);
  if (alias) return alias;
  const normalized = normalizeKey(key.trim());
  return NORMALIZED_ALIASES.get(normalized) ?? NORMALIZED_FIELDS.get(normalized);
}

/** A record with every canonical field set to N/A. */
export function emptyRecord(): Record<string, string> {
  const record: Record<string, string> = {};
  for (const f of CANONICAL_FIELDS) record[f] = NA;
  return record;
}

/** Values in canonical order (one spreadsheet row). */
export function recordToRow(record: CanonicalRecord): string[] {
  return CANONICAL_FIELDS.map((f) => record[f] ?? NA);
}
