// src/enrichment/featureCoverage.ts
// Keyword-based product-feature coverage of a transcript
// (catalog in data/feature-catalog.json).

import fs from 'node:fs';

const CATALOG_URL = new URL('../../data/feature-catalog.json', import.meta.url);

/* ---------- Types ---------- */

export interface FeatureCatalogSection {
  label: string;
  /** feature name → keywords; any keyword hit covers the feature */
  features: Record<string, string[]>;
}

export interface FeatureCatalog {
  sections: FeatureCatalogSection[];
  /** Features listed first among missed opportunities, in this order. */
  priority: string[];
}

export interface FeatureCoverage {
  /** "ERP Coverage: 2/19 (11%). Covered: Budgeting, Inventory. ASP Coverage: ..." */
  summary: string;
  /** "- feature" lines, priority features first; empty when nothing was missed. */
  missed: string;
}

/* ---------- Catalog loading ---------- */

function toStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export function parseFeatureCatalog(raw: unknown): FeatureCatalog {
  if (!raw || typeof raw !== 'object') {
    throw new Error('Feature catalog must be an object');
  }
  const catalogs: unknown = Reflect.get(raw, 'catalogs');
  const sections: FeatureCatalogSection[] = [];
  for (const entry of Array.isArray(catalogs) ? catalogs : []) {
    if (!entry || typeof entry !== 'object') continue;
    const label: unknown = Reflect.get(entry, 'label');
    const featuresRaw: unknown = Reflect.get(entry, 'features');
    if (typeof label !== 'string' || !featuresRaw || typeof featuresRaw !== 'object') continue;
    const features: Record<string, string[]> = {};
    for (const [name, keywords] of Object.entries(featuresRaw)) {
      features[name] = toStringArray(keywords);
    }
    sections.push({ label, features });
  }
  return { sections, priority: toStringArray(Reflect.get(raw, 'priority')) };
}

let cachedCatalog: FeatureCatalog | null = null;

export function loadDefaultFeatureCatalog(): FeatureCatalog {
  if (!cachedCatalog) {
    cachedCatalog = parseFeatureCatalog(JSON.parse(fs.readFileSync(CATALOG_URL, 'utf8')));
  }
  return cachedCatalog;
}

/* ---------- Matching ---------- */

/** Punctuation dropped, lower-cased, whitespace collapsed. */
export function normalizeText(s: string): string {
  return s
    .replace(/[^\p{L}\p{N}_\s]/gu, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

function sectionSummary(label: string, covered: string[], total: number): string {
  const pct = total === 0 ? 0 : Math.round((100 * covered.length) / total);
  let head = `${label} Coverage: ${covered.length}/${total} (${pct}%).`;
  if (covered.length > 0) {
    head += ` Covered: ${[...covered].sort().join(', ')}.`;
  }
  return head;
}

export function computeFeatureCoverage(transcript: string, catalog: FeatureCatalog): FeatureCoverage {
  const text = normalizeText(transcript);
  const summaries: string[] = [];
  const missed = new Set<string>();

  for (const section of catalog.sections) {
    const covered: string[] = [];
    const names = Object.keys(section.features);
    for (const name of names) {
      const hit =
        text.length > 0 &&
        section.features[name].some((k) => {
          const key = normalizeText(k);
          return key.length > 0 && text.includes(key);
        });
      if (hit) covered.push(name);
      else missed.add(name);
    }
    summaries.push(sectionSummary(section.label, covered, names.length));
  }

  const rank = (name: string) => {
    const idx = catalog.priority.indexOf(name);
    return idx === -1 ? Number.MAX_SAFE_INTEGER : idx;
  };
  const missedSorted = [...missed].sort((a, b) => rank(a) - rank(b) || (a < b ? -1 : a > b ? 1 : 0));

  return {
    summary: summaries.join(' ').trim(),
    missed: missedSorted.length > 0 ? `- ${missedSorted.join('\n- ')}` : '',
  };
}
