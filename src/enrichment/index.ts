// src/enrichment/index.ts
// Metadata the pipeline injects into an analyzed record: ownership, file
// details, duration, a society name from the file name, feature coverage.

import { FIELD, NA, type CanonicalRecord } from '../ai/normalizer/schema.js';
import type { SourceObject } from '../storage/types.js';
import { computeFeatureCoverage, type FeatureCatalog } from './featureCoverage.js';
import type { TeamDirectory } from './teamDirectory.js';

export { TeamDirectory } from './teamDirectory.js';
export type { OwnerProfile, TeamMember } from './teamDirectory.js';
export { computeFeatureCoverage, loadDefaultFeatureCatalog, parseFeatureCatalog } from './featureCoverage.js';
export type { FeatureCatalog, FeatureCoverage } from './featureCoverage.js';

export interface EnrichmentContext {
  object: SourceObject;
  ownerName: string;
  transcript: string;
  durationMinutes: number;
  directory: TeamDirectory;
  catalog: FeatureCatalog;
}

const UNKNOWN_SOCIETY = 'Unknown Society';

/** "Green_Acres-CHS.mp3" → "Green Acres CHS" */
export function societyNameFromFileName(fileName: string): string {
  const stem = fileName.replace(/\.[^./\\]+$/, '');
  const name = stem.replace(/[_\-|.]+/g, ' ').replace(/\s+/g, ' ').trim();
  return name || UNKNOWN_SOCIETY;
}

/** Date part of an ISO timestamp, or null. */
function isoDay(timestamp: string): string | null {
  const m = /^(\d{4}-\d{2}-\d{2})/.exec(timestamp);
  return m ? m[1] : null;
}

export function enrichRecord(record: CanonicalRecord, ctx: EnrichmentContext): CanonicalRecord {
  const out: Record<string, string> = { ...record };
  const set = (field: string, value: string | null | undefined) => {
    if (value && value.trim()) out[field] = value.trim();
  };

  set(FIELD.owner, ctx.ownerName);
  const profile = ctx.directory.lookup(ctx.ownerName);
  if (profile) {
    set(FIELD.emailId, profile.email);
    set(FIELD.manager, profile.manager);
    set(FIELD.team, profile.team);
    set(FIELD.managerEmail, profile.managerEmail);
  }

  set(FIELD.fileName, ctx.object.name);
  set(FIELD.fileId, ctx.object.id);
  set(FIELD.mediaLink, ctx.object.webViewLink);
  if (ctx.durationMinutes > 0) set(FIELD.duration, String(ctx.durationMinutes));
  set(FIELD.societyName, societyNameFromFileName(ctx.object.name));

  if (out[FIELD.date] === NA) {
    set(FIELD.date, isoDay(ctx.object.createdTime));
  }

  const coverage = computeFeatureCoverage(ctx.transcript, ctx.catalog);
  set(FIELD.featureCoverage, coverage.summary);
  if (coverage.missed) {
    set(FIELD.missedOpportunities, coverage.missed);
  }

  return out;
}
