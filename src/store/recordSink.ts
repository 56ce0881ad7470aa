// src/store/recordSink.ts
// Destination for finished meeting records.

import type { CanonicalRecord } from "../ai/normalizer/schema.js";

export interface RecordMeta {
  objectId: string;
  fileName: string;
}

export interface RecordSink {
  readonly kind: "db" | "sheets";
  /** Append one record. Throws on failure; the caller classifies it. */
  append(record: CanonicalRecord, meta: RecordMeta): Promise<void>;
}
