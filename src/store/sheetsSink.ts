// src/store/sheetsSink.ts
// Meeting records appended as rows to a Google Sheets tab (googleapis).

import { google, type sheets_v4 } from "googleapis";
import { CANONICAL_FIELDS, recordToRow, type CanonicalRecord } from "../ai/normalizer/schema.js";
import { createLogger } from "../observability/logger.js";
import type { GoogleAuthClient } from "../storage/googleAuth.js";
import type { RecordMeta, RecordSink } from "./recordSink.js";

const log = createLogger("store/sheetsSink");

/** Range notation for a whole tab: quotes doubled, name wrapped in quotes. */
function tabRange(tab: string, cells: string): string {
  return `'${tab.replace(/'/g, "''")}'!${cells}`;
}

export class SheetsRecordSink implements RecordSink {
  readonly kind = "sheets" as const;
  private headerChecked = false;

  constructor(
    private readonly sheets: sheets_v4.Sheets,
    private readonly spreadsheetId: string,
    private readonly tab: string
  ) {
    if (!spreadsheetId) {
      throw new Error("SHEETS_SPREADSHEET_ID is not set. Set it to use the sheets result sink.");
    }
  }

  static create(auth: GoogleAuthClient, spreadsheetId: string, tab: string): SheetsRecordSink {
    return new SheetsRecordSink(google.sheets({ version: "v4", auth }), spreadsheetId, tab);
  }

  /** Write the canonical header row when the tab's first row is empty. */
  private async ensureHeader(): Promise<void> {
    if (this.headerChecked) return;
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: tabRange(this.tab, "1:1"),
    });
    const firstRow = res.data.values?.[0] ?? [];
    if (firstRow.length === 0) {
      await this.sheets.spreadsheets.values.update({
        spreadsheetId: this.spreadsheetId,
        range: tabRange(this.tab, "A1"),
        valueInputOption: "RAW",
        requestBody: { values: [[...CANONICAL_FIELDS]] },
      });
      log.info({ tab: this.tab }, "Wrote header row");
    }
    this.headerChecked = true;
  }

  async append(record: CanonicalRecord, meta: RecordMeta): Promise<void> {
    await this.ensureHeader();
    await this.sheets.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range: tabRange(this.tab, "A1"),
      valueInputOption: "RAW",
      insertDataOption: "INSERT_ROWS",
      requestBody: { values: [recordToRow(record)] },
    });
    log.debug({ objectId: meta.objectId, tab: this.tab }, "Appended record row");
  }
}
