// src/pipeline/context.ts
// Everything one pipeline run needs, built once from config and passed
// explicitly (no module-level clients).

import os from "node:os";
import { nanoid } from "nanoid";
import { Analyzer } from "../ai/analyzer.js";
import { loadPromptTemplate } from "../ai/prompt.js";
import { createProviders } from "../ai/providers/index.js";
import type { AppConfig } from "../config.js";
import { createAdapter, initSchema, type DbAdapter } from "../db/index.js";
import { loadDefaultFeatureCatalog, TeamDirectory, type FeatureCatalog } from "../enrichment/index.js";
import { createLogger } from "../observability/logger.js";
import { LedgerStore } from "../store/ledger.js";
import { DbRecordSink } from "../store/meetingRecords.js";
import type { RecordSink } from "../store/recordSink.js";
import { SheetsRecordSink } from "../store/sheetsSink.js";
import { createGoogleAuth } from "../storage/googleAuth.js";
import { GoogleDriveStore } from "../storage/googleDrive.js";
import type { ObjectStore } from "../storage/types.js";
import { OpenAITranscriber } from "../transcription/openai.js";
import type { Transcriber } from "../transcription/types.js";
import { Fetcher } from "./fetcher.js";
import { QuarantineManager } from "./quarantine.js";

const log = createLogger("pipeline/context");

export interface PipelineSettings {
  rootFolderId: string;
  processedFolderId: string;
  /** Lower-cased folder names never treated as owner folders. */
  ignoredFolderNames: string[];
  concurrency: number;
  haltOnFailure: boolean;
  claimStaleMs: number;
  autoReleaseQuarantine: boolean;
}

export interface PipelineContext {
  /** Identifies this process in object claims. */
  workerId: string;
  settings: PipelineSettings;
  store: ObjectStore;
  ledger: LedgerStore;
  fetcher: Fetcher;
  transcriber: Transcriber;
  analyzer: Analyzer;
  sink: RecordSink;
  quarantine: QuarantineManager;
  directory: TeamDirectory;
  catalog: FeatureCatalog;
  /** Release held resources (database pool). */
  close(): Promise<void>;
}

export function settingsFromConfig(config: AppConfig): PipelineSettings {
  return {
    rootFolderId: config.google.rootFolderId,
    processedFolderId: config.google.processedFolderId,
    ignoredFolderNames: config.google.ignoredFolderNames,
    concurrency: config.pipeline.concurrency,
    haltOnFailure: config.pipeline.haltOnFailure,
    claimStaleMs: config.pipeline.claimStaleMs,
    autoReleaseQuarantine: config.pipeline.quarantine.autoRelease,
  };
}

export function newWorkerId(): string {
  return `${os.hostname()}:${process.pid}:${nanoid(8)}`;
}

function requireSetting(value: string, envVar: string): string {
  if (!value) throw new Error(`${envVar} is not set`);
  return value;
}

/**
 * Wire the production collaborators: Google Drive, the configured result
 * sink, the AI provider chain and OpenAI transcription.
 */
export async function createPipelineContext(config: AppConfig): Promise<PipelineContext> {
  requireSetting(config.google.rootFolderId, "DRIVE_ROOT_FOLDER_ID");
  const quarantineFolderId = requireSetting(config.google.quarantineFolderId, "DRIVE_QUARANTINE_FOLDER_ID");

  const db: DbAdapter = createAdapter(config.database);
  try {
    await initSchema(db);

    const auth = createGoogleAuth(config.google.serviceAccountJson);
    const store = new GoogleDriveStore(auth);
    const ledger = new LedgerStore(db);

    const sink: RecordSink =
      config.sink.kind === "sheets"
        ? SheetsRecordSink.create(auth, config.sink.spreadsheetId, config.sink.resultsTab)
        : new DbRecordSink(db);

    const template = await loadPromptTemplate(config.files.promptTemplatePath);
    const analyzer = new Analyzer({
      providers: createProviders(config.ai),
      promptTemplate: template.text,
      timeoutMs: config.ai.timeoutMs,
      maxTokens: config.ai.maxTokens,
      temperature: config.ai.temperature,
    });

    const transcriber = new OpenAITranscriber({
      apiKey: config.ai.openaiKey,
      model: config.transcription.model,
      defaults: {
        translate: config.transcription.translate,
        language: config.transcription.language,
        trimSilence: config.transcription.trimSilence,
        temperature: config.transcription.temperature,
        timeoutMs: config.transcription.timeoutMs,
      },
    });

    const fetcher = new Fetcher(store, {
      tmpDir: config.pipeline.tmpDir,
      chunkSizeBytes: config.pipeline.chunkSizeBytes,
      backoff: config.pipeline.backoff,
    });

    const quarantine = new QuarantineManager(store, ledger, {
      quarantineFolderId,
      maxAttempts: config.pipeline.quarantine.maxAttempts,
      retryAfterHours: config.pipeline.quarantine.retryAfterHours,
      backoff: config.pipeline.backoff,
    });

    const directory = await TeamDirectory.load(config.files.teamDirectoryPath);

    const ctx: PipelineContext = {
      workerId: newWorkerId(),
      settings: settingsFromConfig(config),
      store,
      ledger,
      fetcher,
      transcriber,
      analyzer,
      sink,
      quarantine,
      directory,
      catalog: loadDefaultFeatureCatalog(),
      close: () => db.close(),
    };
    log.info(
      { workerId: ctx.workerId, providers: analyzer.providerNames, sink: sink.kind, db: db.dbType },
      "Pipeline context ready"
    );
    return ctx;
  } catch (err) {
    await db.close().catch((closeErr: unknown) => log.warn({ err: closeErr }, "Closing database failed"));
    throw err;
  }
}
