/* src/config.ts
   Centralized pipeline config, read from the environment (.env via dotenv) */
import path from 'node:path';
import 'dotenv/config';

export type AIProviderName = 'openai' | 'anthropic';
export type DatabaseDriver = 'sqlite' | 'postgresql';
export type ResultSinkKind = 'db' | 'sheets';

type EnvSource = Record<string, string | undefined>;

const KNOWN_PROVIDERS: readonly AIProviderName[] = ['anthropic', 'openai'];

/* ---------- Parsing helpers ---------- */

const readEnv = (source: EnvSource, name: string, fallback?: string) =>
  (source[name] ?? fallback ?? '').toString().trim();

function readInt(source: EnvSource, name: string, fallback: number, min = 0): number {
  const raw = readEnv(source, name);
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) && n >= min ? n : fallback;
}

function readFloat(source: EnvSource, name: string, fallback: number): number {
  const raw = readEnv(source, name);
  if (!raw) return fallback;
  const n = Number.parseFloat(raw);
  return Number.isFinite(n) ? n : fallback;
}

function readBool(source: EnvSource, name: string, fallback: boolean): boolean {
  const raw = readEnv(source, name).toLowerCase();
  if (!raw) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw);
}

function readList(source: EnvSource, name: string, fallback: string): string[] {
  return readEnv(source, name, fallback)
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

function isProviderName(value: string): value is AIProviderName {
  return (KNOWN_PROVIDERS as readonly string[]).includes(value);
}

/* ---------- Config shape ---------- */

export interface AppConfig {
  nodeEnv: string;
  database: {
    url: string;
    driver: DatabaseDriver;
    sqlitePath: string;
  };
  google: {
    serviceAccountJson: string;
    rootFolderId: string;
    processedFolderId: string;
    quarantineFolderId: string;
    ignoredFolderNames: string[];
  };
  sink: {
    kind: ResultSinkKind;
    spreadsheetId: string;
    resultsTab: string;
  };
  ai: {
    providers: AIProviderName[];
    openaiKey: string;
    anthropicKey: string;
    model: Record<AIProviderName, string>;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
  };
  transcription: {
    model: string;
    translate: boolean;
    language: string;
    trimSilence: boolean;
    temperature: number;
    timeoutMs: number;
  };
  pipeline: {
    tmpDir: string;
    concurrency: number;
    haltOnFailure: boolean;
    chunkSizeBytes: number;
    claimStaleMs: number;
    backoff: {
      baseMs: number;
      jitterMs: number;
      capMs: number;
    };
    quarantine: {
      maxAttempts: number;
      retryAfterHours: number;
      autoRelease: boolean;
    };
  };
  files: {
    promptTemplatePath: string;
    teamDirectoryPath: string;
  };
}

/* ---------- Loader ---------- */

/**
 * Build the pipeline configuration from an environment map.
 * Invalid numeric values fall back to defaults.
 */
export function loadConfig(source: EnvSource = process.env): AppConfig {
  const databaseUrl = readEnv(source, 'DATABASE_URL', 'sqlite://local');
  const databaseDriver: DatabaseDriver = databaseUrl.startsWith('postgres')
    ? 'postgresql'
    : 'sqlite';

  const providers = readList(source, 'AI_PROVIDERS', 'anthropic,openai')
    .map(p => p.toLowerCase())
    .filter(isProviderName);

  const sinkRaw = readEnv(source, 'RESULT_SINK', 'db').toLowerCase();

  return {
    nodeEnv: readEnv(source, 'NODE_ENV', 'development'),

    // ── Database ─────────────────────────────────────────────────────
    database: {
      url: databaseUrl,
      driver: databaseDriver,
      sqlitePath: path.resolve(process.cwd(), readEnv(source, 'PIPELINE_DB_PATH', 'data/pipeline.db')),
    },

    // ── Google Drive / Sheets ────────────────────────────────────────
    google: {
      serviceAccountJson: readEnv(source, 'GCP_SA_KEY'),
      rootFolderId: readEnv(source, 'DRIVE_ROOT_FOLDER_ID'),
      processedFolderId: readEnv(source, 'DRIVE_PROCESSED_FOLDER_ID'),
      quarantineFolderId: readEnv(source, 'DRIVE_QUARANTINE_FOLDER_ID'),
      ignoredFolderNames: readList(
        source,
        'DRIVE_IGNORED_FOLDER_NAMES',
        'processed meetings,quarantined meetings'
      ).map(n => n.toLowerCase()),
    },

    // ── Result sink ──────────────────────────────────────────────────
    sink: {
      kind: sinkRaw === 'sheets' ? 'sheets' : 'db',
      spreadsheetId: readEnv(source, 'SHEETS_SPREADSHEET_ID'),
      resultsTab: readEnv(source, 'SHEETS_RESULTS_TAB', 'Analysis Results'),
    },

    // ── AI ───────────────────────────────────────────────────────────
    ai: {
      providers: providers.length > 0 ? providers : ['anthropic', 'openai'],
      openaiKey: readEnv(source, 'OPENAI_API_KEY'),
      anthropicKey: readEnv(source, 'ANTHROPIC_API_KEY'),
      model: {
        openai: readEnv(source, 'AI_MODEL_OPENAI', 'gpt-4o'),
        anthropic: readEnv(source, 'AI_MODEL_ANTHROPIC', 'claude-sonnet-4-5-20250929'),
      },
      maxTokens: readInt(source, 'AI_MAX_TOKENS', 4096, 1),
      temperature: readFloat(source, 'AI_TEMPERATURE', 0.2),
      timeoutMs: readInt(source, 'AI_TIMEOUT_MS', 120_000, 1),
    },

    // ── Transcription ────────────────────────────────────────────────
    transcription: {
      model: readEnv(source, 'TRANSCRIBE_MODEL', 'whisper-1'),
      translate: readBool(source, 'TRANSCRIBE_TRANSLATE', true),
      language: readEnv(source, 'TRANSCRIBE_LANGUAGE'),
      trimSilence: readBool(source, 'TRANSCRIBE_TRIM_SILENCE', false),
      temperature: readFloat(source, 'TRANSCRIBE_TEMPERATURE', 0),
      timeoutMs: readInt(source, 'TRANSCRIBE_TIMEOUT_MS', 600_000, 1),
    },

    // ── Pipeline ─────────────────────────────────────────────────────
    pipeline: {
      tmpDir: path.resolve(process.cwd(), readEnv(source, 'PIPELINE_TMP_DIR', 'tmp')),
      concurrency: readInt(source, 'PIPELINE_CONCURRENCY', 1, 1),
      haltOnFailure: readBool(source, 'PIPELINE_HALT_ON_FAILURE', false),
      chunkSizeBytes: readInt(source, 'FETCH_CHUNK_BYTES', 8 * 1024 * 1024, 1),
      claimStaleMs: readInt(source, 'CLAIM_STALE_MS', 2 * 60 * 60 * 1000, 1),
      backoff: {
        baseMs: 800,
        jitterMs: 300,
        capMs: 8000,
      },
      quarantine: {
        maxAttempts: readInt(source, 'QUARANTINE_MAX_ATTEMPTS', 4, 1),
        retryAfterHours: readFloat(source, 'QUARANTINE_RETRY_AFTER_HOURS', 24),
        autoRelease: readBool(source, 'QUARANTINE_AUTO_RELEASE', true),
      },
    },

    // ── Prompt template & team directory ─────────────────────────────
    files: {
      promptTemplatePath: path.resolve(
        process.cwd(),
        readEnv(source, 'PROMPT_TEMPLATE_PATH', 'prompts/meeting-analysis.txt')
      ),
      teamDirectoryPath: path.resolve(
        process.cwd(),
        readEnv(source, 'TEAM_DIRECTORY_PATH', 'data/team-directory.json')
      ),
    },
  };
}
