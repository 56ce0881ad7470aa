// src/observability/logger.ts
// Structured JSON logging
//
// Configures Pino with:
// - Environment-based log levels
// - JSON output by default, pino-pretty when LOG_PRETTY=true
// - Module-scoped child loggers, and per-object loggers carrying the stage
// - Redaction of provider keys and service-account material

import pino, { type Logger } from "pino";

/* ---------- Types ---------- */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/* ---------- Configuration ---------- */

/**
 * Get the configured log level from environment
 * Defaults to 'info'
 */
export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return "info";
}

/**
 * Check if pretty printing is enabled (for development)
 */
export function isPrettyEnabled(): boolean {
  return process.env.LOG_PRETTY === "true";
}

// Credentials that can end up in logged config objects or SDK errors.
const REDACT_PATHS = [
  "apiKey",
  "*.apiKey",
  "private_key",
  "*.private_key",
  "serviceAccountJson",
  "*.serviceAccountJson",
  "*.openaiKey",
  "*.anthropicKey",
  "headers.authorization",
  "*.headers.authorization",
];

/** Options shared by the root logger and any logger built on a custom stream. */
export function loggerOptions(): pino.LoggerOptions {
  return {
    level: getLogLevel(),
    base: {
      service: "meeting-pipeline",
      version: process.env.npm_package_version || "unknown",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[redacted]" },
  };
}

/* ---------- Logger Factory ---------- */

// Root logger instance (singleton)
let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    const options = loggerOptions();

    if (isPrettyEnabled()) {
      rootLogger = pino({
        ...options,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      });
    } else {
      rootLogger = pino(options);
    }
  }

  return rootLogger;
}

/**
 * Create a logger instance, optionally scoped to a module
 *
 * @example
 * const log = createLogger('pipeline/fetcher');
 * log.warn({ objectId, attempt }, 'Chunk transfer failed, retrying');
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();

  if (moduleName) {
    return root.child({ module: moduleName });
  }

  return root;
}

/**
 * Create a child logger with additional context
 *
 * @example
 * const objLog = createChildLogger(log, { objectId: 'abc123', fileName: 'visit.mp3' });
 */
export function createChildLogger(
  parent: Logger,
  bindings: Record<string, unknown>
): Logger {
  return parent.child(bindings);
}

/* ---------- Per-object loggers ---------- */

/** Bindings on every line logged while one source object is processed. */
export interface ObjectLogContext {
  objectId: string;
  fileName?: string;
  owner?: string;
  stage?: string;
}

/**
 * Child logger for one source object. `stage` starts as "discovered" and is
 * moved along with setObjectStage.
 */
export function createObjectLogger(parent: Logger, context: ObjectLogContext): Logger {
  return parent.child({ stage: "discovered", ...context });
}

export function setObjectStage(objectLog: Logger, stage: string): void {
  objectLog.setBindings({ stage });
}

export type { Logger };
