// src/utils/retryable.ts
// Classification of remote-call failures (Drive, Sheets, AI providers).
//
// Transient: 429, 5xx, network error codes and timeout/socket messages.
// Every other 4xx and anything unrecognised is permanent.

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'ENETUNREACH',
  'UND_ERR_SOCKET',
]);

const TRANSIENT_MESSAGE_HINTS = ['timeout', 'timed out', 'socket hang up', 'network', 'econnreset', 'etimedout'];

const QUOTA_MESSAGE_HINTS = ['quota', 'rate limit', 'ratelimit', 'resource_exhausted', 'resource exhausted', 'too many requests'];

function readField(err: unknown, key: string): unknown {
  if (err && typeof err === 'object' && key in err) {
    return Reflect.get(err, key);
  }
  return undefined;
}

/**
 * HTTP status carried by the error: `status` (OpenAI / Anthropic SDKs),
 * `response.status` (gaxios / googleapis) or a numeric `code`.
 */
export function getStatusCode(err: unknown): number | undefined {
  const direct = readField(err, 'status');
  if (typeof direct === 'number') return direct;

  const response = readField(err, 'response');
  const nested = readField(response, 'status');
  if (typeof nested === 'number') return nested;

  const code = readField(err, 'code');
  if (typeof code === 'number' && code >= 100 && code < 600) return code;
  if (typeof code === 'string' && /^\d{3}$/.test(code)) return Number(code);

  return undefined;
}

function getErrorCode(err: unknown): string | undefined {
  const code = readField(err, 'code');
  if (typeof code === 'string') return code;
  const cause = readField(err, 'cause');
  const causeCode = readField(cause, 'code');
  return typeof causeCode === 'string' ? causeCode : undefined;
}

export function isTransientError(err: unknown): boolean {
  const status = getStatusCode(err);
  if (status !== undefined) {
    if (status === 429 || (status >= 500 && status < 600)) return true;
    if (status >= 400 && status < 500) return false;
  }

  const code = getErrorCode(err);
  if (code && TRANSIENT_CODES.has(code)) return true;

  if (err instanceof Error) {
    const message = err.message.toLowerCase();
    if (TRANSIENT_MESSAGE_HINTS.some((hint) => message.includes(hint))) return true;
  }

  return false;
}

/**
 * Quota / rate-limit exhaustion: HTTP 429, or any error whose message names a
 * quota or rate limit (Drive reports `userRateLimitExceeded` as a 403).
 */
export function isQuotaError(err: unknown): boolean {
  if (getStatusCode(err) === 429) return true;

  const message = err instanceof Error ? err.message.toLowerCase() : '';
  return QUOTA_MESSAGE_HINTS.some((hint) => message.includes(hint));
}
