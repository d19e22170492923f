/**
 * ErrorNormalizer - converts any remote-call failure into an ErrorEnvelope
 */

import { randomUUID } from 'crypto';
import { MissingCredentialsError } from './errors.js';
import type { Logger } from './logger.js';
import { backoffDelayMs, defaultSleep, DEFAULT_BASE_DELAY_MS, DEFAULT_MAX_ATTEMPTS } from './retry.js';
import type { ErrorEnvelope, ErrorKind, Result, RetryOptions, SleepFn } from './types.js';

const MESSAGES: Record<ErrorKind, string> = {
  Auth: 'Authentication failed. Check the configured Kaggle API credentials.',
  NotFound: 'Resource not found. Check the competition, dataset or model identifier.',
  Forbidden: 'Access denied. The resource is private, expired or requires accepting its rules.',
  RateLimited: 'Rate limit exceeded. Wait before making more requests.',
  Network: 'The Kaggle API could not be reached or timed out. Try again later.',
  Validation: 'Invalid input.',
  Unknown: 'An unexpected error occurred.',
};

const RETRYABLE: ReadonlySet<ErrorKind> = new Set<ErrorKind>(['RateLimited', 'Network']);

const NETWORK_CODES = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
]);

function readProperty(value: unknown, key: string): unknown {
  if (value !== null && typeof value === 'object' && key in value) {
    return (value as Record<string, unknown>)[key];
  }
  return undefined;
}

function statusOf(error: unknown): number | undefined {
  const status = readProperty(error, 'status') ?? readProperty(error, 'statusCode');
  return typeof status === 'number' ? status : undefined;
}

/**
 * Collect error codes from the error and its cause chain (fetch wraps socket errors)
 */
function codesOf(error: unknown): string[] {
  const codes: string[] = [];
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current !== undefined && current !== null; depth++) {
    const code = readProperty(current, 'code');
    if (typeof code === 'string') codes.push(code);
    current = readProperty(current, 'cause');
  }
  return codes;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function nameOf(error: unknown): string {
  return error instanceof Error ? error.name : '';
}

/**
 * Classify a failure. First match wins.
 */
export function classifyError(error: unknown): ErrorKind {
  const status = statusOf(error);
  const message = messageOf(error);
  const lower = message.toLowerCase();
  const codes = codesOf(error);
  const name = nameOf(error);

  if (error instanceof MissingCredentialsError || status === 401 || /\b401\b|unauthorized/i.test(message)) {
    return 'Auth';
  }
  if (status === 404 || /\b404\b|not found/i.test(message)) {
    return 'NotFound';
  }
  if (status === 403 || /\b403\b|forbidden/i.test(message)) {
    return 'Forbidden';
  }
  if (status === 429 || /\b429\b|too many requests/i.test(message) || lower.includes('rate limit')) {
    return 'RateLimited';
  }
  if (
    name === 'TimeoutError' ||
    name === 'AbortError' ||
    status === 502 ||
    status === 503 ||
    status === 504 ||
    codes.some((code) => NETWORK_CODES.has(code) || code.startsWith('UND_ERR')) ||
    lower.includes('fetch failed') ||
    lower.includes('timeout') ||
    lower.includes('timed out')
  ) {
    return 'Network';
  }
  return 'Unknown';
}

const ABSOLUTE_PATH = /\b[A-Za-z]:\\[^\s'"`]*|\\\\[^\s'"`]+|(?<![\w.~/])\/[^\s'"`]+/g;
const SECRET_PAIR = /\b(key|token|password|secret|api_key|apikey)\s*[=:]\s*[^\s,;&]+/gi;
const AUTH_HEADER = /\b(Basic|Bearer)\s+[A-Za-z0-9+/=._-]+/g;

/**
 * Strip absolute paths and credential-looking fragments from a caller-facing message
 */
export function redactMessage(text: string): string {
  return text
    .replace(AUTH_HEADER, '$1 [redacted]')
    .replace(SECRET_PAIR, '$1=[redacted]')
    .replace(ABSOLUTE_PATH, '<path>');
}

export function createErrorEnvelope(kind: ErrorKind, message?: string, correlationId: string = randomUUID()): ErrorEnvelope {
  return {
    kind,
    message: message === undefined ? MESSAGES[kind] : redactMessage(message),
    retryable: RETRYABLE.has(kind),
    correlationId,
  };
}

export function validationError<T = never>(message: string): Result<T> {
  return { ok: false, error: createErrorEnvelope('Validation', message) };
}

export interface NormalizeOptions extends RetryOptions {
  /** Operation name used in log lines */
  operation: string;
  logger: Logger;
  /** Sleep implementation override used in tests */
  sleep?: SleepFn;
}

/**
 * Execute a remote call and return its value or a classified ErrorEnvelope.
 *
 * RateLimited and Network failures are retried with exponential backoff up to
 * `maxAttempts`; every other kind is surfaced on the first failure. The final
 * failure is logged once with its kind and correlation id.
 */
export async function normalizeErrors<T>(thunk: () => Promise<T>, options: NormalizeOptions): Promise<Result<T>> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const sleep = options.sleep ?? defaultSleep;
  const { logger, operation } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return { ok: true, value: await thunk() };
    } catch (error) {
      const kind = classifyError(error);
      if (RETRYABLE.has(kind) && attempt < maxAttempts) {
        const delay = backoffDelayMs(attempt, baseDelayMs);
        logger.debug(`${operation} failed with ${kind} (attempt ${attempt}/${maxAttempts}), retrying in ${delay}ms`);
        await sleep(delay);
        continue;
      }

      const envelope = createErrorEnvelope(kind);
      if (kind === 'Unknown') {
        // Cause stays in the diagnostic channel only
        logger.error(`${operation} failed: kind=${kind} correlationId=${envelope.correlationId}`, error);
      } else {
        logger.warn(
          `${operation} failed: kind=${kind} correlationId=${envelope.correlationId} attempts=${attempt}`
        );
      }
      return { ok: false, error: envelope };
    }
  }
}
