/**
 * Core infrastructure between tool-facing operations and the remote API
 *
 * - Validator: identifiers, pagination, file-system targets
 * - ResultCache: TTL store with single-flight de-duplication
 * - ErrorNormalizer: failures → ErrorEnvelope, bounded retries
 * - OperationInvoker: the composition of the three
 */

export { OperationInvoker } from './invoker.js';
export type { OperationInvokerOptions } from './invoker.js';

export { ResultCache } from './resultCache.js';
export type { ResultCacheOptions } from './resultCache.js';

export { buildCacheKey, stableStringify } from './cacheKey.js';

export {
  classifyError,
  createErrorEnvelope,
  normalizeErrors,
  redactMessage,
  validationError,
} from './errorNormalizer.js';
export type { NormalizeOptions } from './errorNormalizer.js';

export { HttpStatusError, MissingCredentialsError } from './errors.js';

export { backoffDelayMs, defaultSleep, DEFAULT_BASE_DELAY_MS, DEFAULT_MAX_ATTEMPTS } from './retry.js';

export {
  ok,
  formatZodError,
  validateChoice,
  validateCompetitionId,
  validateDatasetRef,
  validateModelRef,
  validatePagination,
  validateSearchTerm,
  validateSlug,
  sanitizeDownloadPath,
  sanitizeFilename,
  MAX_FILENAME_LENGTH,
  MAX_SEARCH_LENGTH,
  MAX_SEGMENT_LENGTH,
} from './validator.js';

export { ConsoleLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { ConsoleLoggerOptions, Logger, LogLevel } from './logger.js';

export type {
  CacheEntry,
  CacheReservation,
  CacheStats,
  ErrorEnvelope,
  ErrorKind,
  InvokeOptions,
  NowFn,
  Operation,
  OperationDefinition,
  OperationResult,
  Result,
  RetryOptions,
  SleepFn,
  ValidationResult,
} from './types.js';
