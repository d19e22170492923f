/**
 * Core type definitions
 */

/**
 * Error taxonomy shared by validation and remote-call failures
 */
export type ErrorKind =
  | 'Auth'
  | 'NotFound'
  | 'Forbidden'
  | 'RateLimited'
  | 'Network'
  | 'Validation'
  | 'Unknown';

/**
 * Structured, caller-safe description of a failure
 */
export interface ErrorEnvelope {
  kind: ErrorKind;
  /** Sanitized human-readable message (no credentials, stack traces or absolute paths) */
  message: string;
  retryable: boolean;
  /** Identifier of the boundary log line describing this failure */
  correlationId: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: ErrorEnvelope };

/**
 * Validators never produce anything but Validation-kind errors
 */
export type ValidationResult<T> = Result<T>;

export type OperationResult<T> = { ok: true; value: T; cached: boolean } | { ok: false; error: ErrorEnvelope };

/**
 * A single cached value and its liveness window
 */
export interface CacheEntry<T = unknown> {
  key: string;
  value: T;
  /** Insertion time in milliseconds */
  createdAt: number;
  ttlMs: number;
}

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
  /** Running computations that may still store a result */
  pendingWrites: number;
}

/**
 * Right to store one result, granted by `ResultCache.reserve`
 */
export interface CacheReservation {
  /** Store `value` unless the key was invalidated meanwhile; ends the claim */
  commit<T>(value: T, ttlMs: number): boolean;
  /** End the claim without storing */
  release(): void;
}

export type NowFn = () => number;
export type SleepFn = (ms: number) => Promise<void>;

export interface RetryOptions {
  /** Total attempts including the first one. Default 3. */
  maxAttempts?: number;
  /** First backoff delay; doubled on every further attempt. Default 200ms. */
  baseDelayMs?: number;
}

/**
 * Definition of an operation handled by `OperationInvoker.define`
 */
export interface OperationDefinition<TArgs, TValidated, TResult> {
  /** Operation name, also the cache key namespace */
  name: string;
  /** Entry lifetime; falls back to the invoker default */
  ttlMs?: number;
  /** Set to false for side-effecting calls (downloads). Default true. */
  cacheable?: boolean;
  /** Checks and normalizes caller arguments; the remote call is never reached on failure */
  validate: (args: TArgs) => ValidationResult<TValidated> | Promise<ValidationResult<TValidated>>;
  /**
   * Identity of a call for de-duplicating concurrent calls. Defaults to the
   * cache key, which folds string case; set it where case matters.
   */
  flightKey?: (validated: TValidated) => string;
  /** Remote call performed on a cache miss */
  call: (validated: TValidated) => Promise<TResult>;
}

export interface InvokeOptions {
  /** Bypass the cache lookup and refresh the entry */
  skipCache?: boolean;
}

/**
 * Callable returned by `OperationInvoker.define`
 */
export interface Operation<TArgs, TResult> {
  (args: TArgs, options?: InvokeOptions): Promise<OperationResult<TResult>>;
  operationName: string;
  ttlMs: number;
  cacheable: boolean;
}
