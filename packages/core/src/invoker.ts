/**
 * OperationInvoker - validate → cache lookup → (miss) remote call under the
 * error normalizer → cache store → result
 */

import { buildCacheKey } from './cacheKey.js';
import { normalizeErrors } from './errorNormalizer.js';
import type { Logger } from './logger.js';
import type { ResultCache } from './resultCache.js';
import type {
  InvokeOptions,
  Operation,
  OperationDefinition,
  OperationResult,
  RetryOptions,
  SleepFn,
} from './types.js';

export interface OperationInvokerOptions {
  cache: ResultCache;
  logger: Logger;
  /** TTL for operations that do not set their own */
  defaultTtlMs: number;
  retry?: RetryOptions;
  /** Sleep implementation override used in tests */
  sleep?: SleepFn;
}

function assertValidName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new Error('Operation name must be a non-empty string');
  }
  if (trimmed !== name || name.includes(':')) {
    throw new Error(`Operation name "${name}" must not contain whitespace padding or ":"`);
  }
  return name;
}

export class OperationInvoker {
  private readonly cache: ResultCache;
  private readonly logger: Logger;
  private readonly defaultTtlMs: number;
  private readonly retry: RetryOptions;
  private readonly sleep: SleepFn | undefined;
  private readonly operations = new Set<string>();

  constructor(options: OperationInvokerOptions) {
    if (!(options.defaultTtlMs > 0)) {
      throw new Error('defaultTtlMs must be positive');
    }
    this.cache = options.cache;
    this.logger = options.logger;
    this.defaultTtlMs = options.defaultTtlMs;
    this.retry = options.retry ?? {};
    this.sleep = options.sleep;
  }

  /**
   * Create an operation
   */
  define<TArgs, TValidated, TResult>(
    definition: OperationDefinition<TArgs, TValidated, TResult>
  ): Operation<TArgs, TResult> {
    const name = assertValidName(definition.name);
    if (this.operations.has(name)) {
      throw new Error(`Operation already defined: ${name}`);
    }
    const ttlMs = definition.ttlMs ?? this.defaultTtlMs;
    if (!(ttlMs > 0)) {
      throw new Error(`Operation "${name}" ttlMs must be positive`);
    }
    const cacheable = definition.cacheable ?? true;

    const operation = async (args: TArgs, options: InvokeOptions = {}): Promise<OperationResult<TResult>> => {
      return this.invoke(name, ttlMs, cacheable, definition, args, options);
    };
    operation.operationName = name;
    operation.ttlMs = ttlMs;
    operation.cacheable = cacheable;

    this.operations.add(name);
    return operation;
  }

  /**
   * Names of all defined operations, in definition order
   */
  listOperations(): string[] {
    return [...this.operations];
  }

  /**
   * Drop cached results of one operation, or all of them
   */
  invalidate(operation?: string): number {
    if (operation === undefined) {
      const removed = this.cache.size;
      this.cache.invalidateAll();
      return removed;
    }
    return this.cache.invalidatePrefix(operation);
  }

  private async invoke<TArgs, TValidated, TResult>(
    name: string,
    ttlMs: number,
    cacheable: boolean,
    definition: OperationDefinition<TArgs, TValidated, TResult>,
    args: TArgs,
    options: InvokeOptions
  ): Promise<OperationResult<TResult>> {
    const validated = await definition.validate(args);
    if (!validated.ok) {
      this.logger.debug(`${name} rejected: ${validated.error.message}`);
      return validated;
    }

    const input = validated.value;
    const key = buildCacheKey(name, input);

    if (cacheable && !options.skipCache) {
      const cached = this.cache.get<TResult>(key);
      if (cached !== undefined) {
        this.logger.debug(`${name} cache hit ${key}`);
        return { ok: true, value: cached, cached: true };
      }
    }

    const identity = definition.flightKey ? `${name}:${definition.flightKey(input)}` : key;
    const flightKey = options.skipCache ? `${identity}#refresh` : identity;
    // Concurrent misses on the same key share one remote call
    return this.cache.singleFlight(flightKey, async (): Promise<OperationResult<TResult>> => {
      const reservation = cacheable ? this.cache.reserve(key) : undefined;
      try {
        this.logger.debug(`${name} calling remote (${cacheable ? 'cache miss' : 'uncached'})`);
        const result = await normalizeErrors(() => definition.call(input), {
          operation: name,
          logger: this.logger,
          ...this.retry,
          ...(this.sleep ? { sleep: this.sleep } : {}),
        });
        if (!result.ok) {
          return result;
        }
        // Dropped if the key was invalidated while the call ran
        reservation?.commit(result.value, ttlMs);
        return { ok: true, value: result.value, cached: false };
      } finally {
        reservation?.release();
      }
    });
  }
}
