/**
 * Cache key derivation
 */

import { createHash } from 'crypto';

/**
 * Normalize a value so that incidental differences do not change the key:
 * strings are trimmed and lower-cased, undefined members are dropped.
 */
function normalizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.trim().toLowerCase();
  }
  if (Array.isArray(value)) {
    return value.map(normalizeValue);
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      if (v === undefined) continue;
      result[k] = normalizeValue(v);
    }
    return result;
  }
  return value;
}

/**
 * Recursively stable-sort object keys
 */
export function stableStringify(obj: unknown): string {
  if (obj === undefined) {
    return 'null';
  }
  if (obj === null || typeof obj !== 'object') {
    return JSON.stringify(obj);
  }
  if (Array.isArray(obj)) {
    // Serialize array elements first then sort, same element set gives same result
    const sorted = obj.map(stableStringify).sort();
    return '[' + sorted.join(',') + ']';
  }
  const keys = Object.keys(obj).sort();
  const pairs = keys.map(
    (k) => JSON.stringify(k) + ':' + stableStringify((obj as Record<string, unknown>)[k])
  );
  return '{' + pairs.join(',') + '}';
}

/**
 * Build `<operation>:<md5>` for an operation and its (validated) arguments
 */
export function buildCacheKey(operation: string, args: unknown): string {
  const serialized = stableStringify(normalizeValue(args));
  const digest = createHash('md5').update(serialized).digest('hex');
  return `${operation}:${digest}`;
}
