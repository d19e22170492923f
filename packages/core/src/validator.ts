/**
 * Validator - checks caller-supplied identifiers and parameters and sanitizes
 * file-system targets before anything reaches the remote API or the disk.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { ZodError } from 'zod';
import { validationError } from './errorNormalizer.js';
import type { Result, ValidationResult } from './types.js';

/** Allowed characters of a single identifier segment */
const SLUG_PATTERN = /^[A-Za-z0-9_-]+$/;
export const MAX_SEGMENT_LENGTH = 100;
export const MAX_SEARCH_LENGTH = 200;
export const MAX_FILENAME_LENGTH = 255;

const slugSchema = z
  .string()
  .min(1, 'must be non-empty')
  .max(MAX_SEGMENT_LENGTH, `must be at most ${MAX_SEGMENT_LENGTH} characters`)
  .regex(SLUG_PATTERN, "may only contain letters, digits, '-' and '_'");

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function formatZodError(error: ZodError): string {
  const issues = error.issues ?? [];
  if (!issues.length) return error.message;
  return issues
    .map((issue) => {
      const path = issue.path?.length ? issue.path.join('.') : '';
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

function parseWith<T>(schema: z.ZodType<T>, value: unknown): ValidationResult<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    return validationError(formatZodError(parsed.error));
  }
  return ok(parsed.data);
}

function validateOwnedRef(
  input: unknown,
  label: string,
  example: string
): ValidationResult<{ owner: string; name: string }> {
  if (typeof input !== 'string') {
    return validationError(`${label} must be a string`);
  }
  const ref = input.trim();
  if (!ref) {
    return validationError(`${label} cannot be empty`);
  }
  if (!ref.includes('/')) {
    return validationError(`${label} must be in the format '${example}'`);
  }
  const parts = ref.split('/');
  if (parts.length !== 2) {
    return validationError(`${label} must contain exactly one '/' separator`);
  }
  const [owner = '', name = ''] = parts;
  if (!owner || !name) {
    return validationError(`${label} must have a non-empty owner and name`);
  }
  const checked = parseWith(z.object({ owner: slugSchema, name: slugSchema }), { owner, name });
  if (!checked.ok) {
    return validationError(`${label} is invalid: ${checked.error.message}`);
  }
  return checked;
}

/**
 * Validate a dataset reference in the form `owner/dataset-name`
 */
export function validateDatasetRef(input: unknown): ValidationResult<{ owner: string; name: string }> {
  return validateOwnedRef(input, 'Dataset reference', 'owner/dataset-name');
}

/**
 * Validate a model reference in the form `owner/model-slug`
 */
export function validateModelRef(input: unknown): ValidationResult<{ owner: string; slug: string }> {
  const result = validateOwnedRef(input, 'Model reference', 'owner/model-slug');
  if (!result.ok) return result;
  return ok({ owner: result.value.owner, slug: result.value.name });
}

/**
 * Validate a single identifier segment (competition id, user or owner name)
 */
export function validateSlug(label: string, input: unknown): ValidationResult<string> {
  if (typeof input !== 'string' || !input.trim()) {
    return validationError(`${label} cannot be empty`);
  }
  const result = parseWith(slugSchema, input.trim());
  if (!result.ok) {
    return validationError(`${label} is invalid: ${result.error.message}`);
  }
  return result;
}

export function validateCompetitionId(input: unknown): ValidationResult<string> {
  return validateSlug('Competition id', input);
}

/**
 * Validate page bounds. Out-of-range values are rejected, never clamped.
 */
export function validatePagination(
  page: unknown,
  pageSize: unknown,
  maxPageSize: number
): ValidationResult<{ page: number; pageSize: number }> {
  const schema = z.object({
    page: z.number('must be a number').int('must be an integer').min(1, 'must be at least 1'),
    pageSize: z
      .number('must be a number')
      .int('must be an integer')
      .min(1, 'must be at least 1')
      .max(maxPageSize, `cannot exceed ${maxPageSize}`),
  });
  return parseWith(schema, { page, pageSize });
}

/**
 * Free-text search terms: trimmed, bounded, no control characters.
 * An empty string means "no filter".
 */
export function validateSearchTerm(input: unknown): ValidationResult<string> {
  if (input === undefined || input === null) return ok('');
  if (typeof input !== 'string') {
    return validationError('Search term must be a string');
  }
  const term = input.trim();
  if (term.length > MAX_SEARCH_LENGTH) {
    return validationError(`Search term cannot exceed ${MAX_SEARCH_LENGTH} characters`);
  }
  // eslint-disable-next-line no-control-regex
  if (/[\u0000-\u001f\u007f]/.test(term)) {
    return validationError('Search term must not contain control characters');
  }
  return ok(term);
}

/**
 * Validate one of a fixed set of values (sort orders, categories, ...)
 */
export function validateChoice<T extends string>(
  field: string,
  value: unknown,
  allowed: readonly T[]
): ValidationResult<T> {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    return validationError(`${field} must be one of: ${allowed.join(', ')}`);
  }
  return ok(match);
}

/**
 * Collapse a file name into a single safe path segment.
 *
 * Separators and characters that are unsafe on common file systems become `_`,
 * leading/trailing whitespace and dots are stripped (so `..` disappears).
 */
export function sanitizeFilename(name: unknown): ValidationResult<string> {
  if (typeof name !== 'string') {
    return validationError('File name must be a string');
  }
  if (name.includes('\0')) {
    return validationError('File name must not contain null bytes');
  }
  const replaced = name
    // eslint-disable-next-line no-control-regex
    .replace(/[<>:"/\\|?*\u0000-\u001f\u007f]/g, '_')
    .replace(/^[\s.]+|[\s.]+$/g, '')
    .slice(0, MAX_FILENAME_LENGTH);
  if (!replaced || !/[^_]/.test(replaced)) {
    return validationError('File name is empty after removing unsafe characters');
  }
  return ok(replaced);
}

function isMissingPathError(err: unknown): boolean {
  if (err && typeof err === 'object' && 'code' in err) {
    const code = (err as { code: unknown }).code;
    return code === 'ENOENT' || code === 'ENOTDIR';
  }
  return false;
}

/**
 * Resolve symlinks of the deepest existing ancestor and re-append the rest
 */
async function realpathOfNearest(target: string): Promise<string> {
  let existing = target;
  for (;;) {
    try {
      const real = await fs.realpath(existing);
      return path.join(real, path.relative(existing, target));
    } catch (err) {
      if (!isMissingPathError(err)) throw err;
      const parent = path.dirname(existing);
      if (parent === existing) return target;
      existing = parent;
    }
  }
}

function isStrictlyWithin(base: string, target: string): boolean {
  const relative = path.relative(base, target);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/**
 * Resolve `candidate` under `root`, rejecting anything that would escape it,
 * lexically or through symlinks.
 */
export async function sanitizeDownloadPath(root: string, candidate: unknown): Promise<ValidationResult<string>> {
  if (typeof candidate !== 'string' || !candidate.trim()) {
    return validationError('Download path must be a non-empty relative path');
  }
  if (candidate.includes('\0')) {
    return validationError('Download path must not contain null bytes');
  }
  if (path.isAbsolute(candidate) || path.win32.isAbsolute(candidate)) {
    return validationError('Download path must be relative to the download root');
  }
  const segments = candidate.split(/[\\/]+/);
  if (segments.some((seg) => seg === '..')) {
    return validationError('Download path must not contain ".." segments');
  }

  const resolvedRoot = path.resolve(root);
  const resolvedTarget = path.resolve(resolvedRoot, candidate);
  if (!isStrictlyWithin(resolvedRoot, resolvedTarget)) {
    return validationError('Download path must resolve inside the download root');
  }

  let realRoot: string;
  let realTarget: string;
  try {
    realRoot = await realpathOfNearest(resolvedRoot);
    realTarget = await realpathOfNearest(resolvedTarget);
  } catch {
    return validationError('Download path could not be resolved');
  }
  if (!isStrictlyWithin(realRoot, realTarget)) {
    return validationError('Download path must not leave the download root through a symbolic link');
  }
  return ok(resolvedTarget);
}
