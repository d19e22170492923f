/**
 * Validator tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  sanitizeDownloadPath,
  sanitizeFilename,
  validateChoice,
  validateCompetitionId,
  validateDatasetRef,
  validateModelRef,
  validatePagination,
  validateSearchTerm,
} from '../validator.js';

describe('validateDatasetRef', () => {
  it('should accept owner/name', () => {
    expect(validateDatasetRef('titanic-owner/titanic')).toEqual({
      ok: true,
      value: { owner: 'titanic-owner', name: 'titanic' },
    });
  });

  it.each(['titanic', '/titanic', 'a/b/c', '', 'owner/', 'own er/name', 'owner/na.me'])(
    'should reject %j',
    (input) => {
      const result = validateDatasetRef(input);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('Validation');
        expect(result.error.retryable).toBe(false);
      }
    }
  );

  it('should explain a missing separator', () => {
    const result = validateDatasetRef('titanic');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Dataset reference must be in the format 'owner/dataset-name'");
    }
  });

  it('should explain extra separators', () => {
    const result = validateDatasetRef('a/b/c');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Dataset reference must contain exactly one '/' separator");
    }
  });

  it('should reject segments longer than 100 characters', () => {
    expect(validateDatasetRef(`owner/${'x'.repeat(101)}`).ok).toBe(false);
    expect(validateDatasetRef(`owner/${'x'.repeat(100)}`).ok).toBe(true);
  });

  it('should reject non-string input', () => {
    expect(validateDatasetRef(42).ok).toBe(false);
  });
});

describe('validateModelRef', () => {
  it('should return owner and slug', () => {
    expect(validateModelRef('google/gemma')).toEqual({ ok: true, value: { owner: 'google', slug: 'gemma' } });
  });

  it('should reject a bare slug', () => {
    expect(validateModelRef('gemma').ok).toBe(false);
  });
});

describe('validateCompetitionId', () => {
  it('should accept a slug', () => {
    expect(validateCompetitionId('house-prices')).toEqual({ ok: true, value: 'house-prices' });
  });

  it.each(['', '../titanic', 'a/b', 'bad id'])('should reject %j', (input) => {
    expect(validateCompetitionId(input).ok).toBe(false);
  });
});

describe('validatePagination', () => {
  it('should accept in-range values', () => {
    expect(validatePagination(2, 50, 100)).toEqual({ ok: true, value: { page: 2, pageSize: 50 } });
  });

  it('should accept the bounds', () => {
    expect(validatePagination(1, 1, 100).ok).toBe(true);
    expect(validatePagination(1, 100, 100).ok).toBe(true);
  });

  it('should reject page 0 rather than clamping', () => {
    const result = validatePagination(0, 20, 100);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('Validation');
      expect(result.error.message).toBe('page: must be at least 1');
    }
  });

  it('should reject a page size above the maximum', () => {
    const result = validatePagination(1, 101, 100);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('pageSize: cannot exceed 100');
    }
  });

  it('should reject non-integers', () => {
    expect(validatePagination(1.5, 20, 100).ok).toBe(false);
    expect(validatePagination('1', 20, 100).ok).toBe(false);
  });
});

describe('validateSearchTerm', () => {
  it('should trim the term', () => {
    expect(validateSearchTerm('  titanic ')).toEqual({ ok: true, value: 'titanic' });
  });

  it('should treat a missing term as no filter', () => {
    expect(validateSearchTerm(undefined)).toEqual({ ok: true, value: '' });
  });

  it('should reject control characters and overlong terms', () => {
    expect(validateSearchTerm('a\u0007b').ok).toBe(false);
    expect(validateSearchTerm('x'.repeat(201)).ok).toBe(false);
  });
});

describe('validateChoice', () => {
  it('should accept an allowed value', () => {
    expect(validateChoice('sortBy', 'votes', ['hottest', 'votes'] as const)).toEqual({ ok: true, value: 'votes' });
  });

  it('should list allowed values on failure', () => {
    const result = validateChoice('sortBy', 'random', ['hottest', 'votes'] as const);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('sortBy must be one of: hottest, votes');
    }
  });
});

describe('sanitizeFilename', () => {
  it('should keep ordinary names', () => {
    expect(sanitizeFilename('train.csv')).toEqual({ ok: true, value: 'train.csv' });
  });

  it('should collapse traversal sequences into a single segment', () => {
    expect(sanitizeFilename('../../etc/passwd')).toEqual({ ok: true, value: '_.._etc_passwd' });
  });

  it('should replace unsafe characters', () => {
    expect(sanitizeFilename('a<b>:c?.txt')).toEqual({ ok: true, value: 'a_b__c_.txt' });
  });

  it.each(['..', '.', '   ', '///', ''])('should reject %j', (name) => {
    const result = sanitizeFilename(name);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('Validation');
    }
  });

  it('should reject null bytes', () => {
    expect(sanitizeFilename('a\0b').ok).toBe(false);
  });
});

describe('sanitizeDownloadPath', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'kaggle-tools-validator-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it.each(['../../etc/passwd', '/etc/passwd', 'a/../../b', 'C:\\Windows\\system.ini', 'data\\..\\..\\x', '.', ''])(
    'should reject %j',
    async (candidate) => {
      const result = await sanitizeDownloadPath(root, candidate);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('Validation');
      }
    }
  );

  it('should resolve a relative path strictly under root', async () => {
    const result = await sanitizeDownloadPath(root, 'data/train.csv');

    expect(result).toEqual({ ok: true, value: path.join(path.resolve(root), 'data', 'train.csv') });
  });

  it('should reject a path leaving root through a symlink', async () => {
    const outside = await fs.mkdtemp(path.join(os.tmpdir(), 'kaggle-tools-outside-'));
    try {
      await fs.symlink(outside, path.join(root, 'escape'));

      const result = await sanitizeDownloadPath(root, 'escape/file.csv');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Download path must not leave the download root through a symbolic link');
      }
    } finally {
      await fs.rm(outside, { recursive: true, force: true });
    }
  });

  it('should accept a symlink that stays inside root', async () => {
    await fs.mkdir(path.join(root, 'real'));
    await fs.symlink(path.join(root, 'real'), path.join(root, 'alias'));

    const result = await sanitizeDownloadPath(root, 'alias/file.csv');
    expect(result.ok).toBe(true);
  });

  it('should not leak the root path in messages', async () => {
    const result = await sanitizeDownloadPath(root, '/etc/passwd');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Download path must be relative to the download root');
    }
  });
});
