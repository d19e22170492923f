/**
 * Kaggle API credential discovery
 *
 * Lookup order:
 * 1. KAGGLE_USERNAME + KAGGLE_KEY environment variables
 * 2. kaggle.json in KAGGLE_CONFIG_DIR, or ~/.kaggle
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { formatZodError, MissingCredentialsError } from '@kaggle-tools/core';

export const CREDENTIALS_FILENAME = 'kaggle.json';

export interface KaggleCredentials {
  username: string;
  key: string;
}

export type CredentialsProvider = () => Promise<KaggleCredentials | undefined>;

export interface LoadCredentialsOptions {
  env?: NodeJS.ProcessEnv;
  /** Directory holding kaggle.json; overrides KAGGLE_CONFIG_DIR */
  configDir?: string;
}

const credentialsFileSchema = z.object({
  username: z.string().trim().min(1, 'username is required'),
  key: z.string().trim().min(1, 'key is required'),
});

export function defaultConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.KAGGLE_CONFIG_DIR || path.join(os.homedir(), '.kaggle');
}

/**
 * Resolve credentials, or `undefined` when none are configured.
 * A kaggle.json that exists but cannot be used is an error.
 */
export async function loadCredentials(options: LoadCredentialsOptions = {}): Promise<KaggleCredentials | undefined> {
  const env = options.env ?? process.env;
  const username = env.KAGGLE_USERNAME?.trim();
  const key = env.KAGGLE_KEY?.trim();
  if (username && key) {
    return { username, key };
  }

  const file = path.join(options.configDir ?? defaultConfigDir(env), CREDENTIALS_FILENAME);
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      return undefined;
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    throw new MissingCredentialsError(`${CREDENTIALS_FILENAME} is not valid JSON`);
  }
  const parsed = credentialsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new MissingCredentialsError(`${CREDENTIALS_FILENAME} is invalid: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Provider that loads credentials once and reuses the result
 */
export function createCredentialsProvider(options: LoadCredentialsOptions = {}): CredentialsProvider {
  let pending: Promise<KaggleCredentials | undefined> | undefined;
  return () => {
    if (!pending) {
      pending = loadCredentials(options);
      // A failed load is retried on the next call
      void pending.catch(() => {
        pending = undefined;
      });
    }
    return pending;
  };
}
