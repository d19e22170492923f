import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { MissingCredentialsError } from '@kaggle-tools/core';
import { createCredentialsProvider, defaultConfigDir, loadCredentials } from '../credentials.js';

describe('loadCredentials', () => {
  let configDir: string;

  beforeEach(async () => {
    configDir = await fs.mkdtemp(path.join(os.tmpdir(), 'kaggle-tools-credentials-'));
  });

  afterEach(async () => {
    await fs.rm(configDir, { recursive: true, force: true });
  });

  it('should prefer environment variables', async () => {
    await fs.writeFile(path.join(configDir, 'kaggle.json'), JSON.stringify({ username: 'file-user', key: 'file-key' }));

    const credentials = await loadCredentials({
      env: { KAGGLE_USERNAME: 'env-user', KAGGLE_KEY: 'test-secret' },
      configDir,
    });

    expect(credentials).toEqual({ username: 'env-user', key: 'test-secret' });
  });

  it('should read kaggle.json when the environment is incomplete', async () => {
    await fs.writeFile(path.join(configDir, 'kaggle.json'), JSON.stringify({ username: 'file-user', key: 'test-secret' }));

    const credentials = await loadCredentials({ env: { KAGGLE_USERNAME: 'env-user' }, configDir });

    expect(credentials).toEqual({ username: 'file-user', key: 'test-secret' });
  });

  it('should honour KAGGLE_CONFIG_DIR', async () => {
    await fs.writeFile(path.join(configDir, 'kaggle.json'), JSON.stringify({ username: 'dir-user', key: 'test-secret' }));

    const credentials = await loadCredentials({ env: { KAGGLE_CONFIG_DIR: configDir } });

    expect(credentials).toEqual({ username: 'dir-user', key: 'test-secret' });
  });

  it('should return undefined when nothing is configured', async () => {
    await expect(loadCredentials({ env: {}, configDir })).resolves.toBeUndefined();
  });

  it('should reject a malformed kaggle.json', async () => {
    await fs.writeFile(path.join(configDir, 'kaggle.json'), '{ not json');

    await expect(loadCredentials({ env: {}, configDir })).rejects.toThrow(MissingCredentialsError);
  });

  it('should reject a kaggle.json without a key', async () => {
    await fs.writeFile(path.join(configDir, 'kaggle.json'), JSON.stringify({ username: 'file-user' }));

    await expect(loadCredentials({ env: {}, configDir })).rejects.toThrow('kaggle.json is invalid: key:');
  });
});

describe('defaultConfigDir', () => {
  it('should fall back to ~/.kaggle', () => {
    expect(defaultConfigDir({})).toBe(path.join(os.homedir(), '.kaggle'));
  });
});

describe('createCredentialsProvider', () => {
  it('should load once and reuse the result', async () => {
    const env: NodeJS.ProcessEnv = { KAGGLE_USERNAME: 'env-user', KAGGLE_KEY: 'test-secret' };
    const provider = createCredentialsProvider({ env });

    const first = await provider();
    env.KAGGLE_USERNAME = 'changed';
    const second = await provider();

    expect(first).toEqual({ username: 'env-user', key: 'test-secret' });
    expect(second).toBe(first);
  });
});
