import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadEnvFiles } from '@/cli/env_files';
import { InvalidRequestError } from '@/core/errors';

let dir: string;

describe('loadEnvFiles', () => {
  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'env-'));
    writeFileSync(join(dir, '.env.local'), 'KIS_APP_KEY=test-app-key\n');
    writeFileSync(join(dir, '.env'), 'KIS_APP_KEY=test-shadowed\nDART_API_KEY=test-dart-key\n');
    writeFileSync(join(dir, 'creds.env'), 'KIS_APP_SECRET=test-app-secret\n');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads .env.local before .env', () => {
    const env: NodeJS.ProcessEnv = {};
    const files = loadEnvFiles(['run'], dir, env);

    expect(files).toEqual([join(dir, '.env.local'), join(dir, '.env')]);
    expect(env).toEqual({ KIS_APP_KEY: 'test-app-key', DART_API_KEY: 'test-dart-key' });
  });

  it('uses only the file named by --env-file', () => {
    const env: NodeJS.ProcessEnv = {};
    expect(loadEnvFiles(['--env-file', 'creds.env', 'run'], dir, env)).toEqual([join(dir, 'creds.env')]);
    expect(env).toEqual({ KIS_APP_SECRET: 'test-app-secret' });

    const inline: NodeJS.ProcessEnv = {};
    loadEnvFiles(['--env-file=creds.env'], dir, inline);
    expect(inline).toEqual({ KIS_APP_SECRET: 'test-app-secret' });
  });

  it('rejects an --env-file that does not exist', () => {
    const env: NodeJS.ProcessEnv = {};
    const run = () => loadEnvFiles(['--env-file', 'missing.env', 'run'], dir, env);

    expect(run).toThrow(InvalidRequestError);
    expect(run).toThrow(`env file not found: ${join(dir, 'missing.env')}`);
    expect(env).toEqual({});
  });

  it('tolerates missing default env files', () => {
    const empty = mkdtempSync(join(tmpdir(), 'env-empty-'));
    const env: NodeJS.ProcessEnv = {};
    try {
      expect(loadEnvFiles([], empty, env)).toEqual([join(empty, '.env.local'), join(empty, '.env')]);
      expect(env).toEqual({});
    } finally {
      rmSync(empty, { recursive: true, force: true });
    }
  });

  it('keeps values already present in the environment', () => {
    const env: NodeJS.ProcessEnv = { DART_API_KEY: 'test-from-shell' };
    loadEnvFiles([], dir, env);
    expect(env.DART_API_KEY).toBe('test-from-shell');
  });
});
