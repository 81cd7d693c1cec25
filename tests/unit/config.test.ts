import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadConfig, withOverrides } from '@/core/config';
import { InvalidRequestError } from '@/core/errors';

let tempDir: string;

function writeConfig(contents: string): string {
  const path = join(tempDir, 'ingest.json');
  writeFileSync(path, contents);
  return path;
}

describe('config loader', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'config-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('fills defaults for keys the file leaves out', () => {
    const config = loadConfig({ STOCK_INGEST_CONFIG: writeConfig('{"kisMaxPricePages": 5}') });

    expect(config.kisMaxPricePages).toBe(5);
    expect(config.timeoutSeconds).toBe(20);
    expect(config.concurrency).toBe(1);
    expect(config.rateLimits.dart).toEqual({ requestsPerSecond: 10, maxConcurrent: 2 });
    expect(config.retry).toEqual({ maxRetries: 3, initialBackoffMs: 500 });
    expect(config.sqlitePath).toBe(join(process.cwd(), 'data/stock_ingest.db'));
  });

  it('applies env overrides on top of the file', () => {
    const config = loadConfig({
      STOCK_INGEST_CONFIG: writeConfig('{}'),
      STOCK_INGEST_SQLITE_PATH: '/var/tmp/ingest.db',
      KIS_BASE_URL: 'https://kis.test/',
      STOCK_INGEST_CONCURRENCY: '4',
    });

    expect(config.sqlitePath).toBe('/var/tmp/ingest.db');
    expect(config.kisBaseUrl).toBe('https://kis.test');
    expect(config.concurrency).toBe(4);
  });

  it('ignores a non-numeric concurrency override', () => {
    const config = loadConfig({ STOCK_INGEST_CONFIG: writeConfig('{}'), STOCK_INGEST_CONCURRENCY: 'many' });
    expect(config.concurrency).toBe(1);
  });

  it('rejects invalid values with the offending path', () => {
    const path = writeConfig('{"rateLimits": {"kis": {"requestsPerSecond": -1, "maxConcurrent": 1}}}');
    expect(() => loadConfig({ STOCK_INGEST_CONFIG: path })).toThrow(InvalidRequestError);
    expect(() => loadConfig({ STOCK_INGEST_CONFIG: path })).toThrow(/rateLimits\.kis\.requestsPerSecond/);
  });

  it('rejects a file that is not JSON', () => {
    const path = writeConfig('{ nope');
    expect(() => loadConfig({ STOCK_INGEST_CONFIG: path })).toThrow(/is not valid JSON/);
  });

  it('resolves relative override paths against the project root', () => {
    const base = loadConfig({ STOCK_INGEST_CONFIG: writeConfig('{}') });
    const config = withOverrides(base, { sqlitePath: 'tmp/other.db', dartBaseUrl: 'https://dart.test//' });

    expect(config.sqlitePath).toBe(join(base.projectRoot, 'tmp/other.db'));
    expect(config.dartBaseUrl).toBe('https://dart.test');
    expect(config.kisMaxPricePages).toBe(base.kisMaxPricePages);
  });
});
