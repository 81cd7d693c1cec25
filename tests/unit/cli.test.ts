import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { EXIT_FAILED, EXIT_OK, EXIT_SETUP, EXIT_USAGE, runCli, type CliDeps } from '@/cli/program';
import { FIXED_NOW } from '../helpers/fixtures';

let dir: string;
let sqlitePath: string;
let stdout: string[];
let stderr: string[];

const KIS_ENV = { KIS_APP_KEY: 'test-app-key', KIS_APP_SECRET: 'test-app-secret' };

function json(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200 });
}

const kisFetch = vi.fn(async (input: string): Promise<Response> => {
  const { pathname } = new URL(input);
  if (pathname === '/oauth2/tokenP') {
    return json({ access_token: 'tok-1', token_type: 'Bearer', expires_in: 86400 });
  }
  if (pathname === '/uapi/domestic-stock/v1/quotations/inquire-daily-itemchartprice') {
    const candle = (date: string, close: string) => ({
      stck_bsop_date: date,
      stck_oprc: close,
      stck_hgpr: close,
      stck_lwpr: close,
      stck_clpr: close,
      acml_vol: '100',
      acml_tr_pbmn: '7000000',
    });
    return json({ rt_cd: '0', msg_cd: 'MCA00000', msg1: 'ok', output2: [candle('20240105', '71000'), candle('20240101', '70000')] });
  }
  return new Response('no route', { status: 404 });
});

function cli(argv: string[], env: NodeJS.ProcessEnv = {}): Promise<number> {
  const deps: CliDeps = {
    env,
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
    fetchImpl: kisFetch,
    now: () => FIXED_NOW,
  };
  return runCli(['--json', '--sqlite-path', sqlitePath, ...argv], deps);
}

function lastJson(): Record<string, unknown> {
  const text = stdout[stdout.length - 1];
  if (text === undefined) throw new Error('nothing printed');
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== 'object' || parsed === null) throw new Error('expected an object');
  return Object.fromEntries(Object.entries(parsed));
}

describe('stock-ingest CLI', () => {
  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cli-'));
    sqlitePath = join(dir, 'ingest.db');
    stdout = [];
    stderr = [];
    kisFetch.mockClear();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('exits with the setup code when credentials are missing', async () => {
    const code = await cli(['run', '--run-type', 'prices', '--symbol', '005930']);

    expect(code).toBe(EXIT_SETUP);
    expect(lastJson()).toEqual({
      ok: false,
      status: 'setup_required',
      error: {
        kind: 'MissingCredential',
        missing: ['KIS_APP_KEY', 'KIS_APP_SECRET'],
        message: 'Missing required credentials: KIS_APP_KEY, KIS_APP_SECRET',
      },
    });
    expect(kisFetch).not.toHaveBeenCalled();
  });

  it('records a dry run without credentials', async () => {
    const code = await cli(['run', '--symbol', '005930', '--dry-run']);

    expect(code).toBe(EXIT_OK);
    expect(lastJson()).toMatchObject({ ok: true, status: 'succeeded', dry_run: true, symbols_count: 1 });
    expect(kisFetch).not.toHaveBeenCalled();
  });

  it('ingests prices, then reports status and db-check for the run', async () => {
    const code = await cli(
      [
        '--kis-base-url',
        'https://kis.test',
        'run',
        '--run-type',
        'prices',
        '--symbol',
        '005930',
        '--as-of-from',
        '2024-01-01',
        '--as-of-to',
        '2024-01-05',
      ],
      KIS_ENV
    );
    expect(code).toBe(EXIT_OK);
    const summary = lastJson();
    expect(summary).toMatchObject({ status: 'succeeded', row_counts: { prices: 2 } });
    const runId = String(summary.run_id);
    expect(runId).toMatch(/^\d{8}T\d{6}-[0-9a-f]{12}$/);

    expect(await cli(['status', runId])).toBe(EXIT_OK);
    expect(lastJson()).toMatchObject({ run_id: runId, status: 'succeeded' });

    expect(await cli(['db-check', runId])).toBe(EXIT_OK);
    expect(lastJson()).toMatchObject({
      consistent: true,
      checks: [{ domain: 'prices', table: 'price_ohlcv', expected: 2, actual: 2, ok: true }],
    });
  });

  it('reports an unknown run id as not found', async () => {
    const code = await cli(['status', '20990101T000000-ffffffffffff']);

    expect(code).toBe(EXIT_FAILED);
    expect(lastJson()).toMatchObject({ ok: false, status: 'not_found', error: { kind: 'RunNotFound' } });
  });

  it('rejects malformed dates as invalid requests', async () => {
    const code = await cli(['run', '--symbol', '005930', '--as-of-from', '2024-13-45', '--dry-run']);

    expect(code).toBe(EXIT_USAGE);
    expect(lastJson()).toMatchObject({ status: 'invalid_request', error: { kind: 'InvalidWindow' } });
  });

  it('returns the usage code for arguments commander rejects', async () => {
    expect(await cli(['run', '--scope', 'nope'])).toBe(EXIT_USAGE);
    expect(stdout).toEqual([]);
  });

  it('runs a deprecated alias and notes the rename', async () => {
    const code = await cli(['ingest', '--symbol', '005930', '--dry-run']);

    expect(code).toBe(EXIT_OK);
    const notes = lastJson().notes;
    expect(Array.isArray(notes) ? notes[0] : undefined).toBe('deprecated command "ingest": use "run"');
  });

  it('drops the deprecation note when silenced', async () => {
    await cli(['ingest', '--symbol', '005930', '--dry-run'], { STOCK_INGEST_SILENCE_DEPRECATION: '1' });

    expect(lastJson().notes).not.toContain('deprecated command "ingest": use "run"');
  });
});
