import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Credentials } from '@/core/env';
import { closeDatabase } from '@/data/db';
import { createSqliteStore } from '@/data/store';
import type { IngestStore } from '@/data/store';
import type { DomainWindow, RunRequest, WorkItem } from '@/ingest/types';

export const TEST_CREDENTIALS: Credentials = {
  kisAppKey: 'test-app-key',
  kisAppSecret: 'test-app-secret',
  kisAccountNo: '1234567801',
  dartApiKey: 'test-dart-key',
};

export function makeRequest(overrides: Partial<RunRequest> = {}): RunRequest {
  return {
    runTypes: ['all'],
    scope: 'single',
    symbols: ['005930'],
    sourceProfile: 'all',
    timeframes: ['D'],
    asOf: null,
    asOfFrom: null,
    asOfTo: null,
    pricesWindow: 'fast',
    pricesLookbackDays: null,
    pricesBackfill: false,
    limitSymbols: null,
    dryRun: false,
    notes: [],
    ...overrides,
  };
}

export function makeItem(overrides: Partial<WorkItem> = {}, window: Partial<DomainWindow> = {}): WorkItem {
  return {
    domain: 'prices',
    symbol: '005930',
    meta: null,
    ...overrides,
    window: { from: '2024-01-01', to: '2024-01-31', backfill: false, timeframes: ['D'], ...window },
  };
}

export interface TempStore {
  dir: string;
  path: string;
  store: IngestStore;
  cleanup(): void;
}

/** A migrated SQLite store in a fresh temp directory. */
export function createTempStore(prefix = 'stock-ingest-'): TempStore {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  const path = join(dir, 'ingest.db');
  const store = createSqliteStore(path);
  return {
    dir,
    path,
    store,
    cleanup() {
      closeDatabase();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

/** Deterministic run ids that satisfy the summary schema pattern. */
export function runIdSequence(): () => string {
  let seq = 0;
  return () => `20240131T120000-${String(++seq).padStart(12, '0')}`;
}

export const FIXED_NOW = new Date('2024-01-31T12:00:00Z');
