/**
 * Run ledger: one row per invocation, inserted at start and finalised at the end.
 */

import { z } from 'zod';
import { getDatabase } from '@/data/db';
import { PRICES_WINDOWS, RUN_STATUSES, RUN_TYPES, SCOPES, SOURCE_PROFILES, TIMEFRAMES } from '@/ingest/types';
import type { RunFinalization, RunRecord } from '@/ingest/types';

interface IngestRunRow {
  run_id: string;
  command: string;
  run_types: string;
  scope: string;
  source_profile: string;
  symbols_json: string;
  timeframes_json: string;
  prices_window: string | null;
  prices_lookback_days: number | null;
  prices_backfill: number;
  as_of: string | null;
  as_of_from: string | null;
  as_of_to: string | null;
  limit_symbols: number | null;
  dry_run: number;
  status: string;
  symbols_count: number;
  started_at: string;
  finished_at: string | null;
  notes_json: string;
  error_kind: string | null;
  error_message: string | null;
}

const storedRunSchema = z.object({
  runTypes: z.array(z.enum(RUN_TYPES)),
  scope: z.enum(SCOPES),
  sourceProfile: z.enum(SOURCE_PROFILES),
  symbols: z.array(z.string()),
  timeframes: z.array(z.enum(TIMEFRAMES)),
  pricesWindow: z.enum(PRICES_WINDOWS).catch('fast'),
  status: z.enum(RUN_STATUSES),
  notes: z.array(z.string()),
});

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function normalizeRow(row: IngestRunRow): RunRecord {
  const stored = storedRunSchema.parse({
    runTypes: parseJson(row.run_types),
    scope: row.scope,
    sourceProfile: row.source_profile,
    symbols: parseJson(row.symbols_json),
    timeframes: parseJson(row.timeframes_json),
    pricesWindow: row.prices_window,
    status: row.status,
    notes: parseJson(row.notes_json),
  });

  return {
    ...stored,
    runId: row.run_id,
    command: row.command,
    pricesLookbackDays: row.prices_lookback_days,
    pricesBackfill: row.prices_backfill === 1,
    asOf: row.as_of,
    asOfFrom: row.as_of_from,
    asOfTo: row.as_of_to,
    limitSymbols: row.limit_symbols,
    dryRun: row.dry_run === 1,
    symbolsCount: row.symbols_count,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    errorKind: row.error_kind,
    errorMessage: row.error_message,
  };
}

export function insertRun(run: RunRecord): void {
  const db = getDatabase();
  db.prepare(`
    INSERT INTO ingest_runs (
      run_id, command, run_types, scope, source_profile, symbols_json, timeframes_json,
      prices_window, prices_lookback_days, prices_backfill, as_of, as_of_from, as_of_to,
      limit_symbols, dry_run, status, symbols_count, started_at, finished_at, notes_json,
      error_kind, error_message
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    run.runId,
    run.command,
    JSON.stringify(run.runTypes),
    run.scope,
    run.sourceProfile,
    JSON.stringify(run.symbols),
    JSON.stringify(run.timeframes),
    run.pricesWindow,
    run.pricesLookbackDays,
    run.pricesBackfill ? 1 : 0,
    run.asOf,
    run.asOfFrom,
    run.asOfTo,
    run.limitSymbols,
    run.dryRun ? 1 : 0,
    run.status,
    run.symbolsCount,
    run.startedAt,
    run.finishedAt,
    JSON.stringify(run.notes),
    run.errorKind,
    run.errorMessage
  );
}

export function finalizeRun(final: RunFinalization): void {
  const db = getDatabase();
  db.prepare(`
    UPDATE ingest_runs
    SET
      status = ?,
      symbols_count = ?,
      symbols_json = ?,
      finished_at = ?,
      notes_json = ?,
      error_kind = ?,
      error_message = ?
    WHERE run_id = ?
  `).run(
    final.status,
    final.symbolsCount,
    JSON.stringify(final.symbols),
    final.finishedAt,
    JSON.stringify(final.notes),
    final.errorKind,
    final.errorMessage,
    final.runId
  );
}

export function getRun(runId: string): RunRecord | null {
  const db = getDatabase();
  const row = db.prepare('SELECT * FROM ingest_runs WHERE run_id = ?').get(runId) as IngestRunRow | undefined;
  return row ? normalizeRow(row) : null;
}
