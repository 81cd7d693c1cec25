/**
 * Persistence facade used by the orchestrator and the status queries.
 * Write failures surface as PersistenceError so a single item can fail
 * without taking down its domain.
 */

import { PersistenceError, errorMessage } from '@/core/errors';
import { initializeDatabase } from '@/data/db';
import { countDomainRowsForRun, DOMAIN_TABLES } from '@/data/repositories/check_repo';
import { saveEvents } from '@/data/repositories/event_repo';
import { saveFinancialStatements } from '@/data/repositories/financials_repo';
import { saveFundamentalSnapshots } from '@/data/repositories/fundamental_repo';
import { saveMargins } from '@/data/repositories/margin_repo';
import { insertDomainOutcome, listDomainOutcomes } from '@/data/repositories/outcome_repo';
import { savePrices } from '@/data/repositories/price_repo';
import { finalizeRun, getRun, insertRun } from '@/data/repositories/run_repo';
import { listActiveSymbols, saveSymbols, type SymbolRecord } from '@/data/repositories/symbol_repo';
import type { Domain, DomainBatch, DomainOutcome, RunFinalization, RunRecord } from '@/ingest/types';

export interface IngestStore {
  insertRun(run: RunRecord): void;
  finalizeRun(final: RunFinalization): void;
  getRun(runId: string): RunRecord | null;
  insertDomainOutcome(outcome: DomainOutcome): void;
  listDomainOutcomes(runId: string): DomainOutcome[];
  /** Upserts one work item's rows in a single transaction; returns rows written. */
  saveBatch(runId: string, batch: DomainBatch): number;
  listActiveSymbols(): SymbolRecord[];
  countRowsForRun(domain: Domain, runId: string): number;
}

function guarded<T>(table: string, action: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof PersistenceError) throw error;
    throw new PersistenceError(`${action} failed on ${table}: ${errorMessage(error)}`, table, error);
  }
}

function writeBatch(runId: string, batch: DomainBatch, now: string): number {
  switch (batch.domain) {
    case 'symbols':
      return saveSymbols(runId, batch.rows, now);
    case 'prices':
      return savePrices(runId, batch.rows, now);
    case 'fundamental':
      return saveFundamentalSnapshots(runId, batch.rows, now);
    case 'financials':
      return saveFinancialStatements(runId, batch.rows, now);
    case 'events':
      return saveEvents(runId, batch.rows, now);
    case 'margins':
      return saveMargins(runId, batch.rows, now);
  }
}

/** Opens (and migrates) the SQLite file, then binds every repository to it. */
export function createSqliteStore(sqlitePath?: string): IngestStore {
  if (sqlitePath) {
    initializeDatabase(sqlitePath);
  } else {
    initializeDatabase();
  }

  return {
    insertRun: (run) => guarded('ingest_runs', 'insert', () => insertRun(run)),
    finalizeRun: (final) => guarded('ingest_runs', 'update', () => finalizeRun(final)),
    getRun: (runId) => guarded('ingest_runs', 'select', () => getRun(runId)),
    insertDomainOutcome: (outcome) =>
      guarded('domain_outcomes', 'insert', () => insertDomainOutcome(outcome)),
    listDomainOutcomes: (runId) => guarded('domain_outcomes', 'select', () => listDomainOutcomes(runId)),
    saveBatch: (runId, batch) =>
      guarded(DOMAIN_TABLES[batch.domain], 'upsert', () => writeBatch(runId, batch, new Date().toISOString())),
    listActiveSymbols: () => guarded('symbol_universe', 'select', () => listActiveSymbols()),
    countRowsForRun: (domain, runId) =>
      guarded(DOMAIN_TABLES[domain], 'count', () => countDomainRowsForRun(domain, runId)),
  };
}
