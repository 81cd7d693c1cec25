/**
 * JSON summary shapes emitted by `run`, `status` and `db-check`.
 */

import type { IngestError } from '@/core/errors';
import type { Domain, DomainOutcome, OutcomeError, OutcomeStatus, RunRecord, RunStatus, RunType, Scope, SourceProfile } from './types';

export interface DomainSummary {
  status: OutcomeStatus;
  planned_items: number;
  processed_items: number;
  rows_read: number;
  rows_written: number;
  rows_skipped: number;
  window_from: string | null;
  window_to: string | null;
  errors: OutcomeError[];
}

export interface SummaryError {
  kind: string;
  message: string;
}

export interface IngestSummary {
  ok: boolean;
  run_id: string;
  status: RunStatus;
  command: string;
  run_types: RunType[];
  scope: Scope;
  source_profile: SourceProfile;
  dry_run: boolean;
  symbols_count: number;
  started_at: string;
  finished_at: string | null;
  domains: Partial<Record<Domain, DomainSummary>>;
  row_counts: Partial<Record<Domain, number>>;
  notes: string[];
  error: SummaryError | null;
}

export interface DbCheckEntry {
  domain: Domain;
  table: string;
  expected: number;
  actual: number;
  ok: boolean;
}

export interface DbCheckSummary extends IngestSummary {
  checks: DbCheckEntry[];
  consistent: boolean;
}

export type ErrorStatus = 'setup_required' | 'invalid_request' | 'not_found' | 'failed';

export interface ErrorPayload {
  ok: false;
  status: ErrorStatus;
  run_id?: string;
  error: SummaryError & Record<string, unknown>;
}

export function buildRunSummary(run: RunRecord, outcomes: DomainOutcome[]): IngestSummary {
  const domains: Partial<Record<Domain, DomainSummary>> = {};
  const rowCounts: Partial<Record<Domain, number>> = {};

  for (const outcome of outcomes) {
    domains[outcome.domain] = {
      status: outcome.status,
      planned_items: outcome.plannedItems,
      processed_items: outcome.processedItems,
      rows_read: outcome.rowsRead,
      rows_written: outcome.rowsWritten,
      rows_skipped: outcome.rowsSkipped,
      window_from: outcome.windowFrom,
      window_to: outcome.windowTo,
      errors: outcome.errors,
    };
    rowCounts[outcome.domain] = outcome.rowsWritten;
  }

  return {
    ok: run.status === 'succeeded',
    run_id: run.runId,
    status: run.status,
    command: run.command,
    run_types: run.runTypes,
    scope: run.scope,
    source_profile: run.sourceProfile,
    dry_run: run.dryRun,
    symbols_count: run.symbolsCount,
    started_at: run.startedAt,
    finished_at: run.finishedAt,
    domains,
    row_counts: rowCounts,
    notes: run.notes,
    error: run.errorKind ? { kind: run.errorKind, message: run.errorMessage ?? '' } : null,
  };
}

function errorStatus(error: IngestError): ErrorStatus {
  switch (error.kind) {
    case 'MissingCredential':
      return 'setup_required';
    case 'InvalidWindow':
    case 'EmptyScope':
    case 'InvalidRequest':
      return 'invalid_request';
    case 'RunNotFound':
      return 'not_found';
    default:
      return 'failed';
  }
}

export function buildErrorPayload(error: IngestError, runId?: string): ErrorPayload {
  return {
    ok: false,
    status: errorStatus(error),
    ...(runId ? { run_id: runId } : {}),
    error: { ...error.details, kind: error.kind, message: error.message },
  };
}
