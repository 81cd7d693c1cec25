/**
 * Read-only run queries: `status` and `db-check`.
 */

import { RunNotFoundError } from '@/core/errors';
import { DOMAIN_TABLES } from '@/data/repositories/check_repo';
import type { IngestStore } from '@/data/store';
import { buildRunSummary, type DbCheckEntry, type DbCheckSummary, type IngestSummary } from './summary';

export function getRunStatus(store: IngestStore, runId: string): IngestSummary {
  const run = store.getRun(runId);
  if (!run) {
    throw new RunNotFoundError(runId);
  }
  return buildRunSummary(run, store.listDomainOutcomes(runId));
}

/**
 * Compares each persisted outcome's rows_written with the rows in its
 * table still stamped with this run. Discrepancies are reported, never thrown.
 */
export function dbCheck(store: IngestStore, runId: string): DbCheckSummary {
  const run = store.getRun(runId);
  if (!run) {
    throw new RunNotFoundError(runId);
  }
  const outcomes = store.listDomainOutcomes(runId);

  const checks: DbCheckEntry[] = outcomes
    .filter((outcome) => outcome.status !== 'skipped')
    .map((outcome) => {
      const actual = store.countRowsForRun(outcome.domain, runId);
      return {
        domain: outcome.domain,
        table: DOMAIN_TABLES[outcome.domain],
        expected: outcome.rowsWritten,
        actual,
        ok: actual === outcome.rowsWritten,
      };
    });

  return {
    ...buildRunSummary(run, outcomes),
    checks,
    consistent: checks.every((check) => check.ok),
  };
}
