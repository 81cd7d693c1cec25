import { z } from 'zod';
import { getDatabase } from '@/data/db';
import { DOMAIN_ORDER, OUTCOME_STATUSES } from '@/ingest/types';
import type { DomainOutcome, OutcomeError } from '@/ingest/types';

interface DomainOutcomeRow {
  run_id: string;
  domain: string;
  status: string;
  planned_items: number;
  processed_items: number;
  rows_read: number;
  rows_written: number;
  rows_skipped: number;
  errors_json: string;
  window_from: string | null;
  window_to: string | null;
  started_at: string;
  finished_at: string;
}

const outcomeErrorSchema = z.object({
  provider: z.enum(['kis', 'dart', 'store']),
  symbol: z.string(),
  kind: z.enum([
    'auth',
    'rate_limit',
    'not_found',
    'transport',
    'timeout',
    'api',
    'invalid_response',
    'persistence',
    'internal',
  ]),
  message: z.string(),
});

const domainSchema = z.enum(DOMAIN_ORDER);
const outcomeStatusSchema = z.enum(OUTCOME_STATUSES);

function parseErrors(json: string): OutcomeError[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return [];
  }
  const parsed = z.array(outcomeErrorSchema).safeParse(raw);
  return parsed.success ? parsed.data : [];
}

function normalizeRow(row: DomainOutcomeRow): DomainOutcome {
  return {
    runId: row.run_id,
    domain: domainSchema.parse(row.domain),
    status: outcomeStatusSchema.parse(row.status),
    plannedItems: row.planned_items,
    processedItems: row.processed_items,
    rowsRead: row.rows_read,
    rowsWritten: row.rows_written,
    rowsSkipped: row.rows_skipped,
    errors: parseErrors(row.errors_json),
    windowFrom: row.window_from,
    windowTo: row.window_to,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}

/** Outcomes are written once per (run, domain) and never updated. */
export function insertDomainOutcome(outcome: DomainOutcome): void {
  const db = getDatabase();
  db.prepare(`
    INSERT INTO domain_outcomes (
      run_id, domain, status, planned_items, processed_items, rows_read, rows_written,
      rows_skipped, errors_json, window_from, window_to, started_at, finished_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    outcome.runId,
    outcome.domain,
    outcome.status,
    outcome.plannedItems,
    outcome.processedItems,
    outcome.rowsRead,
    outcome.rowsWritten,
    outcome.rowsSkipped,
    JSON.stringify(outcome.errors),
    outcome.windowFrom,
    outcome.windowTo,
    outcome.startedAt,
    outcome.finishedAt
  );
}

export function listDomainOutcomes(runId: string): DomainOutcome[] {
  const db = getDatabase();
  const rows = db
    .prepare('SELECT * FROM domain_outcomes WHERE run_id = ? ORDER BY started_at, rowid')
    .all(runId) as DomainOutcomeRow[];
  const order = (domain: string) => DOMAIN_ORDER.findIndex((d) => d === domain);
  return rows.map(normalizeRow).sort((a, b) => order(a.domain) - order(b.domain));
}
