import { getDatabase } from '@/data/db';
import type { Domain } from '@/ingest/types';

export const DOMAIN_TABLES: Record<Domain, string> = {
  symbols: 'symbol_universe',
  prices: 'price_ohlcv',
  fundamental: 'fundamental_snapshot',
  financials: 'financial_statement',
  events: 'event_feed',
  margins: 'margin_policy',
};

/** Rows whose last writer was the given run. */
export function countDomainRowsForRun(domain: Domain, runId: string): number {
  const db = getDatabase();
  const row = db
    .prepare(`SELECT COUNT(*) as count FROM ${DOMAIN_TABLES[domain]} WHERE run_id = ?`)
    .get(runId) as { count: number } | undefined;
  return row?.count ?? 0;
}
