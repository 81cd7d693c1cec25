/**
 * Corporate event feed (regulatory disclosures)
 */

import { getDatabase } from '../db';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('event_repo');

export interface EventRow {
  source: string;
  sourceEventId: string;
  stockCode: string | null;
  /** ISO timestamp */
  eventTime: string;
  eventType: string;
  severity: number;
  headline: string;
  summary: string | null;
}

export function saveEvents(runId: string, events: EventRow[], now: string = new Date().toISOString()): number {
  if (events.length === 0) return 0;

  const db = getDatabase();
  const stmt = db.prepare(`
    INSERT INTO event_feed (
      source, source_event_id, stock_code, event_time, event_type, severity, headline, summary, run_id, collected_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(source, source_event_id) DO UPDATE SET
      stock_code = excluded.stock_code,
      event_time = excluded.event_time,
      event_type = excluded.event_type,
      severity = excluded.severity,
      headline = excluded.headline,
      summary = excluded.summary,
      run_id = excluded.run_id,
      collected_at = excluded.collected_at
  `);

  const upsertMany = db.transaction((records: EventRow[]) => {
    for (const e of records) {
      stmt.run(
        e.source,
        e.sourceEventId,
        e.stockCode,
        e.eventTime,
        e.eventType,
        e.severity,
        e.headline,
        e.summary,
        runId,
        now
      );
    }
  });

  upsertMany(events);
  logger.debug({ count: events.length }, 'Saved events');
  return events.length;
}

export function getEventsForSymbol(stockCode: string, limit: number = 50): EventRow[] {
  const db = getDatabase();
  return db
    .prepare(`
      SELECT
        source,
        source_event_id as sourceEventId,
        stock_code as stockCode,
        event_time as eventTime,
        event_type as eventType,
        severity,
        headline,
        summary
      FROM event_feed
      WHERE stock_code = ?
      ORDER BY event_time DESC
      LIMIT ?
    `)
    .all(stockCode, limit) as EventRow[];
}
