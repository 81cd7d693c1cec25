/**
 * Margin / loan-eligibility policy per symbol and date
 */

import { getDatabase } from '../db';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('margin_repo');

export interface MarginRow {
  stockCode: string;
  /** YYYY-MM-DD */
  asOf: string;
  marginRatePct: number | null;
  isFullMargin: boolean;
  orderableCash: number | null;
  maxBuyQty: number | null;
  collectionStatus: 'collected' | 'rate_unavailable';
  sourceNote: string | null;
}

interface MarginDbRow extends Omit<MarginRow, 'isFullMargin'> {
  isFullMargin: number;
}

export function saveMargins(runId: string, rows: MarginRow[], now: string = new Date().toISOString()): number {
  if (rows.length === 0) return 0;

  const db = getDatabase();
  const stmt = db.prepare(`
    INSERT INTO margin_policy (
      stock_code, as_of, margin_rate_pct, is_full_margin, orderable_cash, max_buy_qty,
      collection_status, source_note, run_id, collected_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(stock_code, as_of) DO UPDATE SET
      margin_rate_pct = excluded.margin_rate_pct,
      is_full_margin = excluded.is_full_margin,
      orderable_cash = excluded.orderable_cash,
      max_buy_qty = excluded.max_buy_qty,
      collection_status = excluded.collection_status,
      source_note = excluded.source_note,
      run_id = excluded.run_id,
      collected_at = excluded.collected_at
  `);

  const upsertMany = db.transaction((records: MarginRow[]) => {
    for (const m of records) {
      stmt.run(
        m.stockCode,
        m.asOf,
        m.marginRatePct,
        m.isFullMargin ? 1 : 0,
        m.orderableCash,
        m.maxBuyQty,
        m.collectionStatus,
        m.sourceNote,
        runId,
        now
      );
    }
  });

  upsertMany(rows);
  logger.debug({ count: rows.length }, 'Saved margin policies');
  return rows.length;
}

export function getMargin(stockCode: string, asOf: string): MarginRow | null {
  const db = getDatabase();
  const row = db
    .prepare(`
      SELECT
        stock_code as stockCode,
        as_of as asOf,
        margin_rate_pct as marginRatePct,
        is_full_margin as isFullMargin,
        orderable_cash as orderableCash,
        max_buy_qty as maxBuyQty,
        collection_status as collectionStatus,
        source_note as sourceNote
      FROM margin_policy
      WHERE stock_code = ? AND as_of = ?
    `)
    .get(stockCode, asOf) as MarginDbRow | undefined;
  return row ? { ...row, isFullMargin: row.isFullMargin === 1 } : null;
}
