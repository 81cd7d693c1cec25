/**
 * Financial statement line items
 */

import { getDatabase } from '../db';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('financials_repo');

export interface FinancialStatementRow {
  stockCode: string;
  reportType: string;
  reportTerm: 'annual' | 'quarterly';
  /** YYYYMM of the statement period */
  periodYyyymm: string;
  itemKey: string;
  source: string;
  itemValue: number;
  currency: string | null;
}

export function saveFinancialStatements(
  runId: string,
  rows: FinancialStatementRow[],
  now: string = new Date().toISOString()
): number {
  if (rows.length === 0) return 0;

  const db = getDatabase();
  const stmt = db.prepare(`
    INSERT INTO financial_statement (
      stock_code, report_type, report_term, period_yyyymm, item_key, source, item_value, currency, run_id, collected_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(stock_code, report_type, report_term, period_yyyymm, item_key, source) DO UPDATE SET
      item_value = excluded.item_value,
      currency = excluded.currency,
      run_id = excluded.run_id,
      collected_at = excluded.collected_at
  `);

  const upsertMany = db.transaction((records: FinancialStatementRow[]) => {
    for (const r of records) {
      stmt.run(
        r.stockCode,
        r.reportType,
        r.reportTerm,
        r.periodYyyymm,
        r.itemKey,
        r.source,
        r.itemValue,
        r.currency,
        runId,
        now
      );
    }
  });

  upsertMany(rows);
  logger.debug({ count: rows.length, symbol: rows[0]?.stockCode }, 'Saved financial statement items');
  return rows.length;
}

export function getStatementItems(
  stockCode: string,
  reportTerm: FinancialStatementRow['reportTerm'],
  periodYyyymm: string
): FinancialStatementRow[] {
  const db = getDatabase();
  return db
    .prepare(`
      SELECT
        stock_code as stockCode,
        report_type as reportType,
        report_term as reportTerm,
        period_yyyymm as periodYyyymm,
        item_key as itemKey,
        source,
        item_value as itemValue,
        currency
      FROM financial_statement
      WHERE stock_code = ? AND report_term = ? AND period_yyyymm = ?
      ORDER BY report_type, item_key
    `)
    .all(stockCode, reportTerm, periodYyyymm) as FinancialStatementRow[];
}
