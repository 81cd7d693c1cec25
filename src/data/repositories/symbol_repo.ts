/**
 * Symbol universe repository (one row per listed stock code)
 */

import { getDatabase } from '../db';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('symbol_repo');

export interface SymbolRecord {
  stockCode: string;
  name: string | null;
  market: string | null;
  dartCorpCode: string | null;
  /** YYYY-MM-DD */
  listedDate: string | null;
}

const SELECT_COLUMNS = `
  stock_code as stockCode,
  name,
  market,
  dart_corp_code as dartCorpCode,
  listed_date as listedDate
`;

export function saveSymbols(runId: string, symbols: SymbolRecord[], now: string = new Date().toISOString()): number {
  if (symbols.length === 0) return 0;

  const db = getDatabase();
  const stmt = db.prepare(`
    INSERT INTO symbol_universe (stock_code, name, market, dart_corp_code, listed_date, is_active, is_delisted, run_id, updated_at)
    VALUES (?, ?, ?, ?, ?, 1, 0, ?, ?)
    ON CONFLICT(stock_code) DO UPDATE SET
      name = COALESCE(excluded.name, symbol_universe.name),
      market = COALESCE(excluded.market, symbol_universe.market),
      dart_corp_code = COALESCE(excluded.dart_corp_code, symbol_universe.dart_corp_code),
      listed_date = COALESCE(excluded.listed_date, symbol_universe.listed_date),
      run_id = excluded.run_id,
      updated_at = excluded.updated_at
  `);

  const upsertMany = db.transaction((records: SymbolRecord[]) => {
    for (const s of records) {
      stmt.run(s.stockCode, s.name, s.market, s.dartCorpCode, s.listedDate, runId, now);
    }
  });

  upsertMany(symbols);
  logger.debug({ count: symbols.length, runId }, 'Saved symbols');

  return symbols.length;
}

export function listActiveSymbols(): SymbolRecord[] {
  const db = getDatabase();
  const stmt = db.prepare(`
    SELECT ${SELECT_COLUMNS}
    FROM symbol_universe
    WHERE is_active = 1 AND is_delisted = 0
    ORDER BY stock_code ASC
  `);
  return stmt.all() as SymbolRecord[];
}

export function getSymbol(stockCode: string): SymbolRecord | null {
  const db = getDatabase();
  const row = db
    .prepare(`SELECT ${SELECT_COLUMNS} FROM symbol_universe WHERE stock_code = ?`)
    .get(stockCode) as SymbolRecord | undefined;
  return row ?? null;
}
