/**
 * Price repository for OHLCV candles
 */

import { getDatabase } from '../db';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('price_repo');

export interface PriceRow {
  stockCode: string;
  timeframe: 'D' | 'W' | 'M' | 'Y';
  /** YYYY-MM-DD */
  candleAt: string;
  source: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  tradeValue: number | null;
  asOf: string | null;
}

export function savePrices(runId: string, prices: PriceRow[], now: string = new Date().toISOString()): number {
  if (prices.length === 0) return 0;

  const db = getDatabase();
  const stmt = db.prepare(`
    INSERT INTO price_ohlcv (
      stock_code, timeframe, candle_at, source, open_price, high_price, low_price, close_price,
      volume, trade_value, as_of, run_id, collected_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(stock_code, timeframe, candle_at, source) DO UPDATE SET
      open_price = excluded.open_price,
      high_price = excluded.high_price,
      low_price = excluded.low_price,
      close_price = excluded.close_price,
      volume = excluded.volume,
      trade_value = excluded.trade_value,
      as_of = excluded.as_of,
      run_id = excluded.run_id,
      collected_at = excluded.collected_at
  `);

  const insertMany = db.transaction((records: PriceRow[]) => {
    for (const p of records) {
      stmt.run(
        p.stockCode,
        p.timeframe,
        p.candleAt,
        p.source,
        p.open,
        p.high,
        p.low,
        p.close,
        p.volume,
        p.tradeValue,
        p.asOf,
        runId,
        now
      );
    }
  });

  insertMany(prices);
  logger.debug({ count: prices.length, symbol: prices[0]?.stockCode }, 'Saved prices');

  return prices.length;
}

export function getPrices(
  stockCode: string,
  timeframe: PriceRow['timeframe'] = 'D',
  fromDate?: string,
  toDate?: string
): PriceRow[] {
  const db = getDatabase();

  let sql = `
    SELECT
      stock_code as stockCode,
      timeframe,
      candle_at as candleAt,
      source,
      open_price as open,
      high_price as high,
      low_price as low,
      close_price as close,
      volume,
      trade_value as tradeValue,
      as_of as asOf
    FROM price_ohlcv
    WHERE stock_code = ? AND timeframe = ?
  `;

  const params: string[] = [stockCode, timeframe];

  if (fromDate) {
    sql += ' AND candle_at >= ?';
    params.push(fromDate);
  }

  if (toDate) {
    sql += ' AND candle_at <= ?';
    params.push(toDate);
  }

  sql += ' ORDER BY candle_at ASC';

  return db.prepare(sql).all(...params) as PriceRow[];
}
