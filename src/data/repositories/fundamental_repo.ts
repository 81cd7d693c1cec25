/**
 * Valuation snapshot repository (one row per symbol, date and source)
 */

import { getDatabase } from '../db';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('fundamental_repo');

export interface FundamentalSnapshot {
  stockCode: string;
  /** YYYY-MM-DD */
  asOf: string;
  source: string;
  price: number | null;
  per: number | null;
  pbr: number | null;
  eps: number | null;
  bps: number | null;
  marketCap: number | null;
  listedShares: number | null;
  high52w: number | null;
  low52w: number | null;
}

export function saveFundamentalSnapshots(
  runId: string,
  snapshots: FundamentalSnapshot[],
  now: string = new Date().toISOString()
): number {
  if (snapshots.length === 0) return 0;

  const db = getDatabase();
  const stmt = db.prepare(`
    INSERT INTO fundamental_snapshot (
      stock_code, as_of, source, price, per, pbr, eps, bps, market_cap, listed_shares,
      high_52w, low_52w, run_id, collected_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(stock_code, as_of, source) DO UPDATE SET
      price = excluded.price,
      per = excluded.per,
      pbr = excluded.pbr,
      eps = excluded.eps,
      bps = excluded.bps,
      market_cap = excluded.market_cap,
      listed_shares = excluded.listed_shares,
      high_52w = excluded.high_52w,
      low_52w = excluded.low_52w,
      run_id = excluded.run_id,
      collected_at = excluded.collected_at
  `);

  const upsertMany = db.transaction((records: FundamentalSnapshot[]) => {
    for (const f of records) {
      stmt.run(
        f.stockCode,
        f.asOf,
        f.source,
        f.price,
        f.per,
        f.pbr,
        f.eps,
        f.bps,
        f.marketCap,
        f.listedShares,
        f.high52w,
        f.low52w,
        runId,
        now
      );
    }
  });

  upsertMany(snapshots);
  logger.debug({ count: snapshots.length, symbol: snapshots[0]?.stockCode }, 'Saved fundamental snapshots');
  return snapshots.length;
}

export function getLatestFundamentalSnapshot(stockCode: string): FundamentalSnapshot | null {
  const db = getDatabase();
  const row = db
    .prepare(`
      SELECT
        stock_code as stockCode,
        as_of as asOf,
        source,
        price,
        per,
        pbr,
        eps,
        bps,
        market_cap as marketCap,
        listed_shares as listedShares,
        high_52w as high52w,
        low_52w as low52w
      FROM fundamental_snapshot
      WHERE stock_code = ?
      ORDER BY as_of DESC
      LIMIT 1
    `)
    .get(stockCode) as FundamentalSnapshot | undefined;
  return row ?? null;
}
