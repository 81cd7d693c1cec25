/**
 * Prices: KIS daily item chart, paged backwards from the window end.
 */

import { ProviderError } from '@/core/errors';
import { shiftDays, toCompactDate, toIsoDate } from '@/core/time';
import type { PriceRow } from '@/data/repositories/price_repo';
import type { KisApi, KisCandle } from '@/providers/kis/types';
import { parseNumeric } from '@/utils/numbers';
import type { FetchResult, Timeframe, WorkItem } from '../types';
import { requireKis, type DomainFetcher, type FetchContext } from './types';

interface TimeframeResult {
  rows: PriceRow[];
  read: number;
  skipped: number;
  notes: string[];
}

export function mapCandle(symbol: string, timeframe: Timeframe, candle: KisCandle, asOf: string | null): PriceRow | null {
  const raw = candle.stck_bsop_date.trim();
  const candleAt = /^\d{8}$/.test(raw) ? toIsoDate(raw) : null;
  if (!candleAt) return null;
  return {
    stockCode: symbol,
    timeframe,
    candleAt,
    source: 'kis',
    open: parseNumeric(candle.stck_oprc) ?? 0,
    high: parseNumeric(candle.stck_hgpr) ?? 0,
    low: parseNumeric(candle.stck_lwpr) ?? 0,
    close: parseNumeric(candle.stck_clpr) ?? 0,
    volume: parseNumeric(candle.acml_vol) ?? 0,
    tradeValue: parseNumeric(candle.acml_tr_pbmn),
    asOf,
  };
}

async function fetchTimeframe(
  kis: KisApi,
  item: WorkItem,
  timeframe: Timeframe,
  maxPages: number
): Promise<TimeframeResult> {
  const from = item.window.from ?? item.window.to;
  const to = item.window.to;
  const result: TimeframeResult = { rows: [], read: 0, skipped: 0, notes: [] };
  if (!from || !to) return result;

  const fromYmd = toCompactDate(from);
  const seen = new Set<string>();
  let currentTo = toCompactDate(to);

  for (let page = 0; page < maxPages; page++) {
    let candles: KisCandle[];
    try {
      candles = await kis.fetchChartPage(item.symbol, timeframe, fromYmd, currentTo);
    } catch (error) {
      // A rejection after the first page ends paging; the first page's failure is the symbol's.
      if (page > 0 && error instanceof ProviderError && error.reason === 'api') {
        result.notes.push(`prices ${item.symbol} ${timeframe}: paging stopped at page ${page + 1} (${error.message})`);
        break;
      }
      throw error;
    }
    if (candles.length === 0) break;

    result.read += candles.length;
    let oldest: string | null = null;
    for (const candle of candles) {
      const row = mapCandle(item.symbol, timeframe, candle, to);
      if (!row) {
        result.skipped++;
        continue;
      }
      if (seen.has(row.candleAt)) continue;
      seen.add(row.candleAt);
      result.rows.push(row);
      if (oldest === null || row.candleAt < oldest) oldest = row.candleAt;
    }

    if (oldest === null || toCompactDate(oldest) <= fromYmd) break;
    if (page === maxPages - 1) {
      result.notes.push(`prices ${item.symbol} ${timeframe}: stopped after max_price_pages=${maxPages}`);
      break;
    }
    currentTo = toCompactDate(shiftDays(oldest, -1));
  }

  return result;
}

export const pricesFetcher: DomainFetcher = {
  domain: 'prices',

  providerFor() {
    return 'kis';
  },

  async fetch(item: WorkItem, context: FetchContext): Promise<FetchResult> {
    const kis = requireKis(context, 'prices');
    const maxPages = Math.max(1, context.kisMaxPricePages);
    const rows: PriceRow[] = [];
    const notes: string[] = [];
    let rowsRead = 0;
    let rowsSkipped = 0;

    for (const timeframe of item.window.timeframes) {
      const result = await fetchTimeframe(kis, item, timeframe, maxPages);
      rows.push(...result.rows);
      notes.push(...result.notes);
      rowsRead += result.read;
      rowsSkipped += result.skipped;
    }

    return { batch: { domain: 'prices', rows }, rowsRead, rowsSkipped, notes };
  },
};
