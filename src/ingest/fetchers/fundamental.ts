/**
 * Fundamental: valuation snapshot from the KIS current-price inquiry.
 */

import type { FundamentalSnapshot } from '@/data/repositories/fundamental_repo';
import type { KisCurrentPrice } from '@/providers/kis/types';
import { parseNumeric } from '@/utils/numbers';
import type { FetchResult, WorkItem } from '../types';
import { requireKis, type DomainFetcher, type FetchContext } from './types';

export function mapCurrentPrice(symbol: string, asOf: string, quote: KisCurrentPrice): FundamentalSnapshot {
  return {
    stockCode: symbol,
    asOf,
    source: 'kis',
    price: parseNumeric(quote.stck_prpr),
    per: parseNumeric(quote.per),
    pbr: parseNumeric(quote.pbr),
    eps: parseNumeric(quote.eps),
    bps: parseNumeric(quote.bps),
    marketCap: parseNumeric(quote.hts_avls),
    listedShares: parseNumeric(quote.lstn_stcn),
    high52w: parseNumeric(quote.w52_hgpr),
    low52w: parseNumeric(quote.w52_lwpr),
  };
}

function isEmpty(snapshot: FundamentalSnapshot): boolean {
  return [
    snapshot.price,
    snapshot.per,
    snapshot.pbr,
    snapshot.eps,
    snapshot.bps,
    snapshot.marketCap,
    snapshot.listedShares,
    snapshot.high52w,
    snapshot.low52w,
  ].every((value) => value === null);
}

export const fundamentalFetcher: DomainFetcher = {
  domain: 'fundamental',

  providerFor() {
    return 'kis';
  },

  async fetch(item: WorkItem, context: FetchContext): Promise<FetchResult> {
    const quote = await requireKis(context, 'fundamental').fetchCurrentPrice(item.symbol);
    const snapshot = mapCurrentPrice(item.symbol, item.window.to ?? context.today, quote);

    if (isEmpty(snapshot)) {
      return {
        batch: { domain: 'fundamental', rows: [] },
        rowsRead: 1,
        rowsSkipped: 1,
        notes: [`fundamental ${item.symbol}: quote carried no numeric fields`],
      };
    }
    return { batch: { domain: 'fundamental', rows: [snapshot] }, rowsRead: 1, rowsSkipped: 0, notes: [] };
  },
};
