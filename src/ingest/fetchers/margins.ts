/**
 * Margins: order-eligible balance plus integrated margin, merged per symbol.
 * Either call failing fails the symbol; nothing is persisted for it.
 */

import type { MarginRow } from '@/data/repositories/margin_repo';
import type { KisIntegratedMargin, KisOrderable } from '@/providers/kis/types';
import { parseNumeric } from '@/utils/numbers';
import type { FetchResult, WorkItem } from '../types';
import { requireKis, type DomainFetcher, type FetchContext } from './types';

const FULL_MARGIN_RATE_PCT = 100;

export function mergeMargin(
  symbol: string,
  asOf: string,
  orderable: KisOrderable,
  margin: KisIntegratedMargin
): MarginRow {
  const rate = parseNumeric(margin.acmga_rt);
  return {
    stockCode: symbol,
    asOf,
    marginRatePct: rate,
    isFullMargin: rate !== null && rate >= FULL_MARGIN_RATE_PCT,
    orderableCash: parseNumeric(orderable.ord_psbl_cash),
    maxBuyQty: parseNumeric(orderable.max_buy_qty),
    collectionStatus: rate === null ? 'rate_unavailable' : 'collected',
    sourceNote: rate === null ? 'integrated margin response carried no rate' : `margin rate ${rate}%`,
  };
}

export const marginsFetcher: DomainFetcher = {
  domain: 'margins',

  providerFor() {
    return 'kis';
  },

  async fetch(item: WorkItem, context: FetchContext): Promise<FetchResult> {
    const kis = requireKis(context, 'margins');
    const orderable = await kis.fetchOrderable(item.symbol);
    const margin = await kis.fetchIntegratedMargin(item.symbol);
    const row = mergeMargin(item.symbol, item.window.to ?? context.today, orderable, margin);
    return { batch: { domain: 'margins', rows: [row] }, rowsRead: 2, rowsSkipped: 0, notes: [] };
  },
};
