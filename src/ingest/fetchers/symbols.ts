/**
 * Symbols: DART corp-code universe sync (scope=all) or per-symbol records
 * enriched from KIS stock-info (scope=single).
 */

import { errorMessage } from '@/core/errors';
import { normalizeSymbol } from '@/core/symbols';
import { toIsoDate } from '@/core/time';
import type { SymbolRecord } from '@/data/repositories/symbol_repo';
import type { DartCorpCode } from '@/providers/dart/types';
import type { KisStockInfo } from '@/providers/kis/types';
import { UNIVERSE_SYNC_SYMBOL } from '../planner';
import type { FetchResult, WorkItem } from '../types';
import { requireDart, type DomainFetcher, type FetchContext } from './types';

const MARKET_BY_ID: Record<string, string> = {
  STK: 'KOSPI',
  KSQ: 'KOSDAQ',
};

function blankToNull(value: string | undefined): string | null {
  const trimmed = (value ?? '').trim();
  return trimmed ? trimmed : null;
}

export function mapCorpCodes(entries: DartCorpCode[]): { records: SymbolRecord[]; skipped: number } {
  const byCode = new Map<string, SymbolRecord>();
  let skipped = 0;
  for (const entry of entries) {
    const stockCode = normalizeSymbol(entry.stock_code);
    if (!stockCode) {
      skipped++;
      continue;
    }
    byCode.set(stockCode, {
      stockCode,
      name: blankToNull(entry.corp_name),
      market: null,
      dartCorpCode: blankToNull(entry.corp_code),
      listedDate: null,
    });
  }
  return { records: [...byCode.values()], skipped };
}

export function enrichFromStockInfo(record: SymbolRecord, info: KisStockInfo): SymbolRecord {
  const marketId = (info.mket_id_cd ?? '').trim().toUpperCase();
  const listed = toIsoDate(info.scts_mket_lstg_dt) ?? toIsoDate(info.kosdaq_mket_lstg_dt);
  return {
    ...record,
    name: blankToNull(info.prdt_abrv_name) ?? blankToNull(info.prdt_name) ?? record.name,
    market: MARKET_BY_ID[marketId] ?? record.market,
    listedDate: listed ?? record.listedDate,
  };
}

export const symbolsFetcher: DomainFetcher = {
  domain: 'symbols',

  providerFor(item) {
    return item.symbol === UNIVERSE_SYNC_SYMBOL ? 'dart' : 'kis';
  },

  async fetch(item: WorkItem, context: FetchContext): Promise<FetchResult> {
    if (item.symbol === UNIVERSE_SYNC_SYMBOL) {
      const entries = await requireDart(context, 'symbols').fetchCorpCodes();
      const { records, skipped } = mapCorpCodes(entries);
      return {
        batch: { domain: 'symbols', rows: records },
        rowsRead: entries.length,
        rowsSkipped: skipped,
        notes: [`symbol universe synced from DART corpCode: ${records.length} listed symbols`],
      };
    }

    let record: SymbolRecord = item.meta ?? {
      stockCode: item.symbol,
      name: null,
      market: null,
      dartCorpCode: null,
      listedDate: null,
    };
    const notes: string[] = [];

    const kis = context.clients.kis;
    if (kis) {
      try {
        record = enrichFromStockInfo(record, await kis.fetchStockInfo(item.symbol));
      } catch (error) {
        notes.push(`symbol enrich failed ${item.symbol}: ${errorMessage(error)}`);
      }
    }

    return { batch: { domain: 'symbols', rows: [record] }, rowsRead: 1, rowsSkipped: 0, notes };
  },
};
