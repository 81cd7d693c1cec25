/**
 * Events: DART disclosure list for the symbol's corp code, paged to total_page.
 */

import { toCompactDate, toIsoDate } from '@/core/time';
import type { EventRow } from '@/data/repositories/event_repo';
import type { DartDisclosure } from '@/providers/dart/types';
import type { FetchResult, WorkItem } from '../types';
import { requireDart, type DomainFetcher, type FetchContext } from './types';

const MAX_DISCLOSURE_PAGES = 100;
const DISCLOSURE_SEVERITY = 3;

export function mapDisclosure(symbol: string, disclosure: DartDisclosure, fallbackTime: string): EventRow | null {
  const sourceEventId = disclosure.rcept_no.trim();
  if (!sourceEventId) return null;
  const filed = /^\d{8}$/.test(disclosure.rcept_dt.trim()) ? toIsoDate(disclosure.rcept_dt.trim()) : null;
  return {
    source: 'dart',
    sourceEventId,
    stockCode: symbol,
    eventTime: filed ? `${filed}T00:00:00+00:00` : fallbackTime,
    eventType: 'dart_disclosure',
    severity: DISCLOSURE_SEVERITY,
    headline: disclosure.report_nm.trim() || 'DART disclosure',
    summary: disclosure.flr_nm.trim() || null,
  };
}

export const eventsFetcher: DomainFetcher = {
  domain: 'events',

  providerFor() {
    return 'dart';
  },

  async fetch(item: WorkItem, context: FetchContext): Promise<FetchResult> {
    const corpCode = item.meta?.dartCorpCode ?? null;
    if (!corpCode) {
      return {
        batch: { domain: 'events', rows: [] },
        rowsRead: 0,
        rowsSkipped: 1,
        notes: [`events ${item.symbol}: no DART corp code, run the symbols domain under scope=all first`],
      };
    }

    const dart = requireDart(context, 'events');
    const fromYmd = toCompactDate(item.window.from ?? context.today);
    const toYmd = toCompactDate(item.window.to ?? context.today);
    const rows: EventRow[] = [];
    const seen = new Set<string>();
    let rowsRead = 0;
    let rowsSkipped = 0;

    for (let pageNo = 1; pageNo <= MAX_DISCLOSURE_PAGES; pageNo++) {
      const page = await dart.fetchDisclosures(corpCode, fromYmd, toYmd, pageNo);
      rowsRead += page.items.length;
      for (const disclosure of page.items) {
        const row = mapDisclosure(item.symbol, disclosure, context.now());
        if (!row || seen.has(row.sourceEventId)) {
          rowsSkipped++;
          continue;
        }
        seen.add(row.sourceEventId);
        rows.push(row);
      }
      if (pageNo >= page.totalPage) break;
    }

    return { batch: { domain: 'events', rows }, rowsRead, rowsSkipped, notes: [] };
  },
};
