/**
 * Financials: KIS finance endpoints x (annual, quarterly), flattened into
 * one line item per numeric field.
 */

import { ProviderError } from '@/core/errors';
import type { FinancialStatementRow } from '@/data/repositories/financials_repo';
import { KIS_FINANCE_ENDPOINTS, type KisFinanceRow, type KisReportTerm } from '@/providers/kis/types';
import { parseNumeric } from '@/utils/numbers';
import type { FetchResult, WorkItem } from '../types';
import { requireKis, type DomainFetcher, type FetchContext } from './types';

const REPORT_TERMS: KisReportTerm[] = ['annual', 'quarterly'];

const PERIOD_KEY = 'stac_yymm';

/** Cumulative or duplicated fields that are not statement line items. */
const IGNORED_KEYS = new Set([PERIOD_KEY, 'acml_tr_pbmn', 'acml_ntin', 'flet_riml_rt', 'self_cptl_rt']);

interface FlattenResult {
  items: FinancialStatementRow[];
  read: number;
  skipped: number;
}

export function flattenFinanceRows(
  symbol: string,
  reportType: string,
  reportTerm: KisReportTerm,
  records: KisFinanceRow[]
): FlattenResult {
  const result: FlattenResult = { items: [], read: 0, skipped: 0 };

  for (const record of records) {
    const period = String(record[PERIOD_KEY] ?? '').trim();
    if (!/^\d{6}$/.test(period)) {
      result.read++;
      result.skipped++;
      continue;
    }
    for (const [key, value] of Object.entries(record)) {
      if (IGNORED_KEYS.has(key)) continue;
      result.read++;
      const itemValue = parseNumeric(value);
      if (itemValue === null) {
        result.skipped++;
        continue;
      }
      result.items.push({
        stockCode: symbol,
        reportType,
        reportTerm,
        periodYyyymm: period,
        itemKey: key.toUpperCase(),
        source: 'kis',
        itemValue,
        currency: 'KRW',
      });
    }
  }

  return result;
}

function naturalKey(row: FinancialStatementRow): string {
  return [row.reportType, row.reportTerm, row.periodYyyymm, row.itemKey].join('|');
}

export const financialsFetcher: DomainFetcher = {
  domain: 'financials',

  providerFor() {
    return 'kis';
  },

  async fetch(item: WorkItem, context: FetchContext): Promise<FetchResult> {
    const kis = requireKis(context, 'financials');
    const byKey = new Map<string, FinancialStatementRow>();
    const notes: string[] = [];
    let rowsRead = 0;
    let rowsSkipped = 0;

    for (const term of REPORT_TERMS) {
      for (const endpoint of KIS_FINANCE_ENDPOINTS) {
        let records: KisFinanceRow[];
        try {
          records = await kis.fetchFinanceRows(endpoint, item.symbol, term);
        } catch (error) {
          if (error instanceof ProviderError && error.reason === 'api') {
            notes.push(`financials ${item.symbol} ${endpoint.reportType}/${term} skipped: ${error.message}`);
            continue;
          }
          throw error;
        }
        const flat = flattenFinanceRows(item.symbol, endpoint.reportType, term, records);
        rowsRead += flat.read;
        rowsSkipped += flat.skipped;
        for (const row of flat.items) {
          byKey.set(naturalKey(row), row);
        }
      }
    }

    return { batch: { domain: 'financials', rows: [...byKey.values()] }, rowsRead, rowsSkipped, notes };
  },
};
