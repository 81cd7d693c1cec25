import { describe, expect, it } from 'vitest';
import { ProviderError } from '@/core/errors';
import type { FetchContext } from '@/ingest/fetchers';
import { eventsFetcher, mapDisclosure } from '@/ingest/fetchers/events';
import { financialsFetcher, flattenFinanceRows } from '@/ingest/fetchers/financials';
import { fundamentalFetcher, mapCurrentPrice } from '@/ingest/fetchers/fundamental';
import { marginsFetcher, mergeMargin } from '@/ingest/fetchers/margins';
import { enrichFromStockInfo, mapCorpCodes, symbolsFetcher } from '@/ingest/fetchers/symbols';
import { UNIVERSE_SYNC_SYMBOL } from '@/ingest/planner';
import { corpCode, disclosure, FakeDart, FakeKis } from '../helpers/fake_providers';
import { makeItem } from '../helpers/fixtures';

const NOW = '2024-01-31T09:00:00.000Z';

function context(kis: FakeKis | null, dart: FakeDart | null = null): FetchContext {
  return { clients: { kis, dart }, kisMaxPricePages: 3, today: '2024-01-31', now: () => NOW };
}

const BARE_SYMBOL = { stockCode: '005930', name: null, market: null, dartCorpCode: null, listedDate: null };

describe('symbols', () => {
  it('keeps listed corp codes, last entry winning per stock code', () => {
    const { records, skipped } = mapCorpCodes([
      corpCode('00000001', '005930', 'Alpha Corp'),
      corpCode('00000009', '005930', 'Alpha Holdings'),
      corpCode('00000003', '', 'Unlisted Corp'),
    ]);
    expect(skipped).toBe(1);
    expect(records).toEqual([
      { stockCode: '005930', name: 'Alpha Holdings', market: null, dartCorpCode: '00000009', listedDate: null },
    ]);
  });

  it('enriches name, market and listing date from stock info', () => {
    expect(
      enrichFromStockInfo(BARE_SYMBOL, { prdt_abrv_name: 'Alpha', mket_id_cd: 'ksq', kosdaq_mket_lstg_dt: '20010315' })
    ).toEqual({ ...BARE_SYMBOL, name: 'Alpha', market: 'KOSDAQ', listedDate: '2001-03-15' });
  });

  it('syncs the universe from DART corp codes', async () => {
    const dart = new FakeDart();
    const result = await symbolsFetcher.fetch(
      makeItem({ domain: 'symbols', symbol: UNIVERSE_SYNC_SYMBOL }),
      context(null, dart)
    );

    expect(dart.calls).toEqual(['corpCodes']);
    expect(result.rowsRead).toBe(3);
    expect(result.rowsSkipped).toBe(1);
    expect(result.notes).toEqual(['symbol universe synced from DART corpCode: 2 listed symbols']);
    expect(result.batch).toEqual({
      domain: 'symbols',
      rows: [
        { stockCode: '005930', name: 'Alpha Corp', market: null, dartCorpCode: '00000001', listedDate: null },
        { stockCode: '000660', name: 'Beta Corp', market: null, dartCorpCode: '00000002', listedDate: null },
      ],
    });
  });

  it('still writes the symbol when enrichment fails', async () => {
    const kis = new FakeKis();
    kis.stockInfo = () => Promise.reject(new Error('boom'));
    const result = await symbolsFetcher.fetch(makeItem({ domain: 'symbols' }), context(kis));

    expect(result.notes).toEqual(['symbol enrich failed 005930: boom']);
    expect(result.batch).toEqual({ domain: 'symbols', rows: [BARE_SYMBOL] });
  });

  it('attributes the sync item to DART and single symbols to KIS', () => {
    expect(symbolsFetcher.providerFor(makeItem({ domain: 'symbols', symbol: UNIVERSE_SYNC_SYMBOL }))).toBe('dart');
    expect(symbolsFetcher.providerFor(makeItem({ domain: 'symbols' }))).toBe('kis');
  });
});

describe('fundamental', () => {
  it('maps the quote into a snapshot dated at the window end', async () => {
    const result = await fundamentalFetcher.fetch(makeItem({ domain: 'fundamental' }), context(new FakeKis()));
    expect(result.batch).toEqual({
      domain: 'fundamental',
      rows: [
        {
          stockCode: '005930',
          asOf: '2024-01-31',
          source: 'kis',
          price: 70000,
          per: 12.5,
          pbr: 1.3,
          eps: 5600,
          bps: 54000,
          marketCap: 4180000,
          listedShares: 5969782550,
          high52w: 88800,
          low52w: 49900,
        },
      ],
    });
  });

  it('dates the snapshot today when the window is open', async () => {
    const item = makeItem({ domain: 'fundamental' }, { from: null, to: null });
    const result = await fundamentalFetcher.fetch(item, context(new FakeKis()));
    expect(result.batch.rows[0]).toMatchObject({ asOf: '2024-01-31' });
  });

  it('treats placeholder values as missing', () => {
    expect(mapCurrentPrice('005930', '2024-01-31', { per: '-', pbr: '1.1' })).toMatchObject({ per: null, pbr: 1.1 });
  });

  it('skips a quote with no numeric fields', async () => {
    const kis = new FakeKis();
    kis.currentPrice = () => Promise.resolve({ stck_prpr: '', per: 'N/A' });
    const result = await fundamentalFetcher.fetch(makeItem({ domain: 'fundamental' }), context(kis));

    expect(result).toEqual({
      batch: { domain: 'fundamental', rows: [] },
      rowsRead: 1,
      rowsSkipped: 1,
      notes: ['fundamental 005930: quote carried no numeric fields'],
    });
  });
});

describe('financials', () => {
  it('flattens numeric fields into line items', () => {
    const flat = flattenFinanceRows('005930', 'IS', 'annual', [
      { stac_yymm: '202312', sale_account: '1,000', acml_ntin: '5', bsop_prti: '-', grs: null },
      { stac_yymm: '2023', sale_account: '900' },
    ]);

    expect(flat.read).toBe(4);
    expect(flat.skipped).toBe(3);
    expect(flat.items).toEqual([
      {
        stockCode: '005930',
        reportType: 'IS',
        reportTerm: 'annual',
        periodYyyymm: '202312',
        itemKey: 'SALE_ACCOUNT',
        source: 'kis',
        itemValue: 1000,
        currency: 'KRW',
      },
    ]);
  });

  it('collects every endpoint for both report terms', async () => {
    const kis = new FakeKis();
    const result = await financialsFetcher.fetch(makeItem({ domain: 'financials' }), context(kis));

    expect(kis.calls).toHaveLength(14);
    expect(result.rowsRead).toBe(14);
    expect(result.notes).toEqual([]);
  });

  it('skips an endpoint the provider rejects and keeps the rest', async () => {
    const kis = new FakeKis();
    kis.financeRows = (endpoint) =>
      endpoint.reportType === 'GROWTH'
        ? Promise.reject(new ProviderError('kis: FHKST66430800 rejected: [OPSQ0001] none', 'kis', 'api'))
        : Promise.resolve([{ stac_yymm: '202312', total_aset: '1,000' }]);

    const result = await financialsFetcher.fetch(makeItem({ domain: 'financials' }), context(kis));

    expect(result.rowsRead).toBe(12);
    expect(result.notes).toEqual([
      'financials 005930 GROWTH/annual skipped: kis: FHKST66430800 rejected: [OPSQ0001] none',
      'financials 005930 GROWTH/quarterly skipped: kis: FHKST66430800 rejected: [OPSQ0001] none',
    ]);
  });

  it('fails the symbol on auth errors', async () => {
    const kis = new FakeKis();
    kis.financeRows = () => Promise.reject(new ProviderError('kis: token expired', 'kis', 'auth'));
    await expect(financialsFetcher.fetch(makeItem({ domain: 'financials' }), context(kis))).rejects.toMatchObject({
      reason: 'auth',
    });
  });
});

describe('events', () => {
  it('maps a disclosure to a dated event', () => {
    expect(mapDisclosure('005930', disclosure('20240110000001'), NOW)).toEqual({
      source: 'dart',
      sourceEventId: '20240110000001',
      stockCode: '005930',
      eventTime: '2024-01-10T00:00:00+00:00',
      eventType: 'dart_disclosure',
      severity: 3,
      headline: 'Quarterly report',
      summary: 'Alpha Corp',
    });
  });

  it('falls back for missing dates and names', () => {
    expect(mapDisclosure('005930', disclosure('X1', { rcept_dt: '', report_nm: ' ', flr_nm: '' }), NOW)).toMatchObject({
      eventTime: NOW,
      headline: 'DART disclosure',
      summary: null,
    });
    expect(mapDisclosure('005930', disclosure(' '), NOW)).toBeNull();
  });

  it('pages to total_page and drops repeated receipts', async () => {
    const dart = new FakeDart();
    dart.disclosures = (_corp, _from, _to, pageNo) =>
      Promise.resolve(
        pageNo === 1
          ? { items: [disclosure('R1'), disclosure('R2')], pageNo, totalPage: 2 }
          : { items: [disclosure('R2'), disclosure('R3')], pageNo, totalPage: 2 }
      );
    const item = makeItem({ domain: 'events', meta: { ...BARE_SYMBOL, dartCorpCode: '00000001' } });

    const result = await eventsFetcher.fetch(item, context(null, dart));

    expect(dart.calls).toEqual(['disclosures:00000001:1', 'disclosures:00000001:2']);
    expect(result.rowsRead).toBe(4);
    expect(result.rowsSkipped).toBe(1);
    expect(result.batch.rows).toHaveLength(3);
  });

  it('skips symbols without a corp code', async () => {
    const dart = new FakeDart();
    const result = await eventsFetcher.fetch(makeItem({ domain: 'events' }), context(null, dart));

    expect(dart.calls).toEqual([]);
    expect(result).toEqual({
      batch: { domain: 'events', rows: [] },
      rowsRead: 0,
      rowsSkipped: 1,
      notes: ['events 005930: no DART corp code, run the symbols domain under scope=all first'],
    });
  });
});

describe('margins', () => {
  it('flags full margin at a 100% rate', () => {
    expect(mergeMargin('005930', '2024-01-31', { ord_psbl_cash: '5,000' }, { acmga_rt: '100' })).toEqual({
      stockCode: '005930',
      asOf: '2024-01-31',
      marginRatePct: 100,
      isFullMargin: true,
      orderableCash: 5000,
      maxBuyQty: null,
      collectionStatus: 'collected',
      sourceNote: 'margin rate 100%',
    });
  });

  it('records a missing rate as unavailable', () => {
    expect(mergeMargin('005930', '2024-01-31', {}, {})).toMatchObject({
      marginRatePct: null,
      isFullMargin: false,
      collectionStatus: 'rate_unavailable',
      sourceNote: 'integrated margin response carried no rate',
    });
  });

  it('writes one merged row per symbol', async () => {
    const result = await marginsFetcher.fetch(makeItem({ domain: 'margins' }), context(new FakeKis()));
    expect(result.rowsRead).toBe(2);
    expect(result.batch).toEqual({
      domain: 'margins',
      rows: [
        {
          stockCode: '005930',
          asOf: '2024-01-31',
          marginRatePct: 40,
          isFullMargin: false,
          orderableCash: 1000000,
          maxBuyQty: 14,
          collectionStatus: 'collected',
          sourceNote: 'margin rate 40%',
        },
      ],
    });
  });

  it('persists nothing when either call fails', async () => {
    const kis = new FakeKis();
    kis.integratedMargin = () => Promise.reject(new ProviderError('kis: TTTC0869R rejected', 'kis', 'api'));
    await expect(marginsFetcher.fetch(makeItem({ domain: 'margins' }), context(kis))).rejects.toBeInstanceOf(
      ProviderError
    );
  });
});
