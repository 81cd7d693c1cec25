import { describe, expect, it } from 'vitest';
import { InvalidRequestError, InvalidWindowError } from '@/core/errors';
import { buildRunRequest } from '@/ingest/request';

describe('buildRunRequest', () => {
  it('fills defaults for an empty input', () => {
    expect(buildRunRequest({})).toEqual({
      runTypes: ['all'],
      scope: 'single',
      symbols: [],
      sourceProfile: 'all',
      timeframes: ['D'],
      asOf: null,
      asOfFrom: null,
      asOfTo: null,
      pricesWindow: 'fast',
      pricesLookbackDays: null,
      pricesBackfill: false,
      limitSymbols: null,
      dryRun: false,
      notes: [],
    });
  });

  it('matches enum values case-insensitively and dedupes run types', () => {
    const request = buildRunRequest({ runTypes: ['Prices,EVENTS', 'prices'], sourceProfile: 'KIS', timeframes: ['d', 'W'] });
    expect(request.runTypes).toEqual(['prices', 'events']);
    expect(request.sourceProfile).toBe('kis');
    expect(request.timeframes).toEqual(['D', 'W']);
  });

  it('rejects unknown enum values', () => {
    expect(() => buildRunRequest({ runTypes: ['quotes'] })).toThrow(InvalidRequestError);
    expect(() => buildRunRequest({ scope: 'everything' })).toThrow(InvalidRequestError);
  });

  it('merges --symbol and --symbols and notes rejected codes', () => {
    const request = buildRunRequest({ symbol: ['5930', 'xyz'], symbols: '000660,005930' });
    expect(request.symbols).toEqual(['005930', '000660']);
    expect(request.notes).toEqual(['symbol ignored (not a 6-digit code): xyz']);
  });

  it('drops explicit symbols under scope=all', () => {
    const request = buildRunRequest({ scope: 'all', symbol: ['005930'] });
    expect(request.symbols).toEqual([]);
    expect(request.notes).toEqual(['explicit symbols ignored under scope=all']);
  });

  it('normalizes dates and rejects invalid ones', () => {
    expect(buildRunRequest({ asOf: '20240105', asOfFrom: '2024/01/01' })).toMatchObject({
      asOf: '2024-01-05',
      asOfFrom: '2024-01-01',
      asOfTo: null,
    });
    expect(() => buildRunRequest({ asOfTo: '2024-13-01' })).toThrow(InvalidWindowError);
  });

  it('validates numeric options', () => {
    expect(buildRunRequest({ pricesLookbackDays: '10', limitSymbols: '25' })).toMatchObject({
      pricesLookbackDays: 10,
      limitSymbols: 25,
    });
    expect(() => buildRunRequest({ pricesLookbackDays: '1.5' })).toThrow(InvalidWindowError);
    expect(() => buildRunRequest({ limitSymbols: '0' })).toThrow(InvalidRequestError);
    expect(() => buildRunRequest({ limitSymbols: 'many' })).toThrow(InvalidRequestError);
  });
});
