import { describe, expect, it } from 'vitest';
import { MissingCredentialError } from '@/core/errors';
import { NO_CREDENTIALS } from '@/core/env';
import { expandRunTypes, missingCredentials, requiredCredentials, runPreflight } from '@/ingest/preflight';
import { makeRequest, TEST_CREDENTIALS } from '../helpers/fixtures';

describe('expandRunTypes', () => {
  it('orders domains by the fixed domain order', () => {
    expect(expandRunTypes(['margins', 'symbols', 'events'])).toEqual(['symbols', 'events', 'margins']);
  });

  it('expands all to every domain', () => {
    expect(expandRunTypes(['prices', 'all'])).toEqual([
      'symbols',
      'prices',
      'fundamental',
      'financials',
      'events',
      'margins',
    ]);
  });
});

describe('requiredCredentials', () => {
  it('needs the KIS app key pair for prices and financials', () => {
    expect(requiredCredentials(makeRequest({ runTypes: ['prices'] }))).toEqual(['KIS_APP_KEY', 'KIS_APP_SECRET']);
    expect(requiredCredentials(makeRequest({ runTypes: ['financials'] }))).toEqual(['KIS_APP_KEY', 'KIS_APP_SECRET']);
  });

  it('adds the account number for margins', () => {
    expect(requiredCredentials(makeRequest({ runTypes: ['margins'] }))).toEqual([
      'KIS_APP_KEY',
      'KIS_APP_SECRET',
      'KIS_ACCOUNT_NO',
    ]);
  });

  it('needs the DART key for events and for scope=all', () => {
    expect(requiredCredentials(makeRequest({ runTypes: ['events'] }))).toEqual(['DART_API_KEY']);
    expect(requiredCredentials(makeRequest({ runTypes: ['symbols'], scope: 'all', symbols: [] }))).toEqual([
      'DART_API_KEY',
    ]);
  });

  it('requires nothing for single-scope symbols or fundamental', () => {
    expect(requiredCredentials(makeRequest({ runTypes: ['symbols', 'fundamental'] }))).toEqual([]);
  });

  it('drops KIS keys when the source profile excludes KIS', () => {
    expect(requiredCredentials(makeRequest({ runTypes: ['prices', 'margins'], sourceProfile: 'dart' }))).toEqual([]);
  });
});

describe('runPreflight', () => {
  it('names every missing key in one error', () => {
    const request = makeRequest({ runTypes: ['all'] });
    expect(missingCredentials(request, NO_CREDENTIALS)).toEqual([
      'KIS_APP_KEY',
      'KIS_APP_SECRET',
      'KIS_ACCOUNT_NO',
      'DART_API_KEY',
    ]);

    let caught: unknown;
    try {
      runPreflight(request, { ...TEST_CREDENTIALS, kisAccountNo: null, dartApiKey: null });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(MissingCredentialError);
    expect(caught).toMatchObject({ kind: 'MissingCredential', missing: ['KIS_ACCOUNT_NO', 'DART_API_KEY'] });
  });

  it('passes dry runs without credentials', () => {
    expect(() => runPreflight(makeRequest({ dryRun: true }), NO_CREDENTIALS)).not.toThrow();
  });

  it('passes when every required key is present', () => {
    expect(() => runPreflight(makeRequest(), TEST_CREDENTIALS)).not.toThrow();
  });
});
