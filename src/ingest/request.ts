/**
 * Turns loosely-typed CLI input into a validated RunRequest.
 */

import { InvalidRequestError, InvalidWindowError } from '@/core/errors';
import { normalizeSymbolList } from '@/core/symbols';
import { toIsoDate } from '@/core/time';
import {
  PRICES_WINDOWS,
  RUN_TYPES,
  SCOPES,
  SOURCE_PROFILES,
  TIMEFRAMES,
  type RunRequest,
  type RunType,
  type Timeframe,
} from './types';

export interface RawRunInput {
  runTypes?: string[];
  scope?: string;
  symbol?: string[];
  symbols?: string;
  sourceProfile?: string;
  timeframes?: string[];
  asOf?: string;
  asOfFrom?: string;
  asOfTo?: string;
  pricesWindow?: string;
  pricesLookbackDays?: string | number;
  pricesBackfill?: boolean;
  limitSymbols?: string | number;
  dryRun?: boolean;
}

function pick<T extends string>(label: string, allowed: readonly T[], raw: string | undefined, fallback: T): T {
  if (raw === undefined) return fallback;
  const value = raw.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate.toLowerCase() === value);
  if (!match) {
    throw new InvalidRequestError(`Invalid ${label}: ${raw} (expected one of ${allowed.join(', ')})`);
  }
  return match;
}

function splitList(values: string[] | undefined): string[] {
  return (values ?? [])
    .flatMap((v) => v.split(','))
    .map((v) => v.trim())
    .filter(Boolean);
}

function parseDateOption(label: string, raw: string | undefined): string | null {
  if (raw === undefined || raw.trim() === '') return null;
  const iso = toIsoDate(raw);
  if (!iso) {
    throw new InvalidWindowError(`Invalid ${label}: ${raw} (expected YYYY-MM-DD, YYYYMMDD or YYYY/MM/DD)`);
  }
  return iso;
}

function parseInteger(raw: string | number | undefined): number | null {
  if (raw === undefined || raw === '') return null;
  const value = typeof raw === 'number' ? raw : Number(raw.trim());
  return Number.isInteger(value) ? value : Number.NaN;
}

function dedupe<T>(values: T[]): T[] {
  return [...new Set(values)];
}

export function buildRunRequest(input: RawRunInput): RunRequest {
  const notes: string[] = [];

  const runTypeTokens = splitList(input.runTypes);
  const runTypes: RunType[] = dedupe(
    (runTypeTokens.length > 0 ? runTypeTokens : ['all']).map((t) => pick('run type', RUN_TYPES, t, 'all'))
  );

  const scope = pick('scope', SCOPES, input.scope, 'single');
  const sourceProfile = pick('source profile', SOURCE_PROFILES, input.sourceProfile, 'all');
  const pricesWindow = pick('prices window', PRICES_WINDOWS, input.pricesWindow, 'fast');

  const timeframeTokens = splitList(input.timeframes);
  const timeframes: Timeframe[] = dedupe(
    (timeframeTokens.length > 0 ? timeframeTokens : ['D']).map((t) => pick('timeframe', TIMEFRAMES, t, 'D'))
  );

  const rawSymbols = [...(input.symbol ?? []), ...(input.symbols ? [input.symbols] : [])];
  const { symbols, rejected } = normalizeSymbolList(rawSymbols);
  for (const value of rejected) {
    notes.push(`symbol ignored (not a 6-digit code): ${value}`);
  }
  if (scope === 'all' && symbols.length > 0) {
    notes.push('explicit symbols ignored under scope=all');
  }

  const lookback = parseInteger(input.pricesLookbackDays);
  if (lookback !== null && Number.isNaN(lookback)) {
    throw new InvalidWindowError(`Invalid prices lookback days: ${String(input.pricesLookbackDays)}`);
  }

  const limit = parseInteger(input.limitSymbols);
  if (limit !== null && (Number.isNaN(limit) || limit <= 0)) {
    throw new InvalidRequestError(`Invalid limit symbols: ${String(input.limitSymbols)} (expected a positive integer)`);
  }

  return {
    runTypes,
    scope,
    symbols: scope === 'single' ? symbols : [],
    sourceProfile,
    timeframes,
    asOf: parseDateOption('as-of', input.asOf),
    asOfFrom: parseDateOption('as-of-from', input.asOfFrom),
    asOfTo: parseDateOption('as-of-to', input.asOfTo),
    pricesWindow,
    pricesLookbackDays: lookback,
    pricesBackfill: input.pricesBackfill ?? false,
    limitSymbols: limit,
    dryRun: input.dryRun ?? false,
    notes,
  };
}
