/**
 * Run planner: expands a validated request into ordered work items.
 */

import { EmptyScopeError, InvalidWindowError } from '@/core/errors';
import { applySymbolLimit } from '@/core/symbols';
import { shiftDays } from '@/core/time';
import type { SymbolRecord } from '@/data/repositories/symbol_repo';
import { expandRunTypes } from './preflight';
import {
  PRICES_WINDOW_DAYS,
  type Domain,
  type DomainPlan,
  type DomainWindow,
  type RunPlan,
  type RunRequest,
  type WorkItem,
} from './types';

export const UNIVERSE_SYNC_SYMBOL = '*';
export const EARLIEST_HISTORY_DATE = '1990-01-01';
export const EVENTS_DEFAULT_LOOKBACK_DAYS = 30;

export interface PlannerContext {
  /** YYYY-MM-DD */
  today: string;
  listActiveSymbols(): SymbolRecord[];
}

function validateWindow(request: RunRequest): void {
  const upper = request.asOfTo ?? request.asOf;
  if (request.asOfFrom && upper && request.asOfFrom > upper) {
    throw new InvalidWindowError(`as_of_from ${request.asOfFrom} is after as_of_to ${upper}`);
  }
  if (request.pricesLookbackDays !== null && request.pricesLookbackDays <= 0) {
    throw new InvalidWindowError(`prices lookback days must be positive, got ${request.pricesLookbackDays}`);
  }
}

/**
 * Prices window, first match wins: explicit range, lookback override,
 * full history (window `full` or the backfill flag), then the fast/normal preset.
 */
export function resolvePricesWindow(request: RunRequest, today: string, listedDate: string | null): DomainWindow {
  const timeframes = request.timeframes;
  const fullHistory = request.pricesWindow === 'full' || request.pricesBackfill;
  const historyStart = listedDate ?? EARLIEST_HISTORY_DATE;
  const presetDays = request.pricesWindow === 'full' ? PRICES_WINDOW_DAYS.normal : PRICES_WINDOW_DAYS[request.pricesWindow];

  if (request.asOfFrom || request.asOfTo) {
    const to = request.asOfTo ?? today;
    if (request.asOfFrom) {
      return { from: request.asOfFrom, to, backfill: false, timeframes };
    }
    return fullHistory
      ? { from: historyStart, to, backfill: true, timeframes }
      : { from: shiftDays(to, -presetDays), to, backfill: false, timeframes };
  }

  if (request.pricesLookbackDays !== null) {
    return { from: shiftDays(today, -request.pricesLookbackDays), to: today, backfill: false, timeframes };
  }

  if (fullHistory) {
    return { from: historyStart, to: today, backfill: true, timeframes };
  }

  return { from: shiftDays(today, -presetDays), to: today, backfill: false, timeframes };
}

export function resolveDomainWindow(domain: Domain, request: RunRequest, today: string): DomainWindow {
  const timeframes = request.timeframes;
  switch (domain) {
    case 'prices':
      return resolvePricesWindow(request, today, null);
    case 'events': {
      const to = request.asOfTo ?? request.asOf ?? today;
      const from = request.asOfFrom ?? shiftDays(to, -EVENTS_DEFAULT_LOOKBACK_DAYS);
      return { from, to, backfill: false, timeframes };
    }
    case 'margins':
      return { from: null, to: request.asOfTo ?? request.asOf ?? today, backfill: false, timeframes };
    case 'fundamental':
    case 'financials':
      return { from: null, to: request.asOfTo ?? request.asOf ?? null, backfill: false, timeframes };
    case 'symbols':
      return { from: null, to: null, backfill: false, timeframes };
  }
}

interface ResolvedSymbols {
  symbols: string[];
  meta: Map<string, SymbolRecord>;
  notes: string[];
}

function resolveSymbols(request: RunRequest, domains: Domain[], context: PlannerContext): ResolvedSymbols {
  const known = context.listActiveSymbols();
  const meta = new Map(known.map((record) => [record.stockCode, record]));

  if (request.scope === 'single') {
    if (request.symbols.length === 0) {
      throw new EmptyScopeError('scope=single needs at least one valid 6-digit symbol (--symbol or --symbols)');
    }
    return { symbols: request.symbols, meta, notes: [] };
  }

  if (known.length === 0 && !domains.includes('symbols')) {
    throw new EmptyScopeError(
      'scope=all found no symbols in symbol_universe; run with --run-type symbols first to sync the universe'
    );
  }

  const limited = applySymbolLimit(
    known.map((record) => record.stockCode),
    request.limitSymbols
  );
  const notes = limited.truncated
    ? [`limit_symbols applied: ${limited.symbols.length} of ${known.length} symbols`]
    : [];
  return { symbols: limited.symbols, meta, notes };
}

function buildDomainPlan(
  domain: Domain,
  request: RunRequest,
  resolved: ResolvedSymbols,
  today: string,
  universeSync: boolean
): DomainPlan {
  const window = resolveDomainWindow(domain, request, today);

  if (domain === 'symbols' && universeSync) {
    return { domain, window, items: [{ domain, symbol: UNIVERSE_SYNC_SYMBOL, window, meta: null }] };
  }

  const items: WorkItem[] = resolved.symbols.map((symbol) => {
    const meta = resolved.meta.get(symbol) ?? null;
    const itemWindow = domain === 'prices' ? resolvePricesWindow(request, today, meta?.listedDate ?? null) : window;
    return { domain, symbol, window: itemWindow, meta };
  });
  return { domain, window, items };
}

export function planRun(request: RunRequest, context: PlannerContext): RunPlan {
  validateWindow(request);

  const domains = expandRunTypes(request.runTypes);
  const resolved = resolveSymbols(request, domains, context);
  const universeSync = request.scope === 'all' && domains.includes('symbols');

  return {
    domains,
    symbols: resolved.symbols,
    universeSync,
    domainPlans: domains.map((domain) => buildDomainPlan(domain, request, resolved, context.today, universeSync)),
    notes: resolved.notes,
  };
}

/**
 * Rebuilds the plans of the domains after `symbols` from the refreshed
 * universe. Only meaningful once a universe sync has been persisted.
 */
export function replanAfterUniverseSync(plan: RunPlan, request: RunRequest, context: PlannerContext): RunPlan {
  const later = plan.domains.filter((domain) => domain !== 'symbols');
  const resolved = resolveSymbols(request, later, context);
  const symbolsPlan = plan.domainPlans.filter((p) => p.domain === 'symbols');

  return {
    ...plan,
    symbols: resolved.symbols,
    domainPlans: [
      ...symbolsPlan,
      ...later.map((domain) => buildDomainPlan(domain, request, resolved, context.today, false)),
    ],
    notes: resolved.notes,
  };
}

export function countPlannedItems(plan: RunPlan): Record<Domain, number> {
  const counts: Record<Domain, number> = {
    symbols: 0,
    prices: 0,
    fundamental: 0,
    financials: 0,
    events: 0,
    margins: 0,
  };
  for (const domainPlan of plan.domainPlans) {
    counts[domainPlan.domain] = domainPlan.items.length;
  }
  return counts;
}
