/**
 * Shared types for planning and running an ingest.
 */

import type { ProviderFailureReason, ProviderName } from '@/core/errors';
import type { SymbolRecord } from '@/data/repositories/symbol_repo';
import type { PriceRow } from '@/data/repositories/price_repo';
import type { FundamentalSnapshot } from '@/data/repositories/fundamental_repo';
import type { FinancialStatementRow } from '@/data/repositories/financials_repo';
import type { EventRow } from '@/data/repositories/event_repo';
import type { MarginRow } from '@/data/repositories/margin_repo';

export const DOMAIN_ORDER = ['symbols', 'prices', 'fundamental', 'financials', 'events', 'margins'] as const;

export const RUN_TYPES = [...DOMAIN_ORDER, 'all'] as const;
export const SCOPES = ['single', 'all'] as const;
export const SOURCE_PROFILES = ['all', 'kis', 'dart'] as const;
export const TIMEFRAMES = ['D', 'W', 'M', 'Y'] as const;
export const PRICES_WINDOWS = ['fast', 'normal', 'full'] as const;
export const RUN_STATUSES = ['pending', 'running', 'succeeded', 'partial', 'failed', 'cancelled'] as const;
export const OUTCOME_STATUSES = ['ok', 'partial', 'skipped', 'failed'] as const;

export type Domain = (typeof DOMAIN_ORDER)[number];
export type RunType = (typeof RUN_TYPES)[number];
export type Scope = (typeof SCOPES)[number];
export type SourceProfile = (typeof SOURCE_PROFILES)[number];
export type Timeframe = (typeof TIMEFRAMES)[number];
export type PricesWindow = (typeof PRICES_WINDOWS)[number];

export const PRICES_WINDOW_DAYS: Record<Exclude<PricesWindow, 'full'>, number> = {
  fast: 7,
  normal: 30,
};

export type RunStatus = (typeof RUN_STATUSES)[number];
export type OutcomeStatus = (typeof OUTCOME_STATUSES)[number];

/** A validated `run` request. Dates are YYYY-MM-DD. */
export interface RunRequest {
  runTypes: RunType[];
  scope: Scope;
  symbols: string[];
  sourceProfile: SourceProfile;
  timeframes: Timeframe[];
  asOf: string | null;
  asOfFrom: string | null;
  asOfTo: string | null;
  pricesWindow: PricesWindow;
  pricesLookbackDays: number | null;
  pricesBackfill: boolean;
  limitSymbols: number | null;
  dryRun: boolean;
  /** Annotations produced while validating, e.g. rejected symbols or deprecated aliases. */
  notes: string[];
}

/**
 * Resolved time range for one domain. `from`/`to` null means "latest
 * available" on the provider side.
 */
export interface DomainWindow {
  from: string | null;
  to: string | null;
  backfill: boolean;
  timeframes: Timeframe[];
}

export interface WorkItem {
  domain: Domain;
  /** Six-digit stock code, or `*` for the universe sync item. */
  symbol: string;
  window: DomainWindow;
  /** Stored metadata for the symbol, when known at planning time. */
  meta: SymbolRecord | null;
}

export interface DomainPlan {
  domain: Domain;
  window: DomainWindow;
  items: WorkItem[];
}

export interface RunPlan {
  domains: Domain[];
  symbols: string[];
  /** True when the symbols domain re-syncs the scope=all universe before later domains. */
  universeSync: boolean;
  domainPlans: DomainPlan[];
  notes: string[];
}

export type DomainBatch =
  | { domain: 'symbols'; rows: SymbolRecord[] }
  | { domain: 'prices'; rows: PriceRow[] }
  | { domain: 'fundamental'; rows: FundamentalSnapshot[] }
  | { domain: 'financials'; rows: FinancialStatementRow[] }
  | { domain: 'events'; rows: EventRow[] }
  | { domain: 'margins'; rows: MarginRow[] };

export interface FetchResult {
  batch: DomainBatch;
  rowsRead: number;
  rowsSkipped: number;
  notes: string[];
}

export interface OutcomeError {
  provider: ProviderName | 'store';
  symbol: string;
  kind: ProviderFailureReason | 'persistence' | 'internal';
  message: string;
}

export interface DomainOutcome {
  runId: string;
  domain: Domain;
  status: OutcomeStatus;
  plannedItems: number;
  processedItems: number;
  rowsRead: number;
  rowsWritten: number;
  rowsSkipped: number;
  errors: OutcomeError[];
  windowFrom: string | null;
  windowTo: string | null;
  startedAt: string;
  finishedAt: string;
}

export interface RunRecord {
  runId: string;
  command: string;
  runTypes: RunType[];
  scope: Scope;
  sourceProfile: SourceProfile;
  symbols: string[];
  timeframes: Timeframe[];
  pricesWindow: PricesWindow;
  pricesLookbackDays: number | null;
  pricesBackfill: boolean;
  asOf: string | null;
  asOfFrom: string | null;
  asOfTo: string | null;
  limitSymbols: number | null;
  dryRun: boolean;
  status: RunStatus;
  symbolsCount: number;
  startedAt: string;
  finishedAt: string | null;
  notes: string[];
  errorKind: string | null;
  errorMessage: string | null;
}

export interface RunFinalization {
  runId: string;
  status: RunStatus;
  symbolsCount: number;
  symbols: string[];
  finishedAt: string;
  notes: string[];
  errorKind: string | null;
  errorMessage: string | null;
}
