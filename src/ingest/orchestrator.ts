/**
 * Run orchestrator: persists the run, walks the plan domain by domain,
 * isolates failures per work item and finalises the run status.
 */

import type { Credentials } from '@/core/env';
import {
  EmptyScopeError,
  IngestError,
  PersistenceError,
  ProviderError,
  errorMessage,
  toIngestError,
} from '@/core/errors';
import { createRunId as defaultRunId, nowIso, todayIso } from '@/core/time';
import type { IngestStore } from '@/data/store';
import type { ProviderClients } from '@/providers/types';
import { createChildLogger } from '@/utils/logger';
import { createExecutor, type Executor } from './executor';
import { DEFAULT_FETCHERS, type DomainFetcher, type FetchContext } from './fetchers';
import { planRun, replanAfterUniverseSync, type PlannerContext } from './planner';
import { runPreflight } from './preflight';
import type {
  Domain,
  DomainOutcome,
  DomainPlan,
  OutcomeError,
  OutcomeStatus,
  RunPlan,
  RunRecord,
  RunRequest,
  RunStatus,
  WorkItem,
} from './types';

const logger = createChildLogger('orchestrator');

const KIS_DOMAINS: ReadonlySet<Domain> = new Set(['prices', 'fundamental', 'financials', 'margins']);

export const DRY_RUN_NOTE = 'dry-run: no provider calls made';

export interface OrchestratorDeps {
  store: IngestStore;
  credentials: Credentials;
  /** Called only for real runs; dry runs never construct a client. */
  createClients: () => ProviderClients;
  kisMaxPricePages: number;
  concurrency?: number;
  executor?: Executor;
  fetchers?: Record<Domain, DomainFetcher>;
  command?: string;
  signal?: AbortSignal;
  now?: () => Date;
  createRunId?: (now: Date) => string;
  /** Invoked once the run row exists as `running`, before any domain work. */
  onRunStarted?: (runId: string) => void | Promise<void>;
}

export interface RunResult {
  run: RunRecord;
  outcomes: DomainOutcome[];
  plan: RunPlan;
}

interface DomainRunState {
  processed: number;
  succeeded: number;
  rowsRead: number;
  rowsWritten: number;
  rowsSkipped: number;
  errors: OutcomeError[];
  notes: string[];
  fatal: ProviderError[];
}

function profileClients(clients: ProviderClients, request: RunRequest): ProviderClients {
  return {
    kis: request.sourceProfile === 'dart' ? null : clients.kis,
    dart: request.sourceProfile === 'kis' ? null : clients.dart,
  };
}

/** Null when the domain can run, otherwise the note explaining the skip. */
export function domainSkipReason(
  domain: Domain,
  request: RunRequest,
  clients: ProviderClients,
  universeSync: boolean
): string | null {
  const profile = request.sourceProfile;
  if (KIS_DOMAINS.has(domain)) {
    if (profile === 'dart') return `${domain} skipped: source_profile=dart excludes KIS`;
    if (!clients.kis) return `${domain} skipped: KIS credentials not provided`;
    return null;
  }
  if (domain === 'events' || (domain === 'symbols' && universeSync)) {
    if (profile === 'kis') return `${domain} skipped: source_profile=kis excludes DART`;
    if (!clients.dart) return `${domain} skipped: DART credentials not provided`;
  }
  return null;
}

export function toOutcomeError(error: unknown, item: WorkItem, fetcher: DomainFetcher): OutcomeError {
  if (error instanceof ProviderError) {
    return { provider: error.provider, symbol: item.symbol, kind: error.reason, message: error.message };
  }
  if (error instanceof PersistenceError) {
    return { provider: 'store', symbol: item.symbol, kind: 'persistence', message: error.message };
  }
  return { provider: fetcher.providerFor(item), symbol: item.symbol, kind: 'internal', message: errorMessage(error) };
}

/** A domain cut short by cancellation is never `ok`. */
function outcomeStatus(state: DomainRunState, planned: number): OutcomeStatus {
  if (state.fatal.length > 0) return 'failed';
  if (state.errors.length === 0) return state.processed < planned ? 'partial' : 'ok';
  if (planned > 0 && state.succeeded === 0) return 'failed';
  return 'partial';
}

/** Skipped outcomes are neutral; an abort always fails the run. */
export function computeRunStatus(outcomes: DomainOutcome[], aborted: boolean, cancelled: boolean): RunStatus {
  if (aborted) return 'failed';
  if (cancelled) return 'cancelled';
  const counted = outcomes.filter((o) => o.status !== 'skipped');
  if (counted.every((o) => o.status === 'ok')) return 'succeeded';
  if (counted.every((o) => o.status === 'failed')) return 'failed';
  return 'partial';
}

export class RunOrchestrator {
  private readonly fetchers: Record<Domain, DomainFetcher>;
  private readonly executor: Executor;
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.fetchers = deps.fetchers ?? DEFAULT_FETCHERS;
    this.executor = deps.executor ?? createExecutor(deps.concurrency ?? 1);
    this.now = deps.now ?? (() => new Date());
  }

  private plannerContext(): PlannerContext {
    return {
      today: todayIso(this.now()),
      listActiveSymbols: () => this.deps.store.listActiveSymbols(),
    };
  }

  private skippedOutcome(runId: string, plan: DomainPlan, startedAt: string): DomainOutcome {
    return {
      runId,
      domain: plan.domain,
      status: 'skipped',
      plannedItems: plan.items.length,
      processedItems: 0,
      rowsRead: 0,
      rowsWritten: 0,
      rowsSkipped: 0,
      errors: [],
      windowFrom: plan.window.from,
      windowTo: plan.window.to,
      startedAt,
      finishedAt: nowIso(this.now()),
    };
  }

  /**
   * Preflight, plan and execute. Preflight and planning errors throw before
   * anything is persisted; failures after the run row exists finalise it.
   */
  async run(request: RunRequest): Promise<RunResult> {
    runPreflight(request, this.deps.credentials);
    const initialPlan = planRun(request, this.plannerContext());

    const startedAt = nowIso(this.now());
    const runId = (this.deps.createRunId ?? defaultRunId)(this.now());
    const { store } = this.deps;

    const record: RunRecord = {
      runId,
      command: this.deps.command ?? 'run',
      runTypes: request.runTypes,
      scope: request.scope,
      sourceProfile: request.sourceProfile,
      symbols: initialPlan.symbols,
      timeframes: request.timeframes,
      pricesWindow: request.pricesWindow,
      pricesLookbackDays: request.pricesLookbackDays,
      pricesBackfill: request.pricesBackfill,
      asOf: request.asOf,
      asOfFrom: request.asOfFrom,
      asOfTo: request.asOfTo,
      limitSymbols: request.limitSymbols,
      dryRun: request.dryRun,
      status: 'running',
      symbolsCount: initialPlan.symbols.length,
      startedAt,
      finishedAt: null,
      notes: [...request.notes, ...initialPlan.notes],
      errorKind: null,
      errorMessage: null,
    };
    store.insertRun(record);
    logger.info(
      { runId, domains: initialPlan.domains, symbols: initialPlan.symbols.length, dryRun: request.dryRun },
      'Run started'
    );

    let plan = initialPlan;
    const outcomes: DomainOutcome[] = [];
    const runNotes: string[] = [];
    let abortError: IngestError | null = null;
    let cancelled = false;

    try {
      await this.deps.onRunStarted?.(runId);

      if (request.dryRun) {
        for (const domainPlan of plan.domainPlans) {
          const outcome = this.skippedOutcome(runId, domainPlan, nowIso(this.now()));
          store.insertDomainOutcome(outcome);
          outcomes.push(outcome);
        }
        runNotes.push(DRY_RUN_NOTE);
      } else {
        const rawClients = this.deps.createClients();
        const clients = profileClients(rawClients, request);
        const fetchContext: FetchContext = {
          clients,
          kisMaxPricePages: this.deps.kisMaxPricePages,
          today: todayIso(this.now()),
          now: () => nowIso(this.now()),
        };

        for (const domain of plan.domains) {
          if (this.deps.signal?.aborted) {
            cancelled = true;
            break;
          }
          const domainPlan = plan.domainPlans.find((p) => p.domain === domain);
          if (!domainPlan) continue;

          const domainStarted = nowIso(this.now());
          const skipReason = domainSkipReason(domain, request, rawClients, plan.universeSync);
          let outcome: DomainOutcome;
          if (skipReason) {
            runNotes.push(skipReason);
            outcome = this.skippedOutcome(runId, domainPlan, domainStarted);
          } else {
            const executed = await this.runDomain(runId, domainPlan, fetchContext);
            runNotes.push(...executed.notes);
            outcome = executed.outcome;
            cancelled = executed.cancelled;
          }
          store.insertDomainOutcome(outcome);
          outcomes.push(outcome);
          logger.info(
            { runId, domain, status: outcome.status, rowsWritten: outcome.rowsWritten, errors: outcome.errors.length },
            'Domain finished'
          );

          if (domain === 'symbols' && plan.universeSync) {
            if (outcome.status === 'failed') {
              const cause = outcome.errors[0]?.message ?? 'no symbols were written';
              abortError = new IngestError(
                'SymbolUniverseUnavailable',
                `symbol universe could not be established: ${cause}`
              );
              break;
            }
            try {
              plan = replanAfterUniverseSync(plan, request, this.plannerContext());
            } catch (error) {
              if (!(error instanceof EmptyScopeError)) throw error;
              abortError = new IngestError(
                'SymbolUniverseUnavailable',
                skipReason
                  ? `symbol universe is empty and was not synced (${skipReason}): ${error.message}`
                  : `symbol universe is empty after sync: ${error.message}`
              );
              break;
            }
          }
          if (cancelled) break;
        }
      }
    } catch (error) {
      const failure = toIngestError(error);
      logger.error({ runId, kind: failure.kind, err: failure.message }, 'Run failed unexpectedly');
      this.finalize(record, request.notes, plan, runNotes, 'failed', failure);
      throw failure;
    }

    if (cancelled) {
      runNotes.push('run cancelled before all work items were dispatched');
    }
    const status = computeRunStatus(outcomes, abortError !== null, cancelled);
    const run = this.finalize(record, request.notes, plan, runNotes, status, abortError);
    logger.info({ runId, status }, 'Run finished');
    return { run, outcomes, plan };
  }

  private finalize(
    record: RunRecord,
    requestNotes: string[],
    plan: RunPlan,
    runNotes: string[],
    status: RunStatus,
    error: IngestError | null
  ): RunRecord {
    const finished: RunRecord = {
      ...record,
      status,
      symbols: plan.symbols,
      symbolsCount: plan.symbols.length,
      finishedAt: nowIso(this.now()),
      notes: [...requestNotes, ...plan.notes, ...runNotes],
      errorKind: error?.kind ?? null,
      errorMessage: error?.message ?? null,
    };
    try {
      this.deps.store.finalizeRun({
        runId: finished.runId,
        status: finished.status,
        symbolsCount: finished.symbolsCount,
        symbols: finished.symbols,
        finishedAt: finished.finishedAt ?? nowIso(this.now()),
        notes: finished.notes,
        errorKind: finished.errorKind,
        errorMessage: finished.errorMessage,
      });
    } catch (finalizeError) {
      logger.error({ runId: record.runId, err: errorMessage(finalizeError) }, 'Run ledger could not be finalised');
      if (!error) throw finalizeError;
    }
    return finished;
  }

  private async runDomain(
    runId: string,
    plan: DomainPlan,
    context: FetchContext
  ): Promise<{ outcome: DomainOutcome; notes: string[]; cancelled: boolean }> {
    const fetcher = this.fetchers[plan.domain];
    const startedAt = nowIso(this.now());
    const state: DomainRunState = {
      processed: 0,
      succeeded: 0,
      rowsRead: 0,
      rowsWritten: 0,
      rowsSkipped: 0,
      errors: [],
      notes: [],
      fatal: [],
    };

    const task = async (item: WorkItem): Promise<void> => {
      try {
        const result = await fetcher.fetch(item, context);
        state.rowsRead += result.rowsRead;
        state.rowsSkipped += result.rowsSkipped;
        state.notes.push(...result.notes);
        state.rowsWritten += this.deps.store.saveBatch(runId, result.batch);
        state.succeeded++;
      } catch (error) {
        const entry = toOutcomeError(error, item, fetcher);
        state.errors.push(entry);
        logger.warn({ runId, domain: plan.domain, symbol: item.symbol, kind: entry.kind }, entry.message);
        if (error instanceof ProviderError && error.fatal) {
          state.fatal.push(error);
        }
      } finally {
        state.processed++;
      }
    };

    const signal = this.deps.signal;
    const report = await this.executor.run(
      plan.items,
      task,
      () => state.fatal.length > 0 || signal?.aborted === true
    );

    const firstFatal = state.fatal[0];
    if (firstFatal) {
      state.notes.push(`${plan.domain} stopped after fatal ${firstFatal.provider} error: ${firstFatal.message}`);
    }

    const outcome: DomainOutcome = {
      runId,
      domain: plan.domain,
      status: outcomeStatus(state, plan.items.length),
      plannedItems: plan.items.length,
      processedItems: state.processed,
      rowsRead: state.rowsRead,
      rowsWritten: state.rowsWritten,
      rowsSkipped: state.rowsSkipped,
      errors: state.errors,
      windowFrom: plan.window.from,
      windowTo: plan.window.to,
      startedAt,
      finishedAt: nowIso(this.now()),
    };
    const cancelled = report.stoppedEarly && !firstFatal && signal?.aborted === true;
    return { outcome, notes: state.notes, cancelled };
  }
}
