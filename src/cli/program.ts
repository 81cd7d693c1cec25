/**
 * `stock-ingest` command-line program.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { loadConfig, withOverrides, type ConfigOverrides, type IngestConfig } from '@/core/config';
import { loadCredentials } from '@/core/env';
import { IngestError, toIngestError, type IngestErrorKind } from '@/core/errors';
import { closeDatabase } from '@/data/db';
import { createSqliteStore } from '@/data/store';
import { RunOrchestrator } from '@/ingest/orchestrator';
import { buildRunRequest, type RawRunInput } from '@/ingest/request';
import { dbCheck, getRunStatus } from '@/ingest/status';
import { buildErrorPayload, buildRunSummary, type IngestSummary } from '@/ingest/summary';
import { PRICES_WINDOWS, RUN_TYPES, SCOPES, SOURCE_PROFILES, TIMEFRAMES } from '@/ingest/types';
import type { FetchLike } from '@/providers/http';
import { createProviderClients } from '@/providers/registry';
import { validateAndThrow } from '@/run/validator';
import { createChildLogger } from '@/utils/logger';
import { rewriteDeprecatedAliases } from './aliases';
import { formatError, formatSummary } from './format';

const logger = createChildLogger('cli');

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;
export const EXIT_SETUP = 3;

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
  now?: () => Date;
}

interface GlobalOptions {
  json?: boolean;
  sqlitePath?: string;
  timeout?: number;
  kisBaseUrl?: string;
  dartBaseUrl?: string;
  kisMaxPricePages?: number;
  concurrency?: number;
  envFile?: string;
}

interface RunOptions {
  runType: string[];
  scope: string;
  symbol?: string[];
  symbols?: string;
  sourceProfile: string;
  timeframes: string[];
  asOf?: string;
  asOfFrom?: string;
  asOfTo?: string;
  pricesWindow: string;
  pricesLookbackDays?: string;
  pricesBackfill?: boolean;
  limitSymbols?: string;
  dryRun?: boolean;
}

export function exitCodeFor(kind: IngestErrorKind): number {
  switch (kind) {
    case 'MissingCredential':
      return EXIT_SETUP;
    case 'InvalidWindow':
    case 'EmptyScope':
    case 'InvalidRequest':
      return EXIT_USAGE;
    default:
      return EXIT_FAILED;
  }
}

function positiveNumber(integer: boolean) {
  return (raw: string): number => {
    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
      throw new InvalidArgumentError(`expected a positive ${integer ? 'integer' : 'number'}`);
    }
    return value;
  };
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

function resolveConfig(env: NodeJS.ProcessEnv, opts: GlobalOptions): IngestConfig {
  const overrides: ConfigOverrides = {
    sqlitePath: opts.sqlitePath,
    timeoutSeconds: opts.timeout,
    kisBaseUrl: opts.kisBaseUrl,
    dartBaseUrl: opts.dartBaseUrl,
    kisMaxPricePages: opts.kisMaxPricePages,
    concurrency: opts.concurrency,
  };
  return withOverrides(loadConfig(env), overrides);
}

/** Parses argv (without the node and script entries) and returns the exit code. */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const { argv: args, notes: aliasNotes } = rewriteDeprecatedAliases(argv, deps.env);
  let exitCode = EXIT_OK;
  let startedRunId: string | undefined;

  const program = new Command();

  const emit = (summary: IngestSummary, json: boolean) => {
    const withNotes = { ...summary, notes: [...aliasNotes.filter((n) => !summary.notes.includes(n)), ...summary.notes] };
    const valid = validateAndThrow(withNotes);
    deps.stdout(json ? JSON.stringify(valid, null, 2) : formatSummary(valid));
  };

  const fail = (error: unknown, json: boolean) => {
    const ingestError = toIngestError(error);
    const payload = buildErrorPayload(ingestError, startedRunId);
    if (json) {
      deps.stdout(JSON.stringify(payload, null, 2));
    } else {
      deps.stderr(formatError(payload));
    }
    exitCode = exitCodeFor(ingestError.kind);
  };

  program
    .name('stock-ingest')
    .description('Ingest KIS market data and DART filings into a local SQLite store')
    .option('--json', 'print JSON instead of human-readable output')
    .option('--sqlite-path <path>', 'SQLite database path')
    .option('--timeout <seconds>', 'HTTP timeout per request', positiveNumber(false))
    .option('--kis-base-url <url>', 'KIS Open API base URL')
    .option('--dart-base-url <url>', 'Open DART API base URL')
    .option('--kis-max-price-pages <n>', 'max chart pages per symbol and timeframe', positiveNumber(true))
    .option('--concurrency <n>', 'work items run at once within a domain', positiveNumber(true))
    .option('--env-file <path>', 'env file with credentials (default .env.local then .env)')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.stdout(text.trimEnd()),
      writeErr: (text) => deps.stderr(text.trimEnd()),
    });

  program
    .command('run')
    .description('run an ingest')
    .addOption(new Option('--run-type <type...>', 'domains to ingest').choices(RUN_TYPES).default(['all']))
    .addOption(new Option('--scope <scope>', 'explicit symbols or the whole universe').choices(SCOPES).default('single'))
    .option('--symbol <code>', 'stock code (repeatable)', collect)
    .option('--symbols <csv>', 'comma-separated stock codes')
    .addOption(
      new Option('--source-profile <profile>', 'providers allowed to be queried').choices(SOURCE_PROFILES).default('all')
    )
    .addOption(new Option('--timeframes <tf...>', 'candle timeframes').choices(TIMEFRAMES).default(['D']))
    .option('--as-of <date>', 'as-of date (YYYY-MM-DD)')
    .option('--as-of-from <date>', 'window start (YYYY-MM-DD)')
    .option('--as-of-to <date>', 'window end (YYYY-MM-DD)')
    .addOption(new Option('--prices-window <window>', 'prices window preset').choices(PRICES_WINDOWS).default('fast'))
    .option('--prices-lookback-days <n>', 'prices lookback override in days')
    .option('--prices-backfill', 'backfill prices from the listing date')
    .option('--limit-symbols <n>', 'cap the symbol count under scope=all')
    .option('--dry-run', 'plan and record the run without provider calls')
    .action(async (cmdOpts: RunOptions) => {
      const globals = program.opts<GlobalOptions>();
      const json = globals.json === true;
      try {
        const config = resolveConfig(deps.env, globals);
        const input: RawRunInput = {
          runTypes: cmdOpts.runType,
          scope: cmdOpts.scope,
          symbol: cmdOpts.symbol,
          symbols: cmdOpts.symbols,
          sourceProfile: cmdOpts.sourceProfile,
          timeframes: cmdOpts.timeframes,
          asOf: cmdOpts.asOf,
          asOfFrom: cmdOpts.asOfFrom,
          asOfTo: cmdOpts.asOfTo,
          pricesWindow: cmdOpts.pricesWindow,
          pricesLookbackDays: cmdOpts.pricesLookbackDays,
          pricesBackfill: cmdOpts.pricesBackfill,
          limitSymbols: cmdOpts.limitSymbols,
          dryRun: cmdOpts.dryRun,
        };
        const parsed = buildRunRequest(input);
        const request = { ...parsed, notes: [...aliasNotes, ...parsed.notes] };
        const credentials = loadCredentials(deps.env);
        const store = createSqliteStore(config.sqlitePath);

        const orchestrator = new RunOrchestrator({
          store,
          credentials,
          createClients: () => createProviderClients(credentials, config, deps.fetchImpl),
          kisMaxPricePages: config.kisMaxPricePages,
          concurrency: config.concurrency,
          signal: deps.signal,
          now: deps.now,
          onRunStarted: (runId) => {
            startedRunId = runId;
          },
        });
        const result = await orchestrator.run(request);
        emit(buildRunSummary(result.run, result.outcomes), json);
        exitCode = result.run.status === 'succeeded' ? EXIT_OK : EXIT_FAILED;
      } catch (error) {
        fail(error, json);
      }
    });

  program
    .command('status')
    .description('show a recorded run')
    .argument('<run_id>')
    .action((runId: string) => {
      const globals = program.opts<GlobalOptions>();
      const json = globals.json === true;
      try {
        const store = createSqliteStore(resolveConfig(deps.env, globals).sqlitePath);
        emit(getRunStatus(store, runId), json);
      } catch (error) {
        fail(error, json);
      }
    });

  program
    .command('db-check')
    .description('compare recorded row counts with the data tables')
    .argument('<run_id>')
    .action((runId: string) => {
      const globals = program.opts<GlobalOptions>();
      const json = globals.json === true;
      try {
        const store = createSqliteStore(resolveConfig(deps.env, globals).sqlitePath);
        emit(dbCheck(store, runId), json);
      } catch (error) {
        fail(error, json);
      }
    });

  try {
    logger.debug({ command: args[0] ?? null, aliased: aliasNotes.length > 0 }, 'Parsing command line');
    await program.parseAsync(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.exitCode === 0) {
        for (const note of aliasNotes) deps.stderr(note);
      }
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    if (error instanceof IngestError) {
      fail(error, program.opts<GlobalOptions>().json === true);
      return exitCode;
    }
    throw error;
  } finally {
    closeDatabase();
  }

  return exitCode;
}
