#!/usr/bin/env -S npx tsx
/**
 * stock-ingest entry point
 *
 * Usage: npx tsx scripts/stock_ingest.ts run --symbol 005930 --run-type prices
 */

import { exitCodeFor, runCli } from '../src/cli/program';
import { loadEnvFiles } from '../src/cli/env_files';
import { formatError } from '../src/cli/format';
import { IngestError } from '../src/core/errors';
import { buildErrorPayload } from '../src/ingest/summary';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('stock_ingest');

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  try {
    loadEnvFiles(argv);
  } catch (error) {
    if (!(error instanceof IngestError)) throw error;
    const payload = buildErrorPayload(error);
    if (argv.includes('--json')) {
      process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`);
    } else {
      process.stderr.write(`${formatError(payload)}\n`);
    }
    return exitCodeFor(error.kind);
  }

  const controller = new AbortController();
  const cancel = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, 'Cancellation requested, finishing in-flight work items');
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  return runCli(argv, {
    env: process.env,
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    signal: controller.signal,
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error({ err: error instanceof Error ? error.message : String(error) }, 'stock-ingest crashed');
    process.exitCode = 1;
  });
