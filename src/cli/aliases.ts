/**
 * Deprecated command names, rewritten before commander sees argv.
 */

export const DEPRECATED_COMMANDS: Readonly<Record<string, string>> = {
  ingest: 'run',
  'backend-ingest': 'run',
  check: 'db-check',
  config: 'help',
};

/** Global options that consume the following argv token. */
const VALUE_OPTIONS = new Set([
  '--sqlite-path',
  '--timeout',
  '--kis-base-url',
  '--dart-base-url',
  '--kis-max-price-pages',
  '--concurrency',
  '--env-file',
]);

export interface AliasRewrite {
  argv: string[];
  notes: string[];
}

function commandIndex(argv: string[]): number {
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === '--') return i + 1 < argv.length ? i + 1 : -1;
    if (token.startsWith('-')) {
      if (VALUE_OPTIONS.has(token)) i++;
      continue;
    }
    return i;
  }
  return -1;
}

function deprecationNote(alias: string, canonical: string): string {
  if (alias === 'config') {
    return 'deprecated command "config": credentials are read from the environment (.env.local, .env or --env-file); showing help instead';
  }
  return `deprecated command "${alias}": use "${canonical}"`;
}

export function rewriteDeprecatedAliases(argv: string[], env: NodeJS.ProcessEnv = process.env): AliasRewrite {
  const index = commandIndex(argv);
  if (index < 0) return { argv, notes: [] };

  const alias = argv[index];
  const canonical = DEPRECATED_COMMANDS[alias];
  if (!canonical) return { argv, notes: [] };

  const rewritten = [...argv];
  rewritten[index] = canonical;
  const silenced = env.STOCK_INGEST_SILENCE_DEPRECATION === '1';
  return { argv: rewritten, notes: silenced ? [] : [deprecationNote(alias, canonical)] };
}
