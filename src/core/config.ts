/**
 * Runtime configuration loaded from config/ingest.json, with env overrides.
 * CLI flags are applied on top by the caller via `withOverrides`.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { z } from 'zod';
import { InvalidRequestError } from './errors';

const rateLimitSchema = z.object({
  requestsPerSecond: z.number().positive(),
  maxConcurrent: z.number().int().positive(),
});

const ingestConfigSchema = z.object({
  sqlitePath: z.string().min(1).default('data/stock_ingest.db'),
  timeoutSeconds: z.number().positive().default(20),
  kisBaseUrl: z.string().url().default('https://openapi.koreainvestment.com:9443'),
  dartBaseUrl: z.string().url().default('https://opendart.fss.or.kr/api'),
  kisMaxPricePages: z.number().int().positive().default(3),
  concurrency: z.number().int().positive().default(1),
  rateLimits: z
    .object({
      kis: rateLimitSchema.default({ requestsPerSecond: 15, maxConcurrent: 4 }),
      dart: rateLimitSchema.default({ requestsPerSecond: 10, maxConcurrent: 2 }),
    })
    .default({}),
  retry: z
    .object({
      maxRetries: z.number().int().min(0).default(3),
      initialBackoffMs: z.number().int().min(0).default(500),
    })
    .default({}),
});

export type IngestConfig = z.infer<typeof ingestConfigSchema> & { projectRoot: string };

export interface ConfigOverrides {
  sqlitePath?: string;
  timeoutSeconds?: number;
  kisBaseUrl?: string;
  dartBaseUrl?: string;
  kisMaxPricePages?: number;
  concurrency?: number;
}

let cachedConfig: IngestConfig | null = null;

function getProjectRoot(): string {
  return process.cwd();
}

function readConfigFile(projectRoot: string, env: NodeJS.ProcessEnv): unknown {
  const configPath = env.STOCK_INGEST_CONFIG
    ? resolveFromRoot(projectRoot, env.STOCK_INGEST_CONFIG)
    : join(projectRoot, 'config', 'ingest.json');
  if (!existsSync(configPath)) return {};
  try {
    return JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new InvalidRequestError(
      `Config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function envOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (env.STOCK_INGEST_SQLITE_PATH) overrides.sqlitePath = env.STOCK_INGEST_SQLITE_PATH;
  if (env.KIS_BASE_URL) overrides.kisBaseUrl = env.KIS_BASE_URL;
  if (env.DART_BASE_URL) overrides.dartBaseUrl = env.DART_BASE_URL;
  if (env.STOCK_INGEST_CONCURRENCY) {
    const parsed = Number.parseInt(env.STOCK_INGEST_CONCURRENCY, 10);
    if (Number.isFinite(parsed) && parsed > 0) overrides.concurrency = parsed;
  }
  return overrides;
}

function resolveFromRoot(projectRoot: string, path: string): string {
  return isAbsolute(path) ? path : join(projectRoot, path);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): IngestConfig {
  const projectRoot = getProjectRoot();
  const result = ingestConfigSchema.safeParse(readConfigFile(projectRoot, env));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new InvalidRequestError(`Invalid ingest config: ${issues.join('; ')}`);
  }
  return withOverrides({ ...result.data, projectRoot }, envOverrides(env));
}

export function withOverrides(config: IngestConfig, overrides: ConfigOverrides): IngestConfig {
  return {
    ...config,
    sqlitePath: resolveFromRoot(config.projectRoot, overrides.sqlitePath ?? config.sqlitePath),
    timeoutSeconds: overrides.timeoutSeconds ?? config.timeoutSeconds,
    kisBaseUrl: (overrides.kisBaseUrl ?? config.kisBaseUrl).replace(/\/+$/, ''),
    dartBaseUrl: (overrides.dartBaseUrl ?? config.dartBaseUrl).replace(/\/+$/, ''),
    kisMaxPricePages: overrides.kisMaxPricePages ?? config.kisMaxPricePages,
    concurrency: overrides.concurrency ?? config.concurrency,
  };
}

export function getConfig(): IngestConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
