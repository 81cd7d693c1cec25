/**
 * Credential handling. Values are read from the process environment
 * (populated by dotenv at the entry point) and are never logged or printed.
 */

import type { CredentialKey } from './errors';

export interface Credentials {
  kisAppKey: string | null;
  kisAppSecret: string | null;
  kisAccountNo: string | null;
  dartApiKey: string | null;
}

export const CREDENTIAL_ENV: Record<keyof Credentials, CredentialKey> = {
  kisAppKey: 'KIS_APP_KEY',
  kisAppSecret: 'KIS_APP_SECRET',
  kisAccountNo: 'KIS_ACCOUNT_NO',
  dartApiKey: 'DART_API_KEY',
};

export const CREDENTIAL_FIELDS: Record<CredentialKey, keyof Credentials> = {
  KIS_APP_KEY: 'kisAppKey',
  KIS_APP_SECRET: 'kisAppSecret',
  KIS_ACCOUNT_NO: 'kisAccountNo',
  DART_API_KEY: 'dartApiKey',
};

function getEnvVar(name: string, env: NodeJS.ProcessEnv): string | null {
  const value = env[name];
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  return {
    kisAppKey: getEnvVar(CREDENTIAL_ENV.kisAppKey, env),
    kisAppSecret: getEnvVar(CREDENTIAL_ENV.kisAppSecret, env),
    kisAccountNo: getEnvVar(CREDENTIAL_ENV.kisAccountNo, env),
    dartApiKey: getEnvVar(CREDENTIAL_ENV.dartApiKey, env),
  };
}

export const NO_CREDENTIALS: Credentials = {
  kisAppKey: null,
  kisAppSecret: null,
  kisAccountNo: null,
  dartApiKey: null,
};
