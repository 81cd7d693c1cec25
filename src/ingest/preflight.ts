/**
 * Credential sufficiency check, run before any run row is written.
 */

import { MissingCredentialError, type CredentialKey } from '@/core/errors';
import { CREDENTIAL_FIELDS, type Credentials } from '@/core/env';
import { DOMAIN_ORDER, type Domain, type RunRequest, type RunType } from './types';

const CREDENTIAL_ORDER: CredentialKey[] = ['KIS_APP_KEY', 'KIS_APP_SECRET', 'KIS_ACCOUNT_NO', 'DART_API_KEY'];

/** `all` expands to every domain; the result follows the fixed domain order. */
export function expandRunTypes(runTypes: RunType[]): Domain[] {
  const requested = new Set(runTypes);
  if (requested.has('all')) return [...DOMAIN_ORDER];
  return DOMAIN_ORDER.filter((domain) => requested.has(domain));
}

export function requiredCredentials(request: RunRequest): CredentialKey[] {
  const domains = new Set(expandRunTypes(request.runTypes));
  const usesKis = request.sourceProfile === 'all' || request.sourceProfile === 'kis';
  const required = new Set<CredentialKey>();

  if (usesKis && (domains.has('prices') || domains.has('financials') || domains.has('margins'))) {
    required.add('KIS_APP_KEY');
    required.add('KIS_APP_SECRET');
  }
  if (usesKis && domains.has('margins')) {
    required.add('KIS_ACCOUNT_NO');
  }
  if (request.scope === 'all' || domains.has('events')) {
    required.add('DART_API_KEY');
  }

  return CREDENTIAL_ORDER.filter((key) => required.has(key));
}

export function missingCredentials(request: RunRequest, credentials: Credentials): CredentialKey[] {
  return requiredCredentials(request).filter((key) => credentials[CREDENTIAL_FIELDS[key]] === null);
}

/** Throws one MissingCredentialError naming every absent key. Dry runs pass unconditionally. */
export function runPreflight(request: RunRequest, credentials: Credentials): void {
  if (request.dryRun) return;
  const missing = missingCredentials(request, credentials);
  if (missing.length > 0) {
    throw new MissingCredentialError(missing);
  }
}
