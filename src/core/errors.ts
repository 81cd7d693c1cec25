/**
 * Error taxonomy for the ingest runtime.
 * Every error that can reach the CLI carries a machine-readable `kind`.
 */

export type IngestErrorKind =
  | 'MissingCredential'
  | 'InvalidWindow'
  | 'EmptyScope'
  | 'InvalidRequest'
  | 'ProviderError'
  | 'RunNotFound'
  | 'PersistenceError'
  | 'SymbolUniverseUnavailable'
  | 'Internal';

export class IngestError extends Error {
  constructor(
    public readonly kind: IngestErrorKind,
    message: string,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = kind;
  }
}

export type CredentialKey = 'KIS_APP_KEY' | 'KIS_APP_SECRET' | 'KIS_ACCOUNT_NO' | 'DART_API_KEY';

export class MissingCredentialError extends IngestError {
  constructor(public readonly missing: CredentialKey[]) {
    super('MissingCredential', `Missing required credentials: ${missing.join(', ')}`, { missing });
  }
}

export class InvalidWindowError extends IngestError {
  constructor(message: string) {
    super('InvalidWindow', message);
  }
}

export class EmptyScopeError extends IngestError {
  constructor(message: string) {
    super('EmptyScope', message);
  }
}

export class InvalidRequestError extends IngestError {
  constructor(message: string) {
    super('InvalidRequest', message);
  }
}

export class RunNotFoundError extends IngestError {
  constructor(public readonly runId: string) {
    super('RunNotFound', `run_id not found: ${runId}`, { run_id: runId });
  }
}

export class PersistenceError extends IngestError {
  constructor(
    message: string,
    public readonly table: string,
    cause?: unknown
  ) {
    super('PersistenceError', message, { table }, { cause });
  }
}

export type ProviderName = 'kis' | 'dart';

export type ProviderFailureReason =
  | 'auth'
  | 'rate_limit'
  | 'not_found'
  | 'transport'
  | 'timeout'
  | 'api'
  | 'invalid_response';

export class ProviderError extends IngestError {
  constructor(
    message: string,
    public readonly provider: ProviderName,
    public readonly reason: ProviderFailureReason,
    public readonly status: number | null = null,
    cause?: unknown
  ) {
    super('ProviderError', message, { provider, reason, status }, { cause });
  }

  /** Auth failures poison every later call to the same provider. */
  get fatal(): boolean {
    return this.reason === 'auth';
  }

  get retryable(): boolean {
    return (
      this.reason === 'rate_limit' ||
      this.reason === 'timeout' ||
      this.reason === 'transport' ||
      (this.status !== null && this.status >= 500)
    );
  }
}

export function toIngestError(error: unknown): IngestError {
  if (error instanceof IngestError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new IngestError('Internal', message, {}, { cause: error });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
