/**
 * Provider clients handed to the domain fetchers.
 *
 * A client is null when its credentials are absent; the orchestrator then
 * records the dependent domains as skipped instead of calling out.
 */
import type { DartApi } from './dart/types';
import type { KisApi } from './kis/types';

export type { ProviderName } from '@/core/errors';
export type { DartApi } from './dart/types';
export type { KisApi } from './kis/types';

export interface ProviderClients {
  kis: KisApi | null;
  dart: DartApi | null;
}
