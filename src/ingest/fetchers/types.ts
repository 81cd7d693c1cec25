import type { ProviderName } from '@/core/errors';
import type { DartApi, KisApi, ProviderClients } from '@/providers/types';
import type { Domain, FetchResult, WorkItem } from '../types';

export interface FetchContext {
  /** Clients already filtered by the run's source profile. */
  clients: ProviderClients;
  kisMaxPricePages: number;
  /** YYYY-MM-DD */
  today: string;
  now(): string;
}

export interface DomainFetcher {
  readonly domain: Domain;
  /** Provider an unexpected (non-provider) failure is attributed to. */
  providerFor(item: WorkItem): ProviderName;
  fetch(item: WorkItem, context: FetchContext): Promise<FetchResult>;
}

export function requireKis(context: FetchContext, domain: Domain): KisApi {
  if (!context.clients.kis) {
    throw new Error(`${domain} fetcher needs a KIS client`);
  }
  return context.clients.kis;
}

export function requireDart(context: FetchContext, domain: Domain): DartApi {
  if (!context.clients.dart) {
    throw new Error(`${domain} fetcher needs a DART client`);
  }
  return context.clients.dart;
}
