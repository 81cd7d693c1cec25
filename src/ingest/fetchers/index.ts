import type { Domain } from '../types';
import { eventsFetcher } from './events';
import { financialsFetcher } from './financials';
import { fundamentalFetcher } from './fundamental';
import { marginsFetcher } from './margins';
import { pricesFetcher } from './prices';
import { symbolsFetcher } from './symbols';
import type { DomainFetcher } from './types';

export type { DomainFetcher, FetchContext } from './types';

export const DEFAULT_FETCHERS: Record<Domain, DomainFetcher> = {
  symbols: symbolsFetcher,
  prices: pricesFetcher,
  fundamental: fundamentalFetcher,
  financials: financialsFetcher,
  events: eventsFetcher,
  margins: marginsFetcher,
};
