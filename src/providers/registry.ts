import type { IngestConfig } from '@/core/config';
import type { Credentials } from '@/core/env';
import type { FetchLike } from './http';
import { DartClient } from './dart/client';
import { KisClient } from './kis/client';
import { RateLimiter } from './rate_limiter';
import type { ProviderClients } from './types';

/**
 * Build provider clients for the credentials that are present.
 * Each client owns its own rate limiter so KIS and DART budgets stay independent.
 */
export function createProviderClients(
  credentials: Credentials,
  config: IngestConfig,
  fetchImpl?: FetchLike
): ProviderClients {
  const timeoutMs = Math.round(config.timeoutSeconds * 1000);

  const kis =
    credentials.kisAppKey && credentials.kisAppSecret
      ? new KisClient({
          appKey: credentials.kisAppKey,
          appSecret: credentials.kisAppSecret,
          accountNo: credentials.kisAccountNo,
          baseUrl: config.kisBaseUrl,
          timeoutMs,
          retry: config.retry,
          rateLimiter: RateLimiter.perSecond(
            'kis',
            config.rateLimits.kis.requestsPerSecond,
            config.rateLimits.kis.maxConcurrent
          ),
          fetchImpl,
        })
      : null;

  const dart =
    credentials.dartApiKey
      ? new DartClient({
          apiKey: credentials.dartApiKey,
          baseUrl: config.dartBaseUrl,
          timeoutMs,
          retry: config.retry,
          rateLimiter: RateLimiter.perSecond(
            'dart',
            config.rateLimits.dart.requestsPerSecond,
            config.rateLimits.dart.maxConcurrent
          ),
          fetchImpl,
        })
      : null;

  return { kis, dart };
}
