/**
 * Open DART (regulatory filings) API client
 */

import { strFromU8 } from 'fflate';
import { ProviderError, type ProviderFailureReason } from '@/core/errors';
import { createChildLogger } from '@/utils/logger';
import { HttpClient, type FetchLike, type RetryOptions } from '../http';
import type { RateLimiter } from '../rate_limiter';
import { extractCorpCodeXml, parseCorpCodeXml } from './corp_codes';
import {
  DART_STATUS,
  dartListResponseSchema,
  type DartApi,
  type DartCorpCode,
  type DartDisclosurePage,
} from './types';

const logger = createChildLogger('dart');

const PAGE_COUNT = 100;

export interface DartClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  retry: RetryOptions;
  rateLimiter: RateLimiter;
  fetchImpl?: FetchLike;
}

export function classifyDartStatus(status: string): ProviderFailureReason {
  switch (status) {
    case DART_STATUS.UNREGISTERED_KEY:
    case DART_STATUS.DISABLED_KEY:
    case DART_STATUS.IP_NOT_ALLOWED:
      return 'auth';
    case DART_STATUS.RATE_LIMITED:
      return 'rate_limit';
    default:
      return 'api';
  }
}

function isZipArchive(bytes: Uint8Array): boolean {
  return bytes.length >= 4 && bytes[0] === 0x50 && bytes[1] === 0x4b;
}

export class DartClient implements DartApi {
  private readonly http: HttpClient;

  constructor(private readonly options: DartClientOptions) {
    this.http = new HttpClient({
      provider: 'dart',
      baseUrl: options.baseUrl,
      timeoutMs: options.timeoutMs,
      retry: options.retry,
      rateLimiter: options.rateLimiter,
      secrets: [options.apiKey],
      fetchImpl: options.fetchImpl,
    });
  }

  private statusError(path: string, status: string, message: string): ProviderError {
    return new ProviderError(
      this.http.redact(`dart: ${path} returned status ${status}${message ? ` (${message})` : ''}`),
      'dart',
      classifyDartStatus(status)
    );
  }

  async fetchCorpCodes(): Promise<DartCorpCode[]> {
    const path = '/corpCode.xml';
    const bytes = await this.http.getBytes(path, { crtfc_key: this.options.apiKey });

    if (!isZipArchive(bytes)) {
      // Errors come back as a bare XML/JSON status document instead of a zip
      const text = strFromU8(bytes);
      const status = /<status>(\d+)<\/status>/.exec(text)?.[1] ?? /"status"\s*:\s*"(\d+)"/.exec(text)?.[1];
      const message = /<message>([^<]*)<\/message>/.exec(text)?.[1] ?? '';
      throw status
        ? this.statusError(path, status, message)
        : new ProviderError('dart: corpCode response was not a zip archive', 'dart', 'invalid_response');
    }

    try {
      const entries = parseCorpCodeXml(extractCorpCodeXml(bytes));
      logger.info({ entries: entries.length }, 'Loaded DART corp codes');
      return entries;
    } catch (error) {
      throw new ProviderError(
        `dart: corpCode archive could not be parsed: ${error instanceof Error ? error.message : String(error)}`,
        'dart',
        'invalid_response',
        null,
        error
      );
    }
  }

  async fetchDisclosures(
    corpCode: string,
    fromYmd: string,
    toYmd: string,
    pageNo: number
  ): Promise<DartDisclosurePage> {
    const path = '/list.json';
    const data = await this.http.getJson(
      path,
      {
        crtfc_key: this.options.apiKey,
        corp_code: corpCode,
        bgn_de: fromYmd,
        end_de: toYmd,
        page_no: pageNo,
        page_count: PAGE_COUNT,
      },
      dartListResponseSchema
    );

    if (data.status === DART_STATUS.NO_DATA) {
      return { items: [], pageNo, totalPage: 0 };
    }
    if (data.status !== DART_STATUS.OK) {
      throw this.statusError(path, data.status, data.message);
    }
    return {
      items: data.list,
      pageNo: data.page_no ?? pageNo,
      totalPage: data.total_page ?? 1,
    };
  }
}
