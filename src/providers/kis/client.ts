/**
 * KIS (Korea Investment & Securities) Open API client
 * OAuth token issuance, rate limiting and retry via the shared HttpClient.
 */

import type { z } from 'zod';
import { ProviderError, type ProviderFailureReason } from '@/core/errors';
import { createChildLogger } from '@/utils/logger';
import { HttpClient, type FetchLike, type QueryParams, type RetryOptions } from '../http';
import type { RateLimiter } from '../rate_limiter';
import {
  kisCurrentPriceSchema,
  kisDailyChartSchema,
  kisFinanceSchema,
  kisIntegratedMarginSchema,
  kisOrderableSchema,
  kisStockInfoSchema,
  kisTokenResponseSchema,
  type KisApi,
  type KisCandle,
  type KisCurrentPrice,
  type KisEnvelope,
  type KisFinanceEndpoint,
  type KisFinanceRow,
  type KisIntegratedMargin,
  type KisOrderable,
  type KisReportTerm,
  type KisStockInfo,
  type KisTimeframe,
} from './types';

const logger = createChildLogger('kis');

const RATE_LIMIT_MSG_CODE = 'EGW00201';
const AUTH_MSG_CODES = new Set(['EGW00121', 'EGW00123', 'EGW00205', 'EGW00206']);

export interface KisClientOptions {
  appKey: string;
  appSecret: string;
  accountNo: string | null;
  baseUrl: string;
  timeoutMs: number;
  retry: RetryOptions;
  rateLimiter: RateLimiter;
  fetchImpl?: FetchLike;
}

function classifyKisBody(_status: number, body: string): ProviderFailureReason | null {
  if (body.includes(RATE_LIMIT_MSG_CODE)) return 'rate_limit';
  for (const code of AUTH_MSG_CODES) {
    if (body.includes(code)) return 'auth';
  }
  return null;
}

export class KisClient implements KisApi {
  private readonly http: HttpClient;
  private tokenPromise: Promise<string> | null = null;

  constructor(private readonly options: KisClientOptions) {
    this.http = new HttpClient({
      provider: 'kis',
      baseUrl: options.baseUrl,
      timeoutMs: options.timeoutMs,
      retry: options.retry,
      rateLimiter: options.rateLimiter,
      secrets: [options.appKey, options.appSecret, options.accountNo],
      fetchImpl: options.fetchImpl,
      classifyErrorBody: classifyKisBody,
    });
  }

  private token(): Promise<string> {
    if (!this.tokenPromise) {
      this.tokenPromise = this.issueToken().catch((error: unknown) => {
        this.tokenPromise = null;
        throw error;
      });
    }
    return this.tokenPromise;
  }

  private async issueToken(): Promise<string> {
    logger.debug('Issuing KIS access token');
    try {
      const data = await this.http.postJson('/oauth2/tokenP', {
        grant_type: 'client_credentials',
        appkey: this.options.appKey,
        appsecret: this.options.appSecret,
      }, kisTokenResponseSchema);
      return data.access_token;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      const status = error instanceof ProviderError ? error.status : null;
      throw new ProviderError(
        this.http.redact(`kis: access token issuance failed (${detail})`),
        'kis',
        'auth',
        status,
        error
      );
    }
  }

  private async get<S extends z.ZodType<KisEnvelope, z.ZodTypeDef, unknown>>(
    path: string,
    trId: string,
    params: QueryParams,
    schema: S
  ): Promise<z.output<S>> {
    const token = await this.token();
    const data = await this.http.getJson(path, params, schema, {
      authorization: `Bearer ${token}`,
      appkey: this.options.appKey,
      appsecret: this.options.appSecret,
      tr_id: trId,
      custtype: 'P',
    });
    if (data.rt_cd !== '0') {
      const reason: ProviderFailureReason =
        data.msg_cd === RATE_LIMIT_MSG_CODE ? 'rate_limit' : AUTH_MSG_CODES.has(data.msg_cd) ? 'auth' : 'api';
      throw new ProviderError(
        this.http.redact(`kis: ${trId} rejected: [${data.msg_cd}] ${data.msg1}`.trim()),
        'kis',
        reason
      );
    }
    return data;
  }

  private account(): { CANO: string; ACNT_PRDT_CD: string } {
    const accountNo = (this.options.accountNo ?? '').replace(/\D/g, '');
    if (accountNo.length < 10) {
      throw new ProviderError(
        'kis: account number must have 10 digits (8-digit account + 2-digit product code)',
        'kis',
        'auth'
      );
    }
    return { CANO: accountNo.slice(0, 8), ACNT_PRDT_CD: accountNo.slice(8, 10) };
  }

  async fetchStockInfo(symbol: string): Promise<KisStockInfo> {
    const data = await this.get(
      '/uapi/domestic-stock/v1/quotations/search-stock-info',
      'CTPF1002R',
      { PRDT_TYPE_CD: '300', PDNO: symbol },
      kisStockInfoSchema
    );
    return data.output ?? {};
  }

  async fetchChartPage(
    symbol: string,
    timeframe: KisTimeframe,
    fromYmd: string,
    toYmd: string
  ): Promise<KisCandle[]> {
    const data = await this.get(
      '/uapi/domestic-stock/v1/quotations/inquire-daily-itemchartprice',
      'FHKST03010100',
      {
        FID_COND_MRKT_DIV_CODE: 'J',
        FID_INPUT_ISCD: symbol,
        FID_INPUT_DATE_1: fromYmd,
        FID_INPUT_DATE_2: toYmd,
        FID_PERIOD_DIV_CODE: timeframe,
        FID_ORG_ADJ_PRC: '0',
      },
      kisDailyChartSchema
    );
    return data.output2;
  }

  async fetchCurrentPrice(symbol: string): Promise<KisCurrentPrice> {
    const data = await this.get(
      '/uapi/domestic-stock/v1/quotations/inquire-price',
      'FHKST01010100',
      { FID_COND_MRKT_DIV_CODE: 'J', FID_INPUT_ISCD: symbol },
      kisCurrentPriceSchema
    );
    return data.output ?? {};
  }

  async fetchFinanceRows(
    endpoint: KisFinanceEndpoint,
    symbol: string,
    term: KisReportTerm
  ): Promise<KisFinanceRow[]> {
    const data = await this.get(
      endpoint.path,
      endpoint.trId,
      {
        FID_DIV_CLS_CODE: term === 'annual' ? '0' : '1',
        fid_cond_mrkt_div_code: 'J',
        fid_input_iscd: symbol,
      },
      kisFinanceSchema
    );
    return data.output;
  }

  async fetchOrderable(symbol: string): Promise<KisOrderable> {
    const data = await this.get(
      '/uapi/domestic-stock/v1/trading/inquire-psbl-order',
      'TTTC8908R',
      {
        ...this.account(),
        PDNO: symbol,
        ORD_UNPR: '0',
        ORD_DVSN: '01',
        CMA_EVLU_AMT_ICLD_YN: 'Y',
        OVRS_ICLD_YN: 'N',
      },
      kisOrderableSchema
    );
    return data.output ?? {};
  }

  async fetchIntegratedMargin(symbol: string): Promise<KisIntegratedMargin> {
    const data = await this.get(
      '/uapi/domestic-stock/v1/trading/intgr-margin',
      'TTTC0869R',
      {
        ...this.account(),
        PDNO: symbol,
        CMA_EVLU_AMT_ICLD_YN: 'N',
        WCRC_FRCR_DVSN_CD: '01',
        FWEX_CTRT_FRCR_DVSN_CD: '01',
      },
      kisIntegratedMarginSchema
    );
    return data.output ?? {};
  }
}
