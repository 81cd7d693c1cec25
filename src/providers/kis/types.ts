/**
 * KIS Open API response schemas, one per endpoint.
 * Numeric fields arrive as strings and are converted by the domain mappers.
 */

import { z } from 'zod';

const numericField = z.union([z.string(), z.number()]).optional();

const envelope = z.object({
  rt_cd: z.string(),
  msg_cd: z.string().optional().default(''),
  msg1: z.string().optional().default(''),
});

export type KisEnvelope = z.infer<typeof envelope>;

export const kisTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
});

export const kisStockInfoSchema = envelope.extend({
  output: z
    .object({
      pdno: z.string().optional(),
      prdt_abrv_name: z.string().optional(),
      prdt_name: z.string().optional(),
      mket_id_cd: z.string().optional(),
      scts_mket_lstg_dt: z.string().optional(),
      kosdaq_mket_lstg_dt: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

export type KisStockInfo = NonNullable<z.infer<typeof kisStockInfoSchema>['output']>;

export const kisCandleSchema = z
  .object({
    stck_bsop_date: z.string().optional().default(''),
    stck_oprc: numericField,
    stck_hgpr: numericField,
    stck_lwpr: numericField,
    stck_clpr: numericField,
    acml_vol: numericField,
    acml_tr_pbmn: numericField,
  })
  .passthrough();

export type KisCandle = z.infer<typeof kisCandleSchema>;

export const kisDailyChartSchema = envelope.extend({
  output1: z.unknown().optional(),
  output2: z.array(kisCandleSchema).optional().default([]),
});

export const kisCurrentPriceSchema = envelope.extend({
  output: z
    .object({
      stck_prpr: numericField,
      per: numericField,
      pbr: numericField,
      eps: numericField,
      bps: numericField,
      hts_avls: numericField,
      lstn_stcn: numericField,
      w52_hgpr: numericField,
      w52_lwpr: numericField,
    })
    .passthrough()
    .optional(),
});

export type KisCurrentPrice = NonNullable<z.infer<typeof kisCurrentPriceSchema>['output']>;

export const kisFinanceSchema = envelope.extend({
  output: z
    .array(z.record(z.string(), z.union([z.string(), z.number(), z.null()])))
    .optional()
    .default([]),
});

export type KisFinanceRow = z.infer<typeof kisFinanceSchema>['output'][number];

export const kisOrderableSchema = envelope.extend({
  output: z
    .object({
      ord_psbl_cash: numericField,
      max_buy_qty: numericField,
      max_buy_amt: numericField,
      nrcvb_buy_qty: numericField,
    })
    .passthrough()
    .optional(),
});

export type KisOrderable = NonNullable<z.infer<typeof kisOrderableSchema>['output']>;

export const kisIntegratedMarginSchema = envelope.extend({
  output: z
    .object({
      acmga_rt: numericField,
    })
    .passthrough()
    .optional(),
});

export type KisIntegratedMargin = NonNullable<z.infer<typeof kisIntegratedMarginSchema>['output']>;

export type KisTimeframe = 'D' | 'W' | 'M' | 'Y';
export type KisReportTerm = 'annual' | 'quarterly';

export const KIS_FINANCE_ENDPOINTS = [
  { reportType: 'BS', path: '/uapi/domestic-stock/v1/finance/balance-sheet', trId: 'FHKST66430100' },
  { reportType: 'IS', path: '/uapi/domestic-stock/v1/finance/income-statement', trId: 'FHKST66430200' },
  { reportType: 'RATIO', path: '/uapi/domestic-stock/v1/finance/financial-ratio', trId: 'FHKST66430300' },
  { reportType: 'PROFIT', path: '/uapi/domestic-stock/v1/finance/profit-ratio', trId: 'FHKST66430400' },
  { reportType: 'ETC', path: '/uapi/domestic-stock/v1/finance/other-major-ratios', trId: 'FHKST66430500' },
  { reportType: 'STABILITY', path: '/uapi/domestic-stock/v1/finance/stability-ratio', trId: 'FHKST66430600' },
  { reportType: 'GROWTH', path: '/uapi/domestic-stock/v1/finance/growth-ratio', trId: 'FHKST66430800' },
] as const;

export type KisFinanceEndpoint = (typeof KIS_FINANCE_ENDPOINTS)[number];

/** Calls the domain fetchers make against the brokerage. */
export interface KisApi {
  fetchStockInfo(symbol: string): Promise<KisStockInfo>;
  /** One page of candles, newest first. Dates are YYYYMMDD. */
  fetchChartPage(symbol: string, timeframe: KisTimeframe, fromYmd: string, toYmd: string): Promise<KisCandle[]>;
  fetchCurrentPrice(symbol: string): Promise<KisCurrentPrice>;
  fetchFinanceRows(endpoint: KisFinanceEndpoint, symbol: string, term: KisReportTerm): Promise<KisFinanceRow[]>;
  fetchOrderable(symbol: string): Promise<KisOrderable>;
  fetchIntegratedMargin(symbol: string): Promise<KisIntegratedMargin>;
}
