/**
 * Open DART response schemas.
 */

import { z } from 'zod';

/** Status codes documented by Open DART. */
export const DART_STATUS = {
  OK: '000',
  UNREGISTERED_KEY: '010',
  DISABLED_KEY: '011',
  IP_NOT_ALLOWED: '012',
  NO_DATA: '013',
  RATE_LIMITED: '020',
} as const;

export const dartDisclosureSchema = z.object({
  corp_code: z.string(),
  corp_name: z.string().optional().default(''),
  stock_code: z.string().optional().default(''),
  corp_cls: z.string().optional().default(''),
  report_nm: z.string().optional().default(''),
  rcept_no: z.string(),
  flr_nm: z.string().optional().default(''),
  rcept_dt: z.string().optional().default(''),
  rm: z.string().optional().default(''),
});

export type DartDisclosure = z.infer<typeof dartDisclosureSchema>;

export const dartListResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional().default(''),
  page_no: z.number().optional(),
  page_count: z.number().optional(),
  total_count: z.number().optional(),
  total_page: z.number().optional(),
  list: z.array(dartDisclosureSchema).optional().default([]),
});

export const dartCorpCodeEntrySchema = z.object({
  corp_code: z.string(),
  corp_name: z.string().optional().default(''),
  stock_code: z.string().optional().default(''),
  modify_date: z.string().optional().default(''),
});

export type DartCorpCode = z.infer<typeof dartCorpCodeEntrySchema>;

export const dartCorpCodeDocumentSchema = z.object({
  result: z.object({
    list: z.union([z.array(dartCorpCodeEntrySchema), dartCorpCodeEntrySchema]).optional(),
  }),
});

export interface DartDisclosurePage {
  items: DartDisclosure[];
  pageNo: number;
  totalPage: number;
}

/** Calls the domain fetchers make against the filings provider. */
export interface DartApi {
  fetchCorpCodes(): Promise<DartCorpCode[]>;
  /** Dates are YYYYMMDD. Returns an empty page when DART reports no data. */
  fetchDisclosures(corpCode: string, fromYmd: string, toYmd: string, pageNo: number): Promise<DartDisclosurePage>;
}
