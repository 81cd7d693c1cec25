/**
 * Ajv validation instance with schema validators
 * Every summary the CLI prints is validated against its published schema.
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { DbCheckSummary, IngestSummary } from '@/ingest/summary';
import { getIngestSummarySchema } from './schema_loader';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

addFormats(ajv);

let summaryValidator: ValidateFunction<IngestSummary | DbCheckSummary> | null = null;

export function getSummaryValidator(): ValidateFunction<IngestSummary | DbCheckSummary> {
  if (!summaryValidator) {
    summaryValidator = ajv.compile<IngestSummary | DbCheckSummary>(getIngestSummarySchema());
  }
  return summaryValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

export function validateSummary(data: unknown): ValidationResult<IngestSummary | DbCheckSummary> {
  const validate = getSummaryValidator();

  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map((e) => `${e.instancePath || 'root'}: ${e.message ?? 'invalid'}`) ?? [
    'Unknown validation error',
  ];

  return { valid: false, data: null, errors };
}
