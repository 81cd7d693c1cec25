/**
 * Summary validator
 * Checks every emitted summary against schemas/ingest_summary.v1.schema.json
 */

import { IngestError } from '@/core/errors';
import type { DbCheckSummary, IngestSummary } from '@/ingest/summary';
import { createChildLogger } from '@/utils/logger';
import { validateSummary, type ValidationResult } from '@/validation/ajv_instance';

const logger = createChildLogger('summary_validator');

export function validateSummaryRecord(data: unknown): ValidationResult<IngestSummary | DbCheckSummary> {
  const result = validateSummary(data);

  if (!result.valid) {
    logger.error({ errors: result.errors }, 'Summary validation failed');
  } else {
    logger.debug('Summary validation passed');
  }

  return result;
}

export function validateAndThrow<T extends IngestSummary>(summary: T): T {
  const result = validateSummaryRecord(summary);

  if (!result.valid) {
    throw new IngestError('Internal', `Summary validation failed: ${result.errors?.join('; ') ?? 'Unknown error'}`);
  }

  return summary;
}
