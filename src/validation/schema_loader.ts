/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

export type Schema = {
  $schema: string;
  $id: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
};

const SCHEMAS_DIR = new URL('../../schemas/', import.meta.url);

const schemaCache = new Map<string, Schema>();

function isSchema(value: unknown): value is Schema {
  return (
    typeof value === 'object' &&
    value !== null &&
    '$schema' in value &&
    typeof value.$schema === 'string' &&
    '$id' in value &&
    typeof value.$id === 'string' &&
    'type' in value &&
    typeof value.type === 'string'
  );
}

export function loadSchema(schemaName: string): Schema {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaPath = fileURLToPath(new URL(`${schemaName}.schema.json`, SCHEMAS_DIR));
  const parsed: unknown = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  if (!isSchema(parsed)) {
    throw new Error(`Schema ${schemaName} at ${schemaPath} is missing $schema, $id or type`);
  }

  schemaCache.set(schemaName, parsed);
  return parsed;
}

export function getIngestSummarySchema(): Schema {
  return loadSchema('ingest_summary.v1');
}
