/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';

export interface Schema {
  $schema: string;
  $id: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
  [key: string]: unknown;
}

export type SchemaName = 'instrument_profile.v1' | 'macro_reference.v1';

const schemaCache = new Map<SchemaName, Schema>();

export function loadSchema(schemaName: SchemaName): Schema {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaPath = join(process.cwd(), 'schemas', `${schemaName}.schema.json`);
  const schemaJson = readFileSync(schemaPath, 'utf-8');
  const schema: Schema = JSON.parse(schemaJson);

  schemaCache.set(schemaName, schema);
  return schema;
}
