/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';

export type SchemaName = 'policy.v1' | 'override_request.v1' | 'pillar_scores.v1';

export interface Schema {
  $schema: string;
  $id: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
  [keyword: string]: unknown;
}

const schemaCache = new Map<SchemaName, Schema>();

export function getSchemasDir(projectRoot: string = process.cwd()): string {
  return join(projectRoot, 'schemas');
}

export function loadSchema(schemaName: SchemaName): Schema {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaPath = join(getSchemasDir(), `${schemaName}.schema.json`);
  const schemaJson = readFileSync(schemaPath, 'utf-8');
  const schema = JSON.parse(schemaJson) as Schema;

  schemaCache.set(schemaName, schema);
  return schema;
}
