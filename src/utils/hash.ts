/**
 * Hashing utilities for audit records and content verification
 */

import { createHash } from 'crypto';

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * JSON serialization with object keys sorted at every depth, so equal values
 * always produce equal strings.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return '[' + value.map(stableStringify).join(',') + ']';
  }

  const record = value as Record<string, unknown>;
  const pairs = Object.keys(record)
    .filter((key) => record[key] !== undefined)
    .sort()
    .map((key) => JSON.stringify(key) + ':' + stableStringify(record[key]));
  return '{' + pairs.join(',') + '}';
}

export function contentHash(content: unknown): string {
  return sha256(stableStringify(content));
}
