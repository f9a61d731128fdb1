/**
 * Hashing utilities for cache keys and request IDs
 */

import { createHash, randomUUID } from 'crypto';

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function hashObject(obj: unknown): string {
  // Sort keys for deterministic hashing
  const str = JSON.stringify(obj, (_key, value: unknown) => {
    if (isPlainRecord(value)) {
      return Object.keys(value)
        .sort()
        .reduce((sorted: Record<string, unknown>, k) => {
          sorted[k] = value[k];
          return sorted;
        }, {});
    }
    return value;
  });
  return createHash('sha256').update(str).digest('hex');
}

export function hashString(str: string): string {
  return createHash('sha256').update(str).digest('hex');
}

export function generateRequestId(): string {
  return `req_${randomUUID().replace(/-/g, '').substring(0, 12)}`;
}
