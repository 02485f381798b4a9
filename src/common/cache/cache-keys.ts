/**
 * Cache fingerprints
 * Deterministic keys over the normalized request fields relevant to each cache.
 */

import { createHash } from 'crypto';

export type SearchFilters = Record<string, unknown>;

export interface SearchCacheParams {
  namespace: string;
  query: string;
  topK: number;
  filters?: SearchFilters | null;
}

export interface ChatCacheParams {
  namespace: string;
  query: string;
  topK: number;
  minScore: number;
  useWebFallback: boolean;
}

/**
 * JSON with object keys sorted at every depth
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0,
    );
    for (const [key, entry] of entries) {
      sorted[key] = sortKeys(entry);
    }
    return sorted;
  }
  return value;
}

function fingerprint(parts: unknown[]): string {
  return createHash('sha256').update(JSON.stringify(parts)).digest('hex');
}

export function searchCacheKey(params: SearchCacheParams): string {
  const filtersJson = params.filters ? canonicalJson(params.filters) : '';
  return fingerprint([
    'search',
    params.namespace,
    params.query,
    Math.trunc(params.topK),
    filtersJson,
  ]);
}

export function chatCacheKey(params: ChatCacheParams): string {
  return fingerprint([
    'chat',
    params.namespace,
    params.query,
    Math.trunc(params.topK),
    params.minScore,
    params.useWebFallback,
  ]);
}
