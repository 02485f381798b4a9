import type { SearchFilters } from '../common/cache/cache-keys';

export interface SearchRequest {
  query: string;
  topK?: number;
  namespace?: string;
  filters?: SearchFilters;
}

export interface SearchHit {
  id: string;
  score: number;
  fields: Record<string, unknown>;
}

export interface SearchResult {
  namespace: string;
  query: string;
  topK: number;
  hits: SearchHit[];
  cached: boolean;
}
