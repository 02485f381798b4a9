/**
 * Chat Pipeline Types
 * Request/result shapes and the capability interfaces the pipeline consumes.
 */

import type { BaseMessage } from '@langchain/core/messages';
import type { SearchFilters } from '../../common/cache/cache-keys';

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Chat request as received from the caller; unset fields take config defaults
 */
export interface ChatRequest {
  query: string;
  namespace?: string;
  topK?: number;
  minScore?: number;
  useWebFallback?: boolean;
  maxWebResults?: number;
  chatHistory?: ChatMessage[];
}

/**
 * Chat request after defaults have been applied
 */
export interface NormalizedChatRequest {
  query: string;
  namespace: string;
  topK: number;
  minScore: number;
  useWebFallback: boolean;
  maxWebResults: number;
  chatHistory: ChatMessage[];
}

/**
 * Unit of retrieved or web-sourced text plus its provenance
 */
export interface SourceSnippet {
  source: string;
  title: string;
  url: string;
  score: number;
  chunkText: string;
}

export interface StageTimings {
  retrieveMs: number;
  webMs: number;
  generateMs: number;
  totalMs: number;
}

export interface TraceMetadata {
  enabled: boolean;
  project: string | null;
}

export interface ChatResult {
  answer: string;
  sources: SourceSnippet[];
  timings: StageTimings;
  webFallbackUsed: boolean;
  topScore: number;
  cached: boolean;
  trace: TraceMetadata;
}

// ============================================
// Capability interfaces
// ============================================

export const VECTOR_SEARCH = Symbol('VECTOR_SEARCH');
export const WEB_SEARCH = Symbol('WEB_SEARCH');
export const ANSWER_GENERATOR = Symbol('ANSWER_GENERATOR');

export interface VectorSearchParams {
  namespace: string;
  queryText: string;
  topK: number;
  filters?: SearchFilters | null;
}

export interface VectorHit {
  id: string;
  score: number;
  fields: Record<string, unknown>;
}

export interface VectorSearchCapability {
  search(params: VectorSearchParams): Promise<VectorHit[]>;
}

export interface WebResult {
  title: string;
  url: string;
  content: string;
}

export interface WebSearchCapability {
  /** False when the tool is not configured; callers treat it as zero results */
  isAvailable(): boolean;
  search(query: string, maxResults: number): Promise<WebResult[]>;
}

export interface AnswerGenerationCapability {
  generate(messages: BaseMessage[]): Promise<string>;
}

/**
 * Capability names reported in UpstreamServiceError and logs
 */
export const CAPABILITY = {
  VECTOR_SEARCH: 'vector-search',
  WEB_SEARCH: 'web-search',
  ANSWER_GENERATION: 'answer-generation',
} as const;
