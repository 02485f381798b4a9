/**
 * Provider Types and Configurations
 */

export const EMBEDDING_PROVIDERS = ['ollama', 'openai', 'google'] as const;

export const LLM_PROVIDERS = [
  'openai',
  'groq',
  'google',
  'anthropic',
  'ollama',
] as const;

/**
 * Embedding Provider Type
 */
export type EmbeddingProvider = (typeof EMBEDDING_PROVIDERS)[number];

/**
 * LLM Provider Type
 */
export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export const isEmbeddingProvider = (value: unknown): value is EmbeddingProvider =>
  EMBEDDING_PROVIDERS.some((provider) => provider === value);

export const isLLMProvider = (value: unknown): value is LLMProvider =>
  LLM_PROVIDERS.some((provider) => provider === value);

/**
 * Chat Model Options
 */
export interface ChatModelOptions {
  temperature: number;
  maxTokens: number;
}
