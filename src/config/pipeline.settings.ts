/**
 * Pipeline Settings
 * Typed view over ConfigService for the chat pipeline, cache and resilience layer.
 */

import type { ConfigService } from '@nestjs/config';

export interface PipelineSettings {
  defaultNamespace: string;
  defaultTopK: number;
  minScore: number;
  maxWebResults: number;
  textField: string;
  cacheEnabled: boolean;
  httpTimeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  tracingEnabled: boolean;
  tracingProject: string | null;
}

// Env values arrive as strings; coerce to finite numbers
export const toNumber = (value: unknown, defaultValue: number): number => {
  if (value === undefined || value === null || value === '') {
    return defaultValue;
  }
  const n = Number(value);
  return Number.isFinite(n) ? n : defaultValue;
};

export const toBoolean = (value: unknown, defaultValue: boolean): boolean => {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return defaultValue;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
};

export function readPipelineSettings(
  configService: ConfigService,
): PipelineSettings {
  return {
    defaultNamespace: configService.get<string>('VECTOR_NAMESPACE', 'dev'),
    defaultTopK: Math.floor(
      toNumber(configService.get('RAG_DEFAULT_TOP_K'), 5),
    ),
    minScore: toNumber(configService.get('RAG_MIN_SCORE'), 0.25),
    maxWebResults: Math.floor(
      toNumber(configService.get('RAG_MAX_WEB_RESULTS'), 5),
    ),
    textField: configService.get<string>('VECTOR_TEXT_FIELD', 'chunk_text'),
    cacheEnabled: toBoolean(configService.get('CACHE_ENABLED'), true),
    httpTimeoutMs: toNumber(configService.get('HTTP_TIMEOUT_MS'), 10000),
    maxAttempts: Math.max(
      1,
      Math.floor(toNumber(configService.get('RESILIENCE_MAX_ATTEMPTS'), 3)),
    ),
    baseDelayMs: toNumber(configService.get('RESILIENCE_BASE_DELAY_MS'), 1000),
    maxDelayMs: toNumber(configService.get('RESILIENCE_MAX_DELAY_MS'), 8000),
    tracingEnabled: toBoolean(configService.get('LANGCHAIN_TRACING_V2'), false),
    tracingProject: configService.get<string>('LANGCHAIN_PROJECT') ?? null,
  };
}
