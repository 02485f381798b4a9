/**
 * Environment validation for ConfigModule.forRoot({ validate })
 * Fails bootstrap with ConfigurationError instead of serving degraded.
 */

import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from '../common/errors';
import {
  EMBEDDING_PROVIDERS,
  LLM_PROVIDERS,
  isEmbeddingProvider,
  isLLMProvider,
  type EmbeddingProvider,
  type LLMProvider,
} from '../chat/providers/types';
import { toBoolean } from './pipeline.settings';

const toOptionalNumber = (value: unknown): unknown =>
  value === undefined || value === '' ? undefined : Number(value);

/**
 * API key required by each hosted provider
 */
const PROVIDER_API_KEYS: Record<LLMProvider, string | undefined> = {
  openai: 'OPENAI_API_KEY',
  groq: 'GROQ_API_KEY',
  google: 'GOOGLE_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  ollama: undefined,
};

const EMBEDDING_API_KEYS: Record<EmbeddingProvider, string | undefined> = {
  openai: 'OPENAI_API_KEY',
  google: 'GOOGLE_API_KEY',
  ollama: undefined,
};

export class EnvironmentVariables {
  @IsOptional()
  @Transform(({ value }) => toOptionalNumber(value))
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsUrl({ require_tld: false })
  QDRANT_URL!: string;

  @IsOptional()
  @IsString()
  VECTOR_COLLECTION?: string;

  @IsOptional()
  @IsIn(LLM_PROVIDERS)
  LLM_PROVIDER?: LLMProvider;

  @IsOptional()
  @Transform(({ value }) => toOptionalNumber(value))
  @IsNumber()
  @Min(0)
  @Max(2)
  LLM_TEMPERATURE?: number;

  @IsOptional()
  @Transform(({ value }) => toOptionalNumber(value))
  @IsInt()
  @Min(1)
  LLM_MAX_TOKENS?: number;

  @IsOptional()
  @IsIn(EMBEDDING_PROVIDERS)
  EMBEDDING_PROVIDER?: EmbeddingProvider;

  @IsOptional()
  @Transform(({ value }) => toBoolean(value, true))
  @IsBoolean()
  CACHE_ENABLED?: boolean;

  @IsOptional()
  @Transform(({ value }) => toOptionalNumber(value))
  @IsInt()
  @Min(1)
  @Max(100)
  RAG_DEFAULT_TOP_K?: number;

  @IsOptional()
  @Transform(({ value }) => toOptionalNumber(value))
  @IsNumber()
  @Min(0)
  @Max(1)
  RAG_MIN_SCORE?: number;

  @IsOptional()
  @Transform(({ value }) => toOptionalNumber(value))
  @IsInt()
  @Min(1)
  @Max(20)
  RAG_MAX_WEB_RESULTS?: number;

  @IsOptional()
  @Transform(({ value }) => toOptionalNumber(value))
  @IsInt()
  @Min(1)
  HTTP_TIMEOUT_MS?: number;

  @IsOptional()
  @Transform(({ value }) => toOptionalNumber(value))
  @IsInt()
  @Min(1)
  @Max(10)
  RESILIENCE_MAX_ATTEMPTS?: number;

  @IsOptional()
  @Transform(({ value }) => toOptionalNumber(value))
  @IsInt()
  @Min(0)
  RESILIENCE_BASE_DELAY_MS?: number;

  @IsOptional()
  @Transform(({ value }) => toOptionalNumber(value))
  @IsInt()
  @Min(0)
  RESILIENCE_MAX_DELAY_MS?: number;
}

/**
 * Validate raw env values. Returns the original record (ConfigService keeps
 * reading strings) after checks pass.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const env = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(env, { skipMissingProperties: false });

  const invalidKeys = errors.map((error) => error.property);
  const messages = errors.flatMap((error) =>
    Object.values(error.constraints ?? {}),
  );

  const llmProvider = isLLMProvider(config.LLM_PROVIDER)
    ? config.LLM_PROVIDER
    : 'ollama';
  const embeddingProvider = isEmbeddingProvider(config.EMBEDDING_PROVIDER)
    ? config.EMBEDDING_PROVIDER
    : 'ollama';

  const requiredKeys: Array<[string | undefined, string]> = [
    [PROVIDER_API_KEYS[llmProvider], `LLM provider '${llmProvider}'`],
    [
      EMBEDDING_API_KEYS[embeddingProvider],
      `embedding provider '${embeddingProvider}'`,
    ],
  ];
  for (const [key, usage] of requiredKeys) {
    if (key && !config[key] && !invalidKeys.includes(key)) {
      invalidKeys.push(key);
      messages.push(`${key} is required for ${usage}`);
    }
  }

  if (invalidKeys.length > 0) {
    throw new ConfigurationError(
      `Invalid environment configuration: ${messages.join('; ')}`,
      invalidKeys,
    );
  }

  return config;
}
