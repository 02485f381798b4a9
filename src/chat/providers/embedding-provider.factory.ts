/**
 * Embedding Provider Factory
 * Multi-provider support: Ollama, OpenAI, Google
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import { ConfigurationError } from '../../common/errors';
import { isEmbeddingProvider, type EmbeddingProvider } from './types';

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Create embedding model based on configuration
   */
  createEmbeddingModel(): Embeddings {
    const provider = this.getProvider();
    const model = this.getModel(provider);

    this.logger.log(`Creating embedding model: ${provider}/${model}`);

    switch (provider) {
      case 'ollama':
        return this.createOllamaEmbeddings(model);
      case 'openai':
        return this.createOpenAIEmbeddings(model);
      case 'google':
        return this.createGoogleEmbeddings(model);
    }
  }

  /**
   * Get provider from config (default: ollama)
   */
  private getProvider(): EmbeddingProvider {
    const provider = this.configService.get<string>(
      'EMBEDDING_PROVIDER',
      'ollama',
    );

    if (!isEmbeddingProvider(provider)) {
      this.logger.warn(
        `Invalid embedding provider: ${provider}, defaulting to ollama`,
      );
      return 'ollama';
    }

    return provider;
  }

  private getModel(provider: EmbeddingProvider): string {
    const defaultModels: Record<EmbeddingProvider, string> = {
      ollama: 'bge-m3:567m',
      openai: 'text-embedding-3-small',
      google: 'text-embedding-004',
    };

    const envVars: Record<EmbeddingProvider, string> = {
      ollama: 'OLLAMA_EMBEDDING_MODEL',
      openai: 'OPENAI_EMBEDDING_MODEL',
      google: 'GOOGLE_EMBEDDING_MODEL',
    };

    return this.configService.get<string>(
      envVars[provider],
      defaultModels[provider],
    );
  }

  private createOllamaEmbeddings(model: string): OllamaEmbeddings {
    const baseUrl = this.configService.get<string>(
      'OLLAMA_BASE_URL',
      'http://localhost:11434',
    );

    return new OllamaEmbeddings({ model, baseUrl, maxRetries: 0 });
  }

  private createOpenAIEmbeddings(model: string): OpenAIEmbeddings {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');

    if (!apiKey) {
      throw new ConfigurationError(
        'OPENAI_API_KEY is required for OpenAI embeddings',
        ['OPENAI_API_KEY'],
      );
    }

    return new OpenAIEmbeddings({ model, apiKey, maxRetries: 0 });
  }

  private createGoogleEmbeddings(model: string): GoogleGenerativeAIEmbeddings {
    const apiKey = this.configService.get<string>('GOOGLE_API_KEY');

    if (!apiKey) {
      throw new ConfigurationError(
        'GOOGLE_API_KEY is required for Google embeddings',
        ['GOOGLE_API_KEY'],
      );
    }

    return new GoogleGenerativeAIEmbeddings({ model, apiKey, maxRetries: 0 });
  }
}
