/**
 * LLM Provider Factory
 * Creates chat models from multiple providers (OpenAI, Groq, Google, Anthropic, Ollama).
 * Client-side retries are 0; ResilienceService owns retrying.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ConfigurationError } from '../../common/errors';
import { toNumber } from '../../config/pipeline.settings';
import { isLLMProvider, type ChatModelOptions, type LLMProvider } from './types';

const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  getProvider(): LLMProvider {
    const provider = this.configService.get<string>('LLM_PROVIDER', 'ollama');
    if (!isLLMProvider(provider)) {
      this.logger.warn(`Invalid LLM provider: ${provider}, defaulting to ollama`);
      return 'ollama';
    }
    return provider;
  }

  /**
   * Sampling options from LLM_TEMPERATURE / LLM_MAX_TOKENS
   */
  getModelOptions(): ChatModelOptions {
    return {
      temperature: toNumber(this.configService.get('LLM_TEMPERATURE'), 0.2),
      maxTokens: Math.floor(
        toNumber(this.configService.get('LLM_MAX_TOKENS'), 1024),
      ),
    };
  }

  /**
   * Create chat model for the configured LLM_PROVIDER
   */
  createChatModel(): BaseChatModel {
    const provider = this.getProvider();
    const options = this.getModelOptions();

    this.logger.log(
      `Creating chat model for provider: ${provider} temperature=${options.temperature} max_tokens=${options.maxTokens}`,
    );

    switch (provider) {
      case 'openai':
        return this.createOpenAIModel(options);
      case 'groq':
        return this.createGroqModel(options);
      case 'google':
        return this.createGoogleModel(options);
      case 'anthropic':
        return this.createAnthropicModel(options);
      case 'ollama':
        return this.createOllamaModel(options);
    }
  }

  private requireApiKey(key: string, provider: LLMProvider): string {
    const apiKey = this.configService.get<string>(key);
    if (!apiKey) {
      throw new ConfigurationError(
        `${key} is required for ${provider} provider`,
        [key],
      );
    }
    return apiKey;
  }

  private createOpenAIModel(options: ChatModelOptions): ChatOpenAI {
    const model =
      this.configService.get<string>('OPENAI_CHAT_MODEL') ||
      'gpt-4o-mini';
    const apiKey = this.requireApiKey('OPENAI_API_KEY', 'openai');

    return new ChatOpenAI({
      model,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      maxRetries: 0,
      configuration: {
        baseURL:
          this.configService.get<string>('OPENAI_BASE_URL') ||
          'https://api.openai.com/v1',
        apiKey,
      },
    });
  }

  /**
   * Groq exposes an OpenAI-compatible API
   */
  private createGroqModel(options: ChatModelOptions): ChatOpenAI {
    const model =
      this.configService.get<string>('GROQ_CHAT_MODEL') ||
      'llama-3.1-8b-instant';
    const apiKey = this.requireApiKey('GROQ_API_KEY', 'groq');

    return new ChatOpenAI({
      model,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      maxRetries: 0,
      configuration: {
        baseURL:
          this.configService.get<string>('GROQ_BASE_URL') || GROQ_BASE_URL,
        apiKey,
      },
    });
  }

  private createGoogleModel(
    options: ChatModelOptions,
  ): ChatGoogleGenerativeAI {
    const model =
      this.configService.get<string>('GOOGLE_CHAT_MODEL') ||
      'gemini-2.5-flash-lite';
    const apiKey = this.requireApiKey('GOOGLE_API_KEY', 'google');

    return new ChatGoogleGenerativeAI({
      model,
      temperature: options.temperature,
      maxOutputTokens: options.maxTokens,
      maxRetries: 0,
      apiKey,
    });
  }

  private createAnthropicModel(options: ChatModelOptions): ChatAnthropic {
    const model =
      this.configService.get<string>('ANTHROPIC_CHAT_MODEL') ||
      'claude-3-5-haiku-latest';
    const apiKey = this.requireApiKey('ANTHROPIC_API_KEY', 'anthropic');

    return new ChatAnthropic({
      model,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      maxRetries: 0,
      apiKey,
    });
  }

  /**
   * Ollama chat model (local)
   */
  private createOllamaModel(options: ChatModelOptions): ChatOllama {
    const model =
      this.configService.get<string>('OLLAMA_CHAT_MODEL') ||
      'gemma3:1b';

    return new ChatOllama({
      model,
      temperature: options.temperature,
      numPredict: options.maxTokens,
      maxRetries: 0,
      baseUrl:
        this.configService.get<string>('OLLAMA_BASE_URL') ||
        'http://localhost:11434',
    });
  }
}
