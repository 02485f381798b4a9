/**
 * Chat Module
 * Chat pipeline, its HTTP surface and the capability adapters bound to
 * their DI tokens.
 */

import { Module } from '@nestjs/common';
import { EmbeddingProviderFactory } from './providers/embedding-provider.factory';
import { LLMProviderFactory } from './providers/llm-provider.factory';
import { QdrantSearchService } from './services/qdrant-search.service';
import { TavilySearchService } from './services/tavily-search.service';
import { AnswerGeneratorService } from './services/answer-generator.service';
import { ChatWorkflowService } from './workflow/chat-workflow.service';
import { ChatService } from './chat.service';
import { ChatController } from './chat.controller';
import { ANSWER_GENERATOR, VECTOR_SEARCH, WEB_SEARCH } from './types';

@Module({
  providers: [
    // Provider factories
    EmbeddingProviderFactory,
    LLMProviderFactory,
    // Capability adapters
    QdrantSearchService,
    TavilySearchService,
    AnswerGeneratorService,
    { provide: VECTOR_SEARCH, useExisting: QdrantSearchService },
    { provide: WEB_SEARCH, useExisting: TavilySearchService },
    { provide: ANSWER_GENERATOR, useExisting: AnswerGeneratorService },
    // Pipeline
    ChatWorkflowService,
    ChatService,
  ],
  controllers: [ChatController],
  exports: [VECTOR_SEARCH, WEB_SEARCH],
})
export class ChatModule {}
