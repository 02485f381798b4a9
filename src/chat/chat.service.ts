/**
 * Chat Service
 * Request-level orchestration around the chat workflow: response cache,
 * total timing, metrics sample and trace metadata.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ResponseCacheService } from '../common/cache/response-cache.service';
import type { ChatCacheParams } from '../common/cache/cache-keys';
import { MetricsService } from '../common/metrics/metrics.service';
import {
  readPipelineSettings,
  type PipelineSettings,
} from '../config/pipeline.settings';
import {
  assertValidChatRequest,
  normalizeChatRequest,
} from './workflow/nodes/normalize-input.node';
import { ChatWorkflowService } from './workflow/chat-workflow.service';
import type { ChatRequest, ChatResult, TraceMetadata } from './types';

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);
  private readonly settings: PipelineSettings;

  constructor(
    configService: ConfigService,
    private readonly workflowService: ChatWorkflowService,
    private readonly cacheService: ResponseCacheService,
    private readonly metricsService: MetricsService,
  ) {
    this.settings = readPipelineSettings(configService);
  }

  /**
   * Answer one chat request.
   * History-free requests are served from the chat cache when fresh; a
   * cached answer replays its original timings.
   */
  async runChat(request: ChatRequest): Promise<ChatResult> {
    const startTime = Date.now();

    const normalized = normalizeChatRequest(request, this.settings);
    assertValidChatRequest(normalized);

    const cacheParams: ChatCacheParams = {
      namespace: normalized.namespace,
      query: normalized.query,
      topK: normalized.topK,
      minScore: normalized.minScore,
      useWebFallback: normalized.useWebFallback,
    };

    // Eligibility follows the history as sent, empty turns included
    const cachedResult = this.cacheService.getChat(
      cacheParams,
      request.chatHistory,
    );
    if (cachedResult) {
      this.metricsService.recordTiming(cachedResult.timings);
      this.logger.log(
        `[Chat] status=cache_hit namespace=${normalized.namespace} total=${cachedResult.timings.totalMs}ms`,
      );
      return { ...cachedResult, cached: true };
    }

    const state = await this.workflowService.execute(request);
    const totalMs = Date.now() - startTime;

    const result: ChatResult = {
      answer: state.answer,
      sources: [...state.retrieved, ...state.webResults],
      timings: { ...state.timings, totalMs },
      webFallbackUsed: state.webFallbackUsed,
      topScore: state.topScore,
      cached: false,
      trace: this.traceMetadata(),
    };

    this.metricsService.recordTiming(result.timings);
    this.cacheService.setChat(cacheParams, request.chatHistory, result);

    this.logger.log(
      `[Chat] status=done namespace=${normalized.namespace} sources=${result.sources.length} web_fallback=${result.webFallbackUsed} total=${totalMs}ms`,
    );

    return result;
  }

  /**
   * Whitespace-delimited answer tokens, in order
   */
  tokenize(answer: string): string[] {
    return answer.split(/\s+/).filter((token) => token.length > 0);
  }

  private traceMetadata(): TraceMetadata {
    return {
      enabled: this.settings.tracingEnabled,
      project: this.settings.tracingProject,
    };
  }
}
