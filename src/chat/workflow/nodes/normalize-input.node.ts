/**
 * Normalize Input Node
 * Fills unset request fields from configuration, cleans conversation history
 * and records whether the web search tool is available for this run.
 */

import { Logger } from '@nestjs/common';
import { PipelineValidationError } from '../../../common/errors';
import type { PipelineSettings } from '../../../config/pipeline.settings';
import type {
  ChatMessage,
  ChatRequest,
  NormalizedChatRequest,
  WebSearchCapability,
} from '../../types';
import type { ChatStateType } from '../state/chat-state';

const logger = new Logger('NormalizeInputNode');

export const REQUEST_LIMITS = {
  MAX_TOP_K: 100,
  MAX_WEB_RESULTS: 20,
} as const;

export type NormalizationDefaults = Pick<
  PipelineSettings,
  'defaultNamespace' | 'defaultTopK' | 'minScore' | 'maxWebResults'
>;

/**
 * Apply configuration defaults to a raw chat request.
 * History turns without content are dropped; unknown roles become `user`.
 */
export function normalizeChatRequest(
  request: ChatRequest,
  defaults: NormalizationDefaults,
): NormalizedChatRequest {
  const chatHistory: ChatMessage[] = (request.chatHistory ?? [])
    .filter((turn) => typeof turn.content === 'string' && turn.content !== '')
    .map((turn) => ({
      role: turn.role === 'assistant' ? 'assistant' : 'user',
      content: turn.content,
    }));

  return {
    query: request.query,
    namespace: request.namespace || defaults.defaultNamespace,
    topK: request.topK ?? defaults.defaultTopK,
    minScore: request.minScore ?? defaults.minScore,
    useWebFallback: request.useWebFallback ?? true,
    maxWebResults: request.maxWebResults ?? defaults.maxWebResults,
    chatHistory,
  };
}

/**
 * Reject normalized values the pipeline cannot run with
 */
export function assertValidChatRequest(request: NormalizedChatRequest): void {
  if (typeof request.query !== 'string' || request.query.trim() === '') {
    throw new PipelineValidationError('query must not be empty', 'query');
  }
  if (
    !Number.isInteger(request.topK) ||
    request.topK < 1 ||
    request.topK > REQUEST_LIMITS.MAX_TOP_K
  ) {
    throw new PipelineValidationError(
      `topK must be an integer between 1 and ${REQUEST_LIMITS.MAX_TOP_K}, got ${request.topK}`,
      'topK',
    );
  }
  if (
    !Number.isInteger(request.maxWebResults) ||
    request.maxWebResults < 1 ||
    request.maxWebResults > REQUEST_LIMITS.MAX_WEB_RESULTS
  ) {
    throw new PipelineValidationError(
      `maxWebResults must be an integer between 1 and ${REQUEST_LIMITS.MAX_WEB_RESULTS}, got ${request.maxWebResults}`,
      'maxWebResults',
    );
  }
  if (
    !Number.isFinite(request.minScore) ||
    request.minScore < 0 ||
    request.minScore > 1
  ) {
    throw new PipelineValidationError(
      `minScore must be a number between 0 and 1, got ${request.minScore}`,
      'minScore',
    );
  }
}

/**
 * Factory function to create normalize input node
 */
export function createNormalizeInputNode(
  defaults: NormalizationDefaults,
  webSearch: WebSearchCapability,
) {
  return (state: ChatStateType): Partial<ChatStateType> => {
    const normalized = normalizeChatRequest(state.request, defaults);
    assertValidChatRequest(normalized);

    const webToolAvailable = webSearch.isAvailable();

    logger.log(
      `[NormalizeInput] stage=1_normalize status=done namespace=${normalized.namespace} top_k=${normalized.topK} min_score=${normalized.minScore.toFixed(3)} use_web_fallback=${normalized.useWebFallback} max_web_results=${normalized.maxWebResults} history=${normalized.chatHistory.length} web_tool_available=${webToolAvailable}`,
    );

    return {
      ...normalized,
      retrieved: [],
      webResults: [],
      webToolAvailable,
      webFallbackUsed: false,
      currentStage: 'normalizeInput',
    };
  };
}
