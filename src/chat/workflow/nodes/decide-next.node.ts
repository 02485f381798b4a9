/**
 * Decide Next Node
 * Web fallback decision: search the web only when it was requested, the tool
 * is configured, and retrieval came back empty or below the score threshold.
 */

import { Logger } from '@nestjs/common';
import type { SourceSnippet } from '../../types';
import type { ChatStateType } from '../state/chat-state';

const logger = new Logger('DecideNextNode');

export interface WebFallbackInput {
  retrieved: readonly Pick<SourceSnippet, 'score'>[];
  topScore: number;
  useWebRequested: boolean;
  webToolAvailable: boolean;
  minScore: number;
}

export function decideWebFallback(input: WebFallbackInput): boolean {
  if (!input.useWebRequested || !input.webToolAvailable) {
    return false;
  }
  return input.retrieved.length === 0 || input.topScore < input.minScore;
}

export function createDecideNextNode() {
  return (state: ChatStateType): Partial<ChatStateType> => {
    const webFallbackUsed = decideWebFallback({
      retrieved: state.retrieved,
      topScore: state.topScore,
      useWebRequested: state.useWebFallback,
      webToolAvailable: state.webToolAvailable,
      minScore: state.minScore,
    });

    logger.log(
      `[DecideNext] stage=3_decide status=${webFallbackUsed ? 'web_search' : 'generate'} web_tool_available=${state.webToolAvailable} retrieved=${state.retrieved.length} top_score=${state.topScore.toFixed(4)} min_score=${state.minScore.toFixed(4)}`,
    );

    return {
      webFallbackUsed,
      currentStage: 'decideNext',
    };
  };
}

/**
 * Conditional edge after decideNext
 */
export function routeAfterDecideNext(
  state: ChatStateType,
): 'web_search' | 'generate' {
  return state.webFallbackUsed ? 'web_search' : 'generate';
}
