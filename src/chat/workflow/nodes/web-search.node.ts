/**
 * Web Search Node
 * Supplements retrieval with web results. Results become snippets with
 * source `web` and a fixed score of 0. An unconfigured tool yields no results.
 */

import { Logger } from '@nestjs/common';
import type { ResilienceService } from '../../../common/resilience/resilience.service';
import {
  CAPABILITY,
  type SourceSnippet,
  type WebResult,
  type WebSearchCapability,
} from '../../types';
import type { ChatStateType } from '../state/chat-state';

const logger = new Logger('WebSearchNode');

export function toWebSnippet(result: WebResult): SourceSnippet {
  const url = result.url;
  return {
    source: 'web',
    title: result.title || url,
    url,
    score: 0,
    chunkText: result.content,
  };
}

export function createWebSearchNode(
  webSearch: WebSearchCapability,
  resilience: ResilienceService,
) {
  return async (state: ChatStateType): Promise<Partial<ChatStateType>> => {
    if (!webSearch.isAvailable()) {
      logger.warn(
        `[WebSearch] stage=4_web_search status=skipped reason=tool_unavailable`,
      );
      return {
        webResults: [],
        timings: { ...state.timings, webMs: 0 },
        currentStage: 'webSearch',
      };
    }

    const startTime = Date.now();

    const results = await resilience.call(CAPABILITY.WEB_SEARCH, () =>
      webSearch.search(state.query, state.maxWebResults),
    );

    const webMs = Date.now() - startTime;
    const webResults = results.map(toWebSnippet);

    logger.log(
      `[WebSearch] stage=4_web_search status=done results=${webResults.length} duration=${webMs}ms`,
    );

    return {
      webResults,
      timings: { ...state.timings, webMs },
      currentStage: 'webSearch',
    };
  };
}
