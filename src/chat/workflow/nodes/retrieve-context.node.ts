/**
 * Retrieve Context Node
 * Vector search for the normalized query; maps hits to source snippets and
 * tracks the highest relevance score.
 */

import { Logger } from '@nestjs/common';
import type { ResilienceService } from '../../../common/resilience/resilience.service';
import {
  CAPABILITY,
  type SourceSnippet,
  type VectorHit,
  type VectorSearchCapability,
} from '../../types';
import type { ChatStateType } from '../state/chat-state';

const logger = new Logger('RetrieveContextNode');

const asText = (value: unknown): string =>
  value === undefined || value === null ? '' : String(value);

/**
 * Map a vector hit to a snippet, reading the chunk text from `textField`
 */
export function toSourceSnippet(hit: VectorHit, textField: string): SourceSnippet {
  return {
    source: asText(hit.fields.source) || 'unknown',
    title: asText(hit.fields.title),
    url: asText(hit.fields.url),
    score: Number.isFinite(hit.score) ? hit.score : 0,
    chunkText: asText(hit.fields[textField]),
  };
}

export function createRetrieveContextNode(
  vectorSearch: VectorSearchCapability,
  resilience: ResilienceService,
  textField: string,
) {
  return async (state: ChatStateType): Promise<Partial<ChatStateType>> => {
    const startTime = Date.now();

    const hits = await resilience.call(CAPABILITY.VECTOR_SEARCH, () =>
      vectorSearch.search({
        namespace: state.namespace,
        queryText: state.query,
        topK: state.topK,
        filters: null,
      }),
    );

    const retrieveMs = Date.now() - startTime;
    const retrieved = hits.map((hit) => toSourceSnippet(hit, textField));
    const topScore = retrieved.reduce(
      (max, snippet) => Math.max(max, snippet.score),
      0,
    );

    logger.log(
      `[RetrieveContext] stage=2_retrieve status=done namespace=${state.namespace} top_k=${state.topK} hits=${retrieved.length} top_score=${topScore.toFixed(4)} duration=${retrieveMs}ms`,
    );

    return {
      retrieved,
      topScore,
      timings: { ...state.timings, retrieveMs },
      currentStage: 'retrieveContext',
    };
  };
}
