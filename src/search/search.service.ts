/**
 * Search Service
 * Retrieval-only path behind POST /search, served through the search cache.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PipelineValidationError } from '../common/errors';
import { ResponseCacheService } from '../common/cache/response-cache.service';
import type { SearchCacheParams } from '../common/cache/cache-keys';
import { ResilienceService } from '../common/resilience/resilience.service';
import {
  readPipelineSettings,
  type PipelineSettings,
} from '../config/pipeline.settings';
import {
  CAPABILITY,
  VECTOR_SEARCH,
  type VectorHit,
  type VectorSearchCapability,
} from '../chat/types';
import type { SearchHit, SearchRequest, SearchResult } from './types';

export const RESPONSE_TEXT_FIELD = 'chunk_text';

@Injectable()
export class SearchService {
  private readonly logger = new Logger(SearchService.name);
  private readonly settings: PipelineSettings;

  constructor(
    configService: ConfigService,
    private readonly cacheService: ResponseCacheService,
    private readonly resilience: ResilienceService,
    @Inject(VECTOR_SEARCH)
    private readonly vectorSearch: VectorSearchCapability,
  ) {
    this.settings = readPipelineSettings(configService);
  }

  async search(request: SearchRequest): Promise<SearchResult> {
    if (typeof request.query !== 'string' || request.query.trim() === '') {
      throw new PipelineValidationError('query must not be empty', 'query');
    }

    const params: SearchCacheParams = {
      namespace: request.namespace || this.settings.defaultNamespace,
      query: request.query,
      topK: request.topK ?? this.settings.defaultTopK,
      filters: request.filters ?? null,
    };

    const cachedResult = this.cacheService.getSearch(params);
    if (cachedResult) {
      return { ...cachedResult, cached: true };
    }

    const startTime = Date.now();
    const hits = await this.resilience.call(CAPABILITY.VECTOR_SEARCH, () =>
      this.vectorSearch.search({
        namespace: params.namespace,
        queryText: params.query,
        topK: params.topK,
        filters: params.filters,
      }),
    );

    const result: SearchResult = {
      namespace: params.namespace,
      query: params.query,
      topK: params.topK,
      hits: hits.map((hit) => this.toSearchHit(hit)),
      cached: false,
    };

    this.cacheService.setSearch(params, result);

    this.logger.log(
      `[Search] status=done namespace=${params.namespace} top_k=${params.topK} hits=${result.hits.length} duration=${Date.now() - startTime}ms`,
    );

    return result;
  }

  /**
   * Expose the configured text field under `chunk_text`
   */
  private toSearchHit(hit: VectorHit): SearchHit {
    const text = hit.fields[this.settings.textField];
    return {
      id: hit.id,
      score: hit.score,
      fields: {
        ...hit.fields,
        [RESPONSE_TEXT_FIELD]: text === undefined || text === null ? '' : String(text),
      },
    };
  }
}
