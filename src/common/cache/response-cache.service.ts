/**
 * Response Cache Service
 * Two in-process caches shared by every request:
 * - search: retrieval-only results (POST /search)
 * - chat: full chat answers, only for requests without conversation history
 *
 * Both are bounded LRU caches whose entries go stale once older than the
 * TTL. Hit/miss counters are updated in the same synchronous step as the
 * lookup, so counters and cache contents never diverge.
 */

import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readPipelineSettings } from '../../config/pipeline.settings';
import type { ChatMessage, ChatResult } from '../../chat/types';
import type { SearchResult } from '../../search/types';
import { LRUCache } from 'lru-cache';
import {
  chatCacheKey,
  searchCacheKey,
  type ChatCacheParams,
  type SearchCacheParams,
} from './cache-keys';

export const CACHE_CLOCK = Symbol('CACHE_CLOCK');

/** Millisecond clock used for entry age; tests inject a manual one */
export type Clock = () => number;

export const CACHE_LIMITS = {
  SEARCH_TTL_MS: 60_000,
  SEARCH_MAX_ENTRIES: 1024,
  CHAT_TTL_MS: 60_000,
  CHAT_MAX_ENTRIES: 512,
} as const;

export interface CacheStats {
  searchHits: number;
  searchMisses: number;
  chatHits: number;
  chatMisses: number;
}

@Injectable()
export class ResponseCacheService {
  private readonly logger = new Logger(ResponseCacheService.name);
  private readonly enabled: boolean;
  private readonly searchCache: LRUCache<string, SearchResult>;
  private readonly chatCache: LRUCache<string, ChatResult>;
  private stats: CacheStats = ResponseCacheService.emptyStats();

  constructor(
    configService: ConfigService,
    @Optional() @Inject(CACHE_CLOCK) clock?: Clock,
  ) {
    this.enabled = readPipelineSettings(configService).cacheEnabled;
    const perf = clock ? { now: clock } : undefined;

    this.searchCache = new LRUCache<string, SearchResult>({
      max: CACHE_LIMITS.SEARCH_MAX_ENTRIES,
      ttl: CACHE_LIMITS.SEARCH_TTL_MS,
      ttlResolution: 0,
      perf,
    });
    this.chatCache = new LRUCache<string, ChatResult>({
      max: CACHE_LIMITS.CHAT_MAX_ENTRIES,
      ttl: CACHE_LIMITS.CHAT_TTL_MS,
      ttlResolution: 0,
      perf,
    });

    this.logger.log(`Response cache ${this.enabled ? 'enabled' : 'disabled'}`);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Chat answers are cacheable only without conversation history
   */
  isChatCacheable(chatHistory: readonly ChatMessage[] | undefined): boolean {
    return this.enabled && (chatHistory?.length ?? 0) === 0;
  }

  getSearch(params: SearchCacheParams): SearchResult | undefined {
    if (!this.enabled) {
      return undefined;
    }

    const value = this.searchCache.get(searchCacheKey(params));
    if (value !== undefined) {
      this.stats.searchHits += 1;
    } else {
      this.stats.searchMisses += 1;
    }

    this.logger.log(
      `[Cache] cache=search status=${value !== undefined ? 'hit' : 'miss'} namespace=${params.namespace} topK=${params.topK}`,
    );
    return value;
  }

  setSearch(params: SearchCacheParams, value: SearchResult): void {
    if (!this.enabled) {
      return;
    }
    this.searchCache.set(searchCacheKey(params), value);
  }

  getChat(
    params: ChatCacheParams,
    chatHistory: readonly ChatMessage[] | undefined,
  ): ChatResult | undefined {
    if (!this.isChatCacheable(chatHistory)) {
      return undefined;
    }

    const value = this.chatCache.get(chatCacheKey(params));
    if (value !== undefined) {
      this.stats.chatHits += 1;
    } else {
      this.stats.chatMisses += 1;
    }

    this.logger.log(
      `[Cache] cache=chat status=${value !== undefined ? 'hit' : 'miss'} namespace=${params.namespace} topK=${params.topK}`,
    );
    return value;
  }

  setChat(
    params: ChatCacheParams,
    chatHistory: readonly ChatMessage[] | undefined,
    value: ChatResult,
  ): void {
    if (!this.isChatCacheable(chatHistory)) {
      return;
    }
    this.chatCache.set(chatCacheKey(params), value);
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  /**
   * Test-only: drop every entry and zero the counters
   */
  reset(): void {
    this.searchCache.clear();
    this.chatCache.clear();
    this.stats = ResponseCacheService.emptyStats();
  }

  private static emptyStats(): CacheStats {
    return { searchHits: 0, searchMisses: 0, chatHits: 0, chatMisses: 0 };
  }
}
