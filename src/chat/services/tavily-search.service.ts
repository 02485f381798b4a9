/**
 * Tavily Search Service
 * Web search capability over the Tavily REST API.
 * Unavailable (not an error) when TAVILY_API_KEY is unset.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { type AxiosInstance } from 'axios';
import { MalformedResponseError } from '../../common/errors';
import { CAPABILITY, type WebResult, type WebSearchCapability } from '../types';

/**
 * Tavily Search Request
 */
interface TavilySearchRequest {
  query: string;
  max_results: number;
  search_depth: 'basic' | 'advanced';
  include_answer: boolean;
}

const asString = (value: unknown): string =>
  typeof value === 'string' ? value : '';

/**
 * Map a Tavily response body to web results.
 * Throws MalformedResponseError when `results` is not an array.
 */
export function parseTavilyResults(body: unknown): WebResult[] {
  if (
    !body ||
    typeof body !== 'object' ||
    !('results' in body) ||
    !Array.isArray(body.results)
  ) {
    throw new MalformedResponseError(
      CAPABILITY.WEB_SEARCH,
      'response has no results array',
    );
  }

  const results: unknown[] = body.results;
  return results.flatMap((item): WebResult[] => {
    if (!item || typeof item !== 'object') {
      return [];
    }
    return [
      {
        title: 'title' in item ? asString(item.title) : '',
        url: 'url' in item ? asString(item.url) : '',
        content: 'content' in item ? asString(item.content) : '',
      },
    ];
  });
}

@Injectable()
export class TavilySearchService implements WebSearchCapability {
  private readonly logger = new Logger(TavilySearchService.name);
  private readonly client: AxiosInstance | null;

  constructor(private readonly configService: ConfigService) {
    const apiKey = this.configService.get<string>('TAVILY_API_KEY');
    const baseURL = this.configService.get<string>(
      'TAVILY_BASE_URL',
      'https://api.tavily.com',
    );

    if (!apiKey) {
      this.client = null;
      this.logger.warn(
        'TAVILY_API_KEY not set, web search fallback is unavailable',
      );
      return;
    }

    this.client = axios.create({
      baseURL,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
    });

    this.logger.log(`TavilySearchService initialized: ${baseURL}`);
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async search(query: string, maxResults: number): Promise<WebResult[]> {
    if (!this.client) {
      return [];
    }

    const request: TavilySearchRequest = {
      query,
      max_results: maxResults,
      search_depth: 'basic',
      include_answer: false,
    };

    const response = await this.client.post<unknown>('/search', request);
    const results = parseTavilyResults(response.data).slice(0, maxResults);

    this.logger.debug(
      `[TavilySearch] max_results=${maxResults} results=${results.length}`,
    );

    return results;
  }
}
