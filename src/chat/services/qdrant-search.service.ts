/**
 * Qdrant Search Service
 * Vector search capability: embeds the query text and searches one Qdrant
 * collection, scoped to a namespace payload key.
 */

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QdrantClient, type Schemas } from '@qdrant/js-client-rest';
import type { Embeddings } from '@langchain/core/embeddings';
import {
  ConfigurationError,
  PipelineValidationError,
} from '../../common/errors';
import type { SearchFilters } from '../../common/cache/cache-keys';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import type {
  VectorHit,
  VectorSearchCapability,
  VectorSearchParams,
} from '../types';

export const NAMESPACE_PAYLOAD_KEY = 'namespace';

type FieldCondition = Schemas['FieldCondition'];
type MatchScalar = string | number | boolean;

const isMatchScalar = (value: unknown): value is MatchScalar =>
  typeof value === 'string' ||
  typeof value === 'number' ||
  typeof value === 'boolean';

/**
 * Translate namespace plus equality filters into a Qdrant `must` filter.
 * Array values match any of their members.
 */
export function buildQdrantFilter(
  namespace: string,
  filters?: SearchFilters | null,
): Schemas['Filter'] {
  const must: FieldCondition[] = [
    { key: NAMESPACE_PAYLOAD_KEY, match: { value: namespace } },
  ];

  for (const [key, value] of Object.entries(filters ?? {})) {
    if (isMatchScalar(value)) {
      must.push({ key, match: { value } });
      continue;
    }
    if (Array.isArray(value)) {
      const strings = value.filter((v): v is string => typeof v === 'string');
      const numbers = value.filter((v): v is number => Number.isInteger(v));
      if (value.length > 0 && strings.length === value.length) {
        must.push({ key, match: { any: strings } });
        continue;
      }
      if (value.length > 0 && numbers.length === value.length) {
        must.push({ key, match: { any: numbers } });
        continue;
      }
    }
    throw new PipelineValidationError(
      `filter '${key}' must be a string, number, boolean or a non-empty array of strings or integers`,
      'filters',
    );
  }

  return { must };
}

@Injectable()
export class QdrantSearchService implements VectorSearchCapability, OnModuleInit {
  private readonly logger = new Logger(QdrantSearchService.name);
  private readonly client: QdrantClient;
  private readonly collection: string;
  private embeddings: Embeddings | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly embeddingFactory: EmbeddingProviderFactory,
  ) {
    const url = this.configService.get<string>(
      'QDRANT_URL',
      'http://localhost:6333',
    );
    const apiKey = this.configService.get<string>('QDRANT_API_KEY');

    this.collection = this.configService.get<string>(
      'VECTOR_COLLECTION',
      'documents',
    );
    this.client = new QdrantClient(apiKey ? { url, apiKey } : { url });

    this.logger.log(
      `QdrantClient initialized: ${url}, collection: ${this.collection}`,
    );
  }

  async onModuleInit(): Promise<void> {
    const { exists } = await this.client.collectionExists(this.collection);
    if (!exists) {
      throw new ConfigurationError(
        `Qdrant collection '${this.collection}' not found`,
        ['VECTOR_COLLECTION'],
      );
    }
    this.logger.log(`✓ Qdrant collection '${this.collection}' found`);
  }

  async search(params: VectorSearchParams): Promise<VectorHit[]> {
    const filter = buildQdrantFilter(params.namespace, params.filters);
    const vector = await this.getEmbeddings().embedQuery(params.queryText);

    const points = await this.client.search(this.collection, {
      vector,
      limit: params.topK,
      filter,
      with_payload: true,
    });

    this.logger.debug(
      `[QdrantSearch] namespace=${params.namespace} top_k=${params.topK} hits=${points.length}`,
    );

    return points.map((point) => ({
      id: String(point.id),
      score: point.score,
      fields: point.payload ?? {},
    }));
  }

  private getEmbeddings(): Embeddings {
    if (!this.embeddings) {
      this.embeddings = this.embeddingFactory.createEmbeddingModel();
    }
    return this.embeddings;
  }
}
