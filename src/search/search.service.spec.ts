import { ConfigService } from '@nestjs/config';
import { ResponseCacheService } from '../common/cache/response-cache.service';
import { PipelineValidationError } from '../common/errors';
import { ResilienceService } from '../common/resilience/resilience.service';
import { FakeVectorSearch } from '../../test/fakes/fake-capabilities';
import { SearchService } from './search.service';

describe('SearchService', () => {
  let vectorSearch: FakeVectorSearch;
  let cache: ResponseCacheService;
  let service: SearchService;

  beforeEach(() => {
    const configService = new ConfigService({
      VECTOR_TEXT_FIELD: 'text',
      RESILIENCE_MAX_ATTEMPTS: '1',
    });
    vectorSearch = new FakeVectorSearch();
    vectorSearch.hits = [
      { id: '42', score: 0.7, fields: { text: 'Badge office hours.', source: 'faq' } },
      { id: '43', score: 0.5, fields: { source: 'faq' } },
    ];
    cache = new ResponseCacheService(configService);
    service = new SearchService(
      configService,
      cache,
      new ResilienceService(configService),
      vectorSearch,
    );
  });

  it('returns hits with the text under chunk_text', async () => {
    const result = await service.search({ query: 'badge', topK: 2 });

    expect(result).toEqual({
      namespace: 'dev',
      query: 'badge',
      topK: 2,
      cached: false,
      hits: [
        {
          id: '42',
          score: 0.7,
          fields: {
            text: 'Badge office hours.',
            source: 'faq',
            chunk_text: 'Badge office hours.',
          },
        },
        { id: '43', score: 0.5, fields: { source: 'faq', chunk_text: '' } },
      ],
    });
  });

  it('passes namespace and filters to the vector search', async () => {
    await service.search({
      query: 'badge',
      namespace: 'hr',
      filters: { lang: 'en' },
    });

    expect(vectorSearch.calls).toEqual([
      { namespace: 'hr', queryText: 'badge', topK: 5, filters: { lang: 'en' } },
    ]);
  });

  it('serves repeated searches from the cache', async () => {
    await service.search({ query: 'badge' });
    const again = await service.search({ query: 'badge', topK: 5 });

    expect(again.cached).toBe(true);
    expect(vectorSearch.calls).toHaveLength(1);
    expect(cache.getStats()).toMatchObject({ searchHits: 1, searchMisses: 1 });
  });

  it('rejects a blank query', async () => {
    await expect(service.search({ query: ' ' })).rejects.toBeInstanceOf(
      PipelineValidationError,
    );
  });
});
