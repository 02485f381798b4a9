import { ConfigService } from '@nestjs/config';
import { ResponseCacheService } from '../common/cache/response-cache.service';
import {
  PipelineValidationError,
  UpstreamServiceError,
} from '../common/errors';
import { MetricsService } from '../common/metrics/metrics.service';
import { ResilienceService } from '../common/resilience/resilience.service';
import {
  FakeAnswerGenerator,
  FakeVectorSearch,
  FakeWebSearch,
  handbookHit,
  httpError,
} from '../../test/fakes/fake-capabilities';
import { ChatWorkflowService } from './workflow/chat-workflow.service';
import { ChatService } from './chat.service';

describe('ChatService', () => {
  let now: number;
  let vectorSearch: FakeVectorSearch;
  let webSearch: FakeWebSearch;
  let answerGenerator: FakeAnswerGenerator;
  let cache: ResponseCacheService;
  let metrics: MetricsService;
  let service: ChatService;

  const build = (config: Record<string, string> = {}) => {
    const configService = new ConfigService({
      RESILIENCE_MAX_ATTEMPTS: '1',
      ...config,
    });
    cache = new ResponseCacheService(configService, () => now);
    metrics = new MetricsService(cache);
    const workflow = new ChatWorkflowService(
      configService,
      new ResilienceService(configService),
      vectorSearch,
      webSearch,
      answerGenerator,
    );
    service = new ChatService(configService, workflow, cache, metrics);
  };

  beforeEach(() => {
    now = 1_000;
    vectorSearch = new FakeVectorSearch();
    vectorSearch.hits = [handbookHit(0.82)];
    webSearch = new FakeWebSearch();
    webSearch.results = [
      {
        title: 'VPN guide',
        url: 'https://docs.example/vpn',
        content: 'Public VPN instructions.',
      },
    ];
    answerGenerator = new FakeAnswerGenerator();
    build();
  });

  it('answers from retrieved context', async () => {
    const result = await service.runChat({ query: 'How do I get VPN access?' });

    expect(result.answer).toBe('Grounded answer [1].');
    expect(result.cached).toBe(false);
    expect(result.webFallbackUsed).toBe(false);
    expect(result.topScore).toBe(0.82);
    expect(result.sources).toEqual([
      {
        source: 'handbook',
        title: 'VPN access',
        url: '',
        score: 0.82,
        chunkText: 'Install the VPN client before your first day.',
      },
    ]);
    expect(result.trace).toEqual({ enabled: false, project: null });
    expect(result.timings.totalMs).toBeGreaterThanOrEqual(
      result.timings.generateMs,
    );
    expect(vectorSearch.calls).toEqual([
      {
        namespace: 'dev',
        queryText: 'How do I get VPN access?',
        topK: 5,
        filters: null,
      },
    ]);
    expect(webSearch.calls).toHaveLength(0);
  });

  it('runs the pipeline once for two identical calls within the TTL', async () => {
    const first = await service.runChat({ query: 'vpn' });
    now = 61_000;
    const second = await service.runChat({ query: 'vpn' });

    expect(vectorSearch.calls).toHaveLength(1);
    expect(answerGenerator.calls).toHaveLength(1);
    expect(second).toEqual({ ...first, cached: true });
    expect(cache.getStats()).toEqual({
      searchHits: 0,
      searchMisses: 0,
      chatHits: 1,
      chatMisses: 1,
    });
    // cached answers still contribute a timing sample
    expect(metrics.snapshot().sampleCount).toBe(2);
  });

  it('runs the pipeline again once the entry expired', async () => {
    await service.runChat({ query: 'vpn' });
    now = 61_001;
    const again = await service.runChat({ query: 'vpn' });

    expect(again.cached).toBe(false);
    expect(vectorSearch.calls).toHaveLength(2);
  });

  it('does not cache requests with history', async () => {
    const request = {
      query: 'And on Linux?',
      chatHistory: [
        { role: 'user' as const, content: 'How do I get VPN access?' },
        { role: 'assistant' as const, content: 'Install the client.' },
      ],
    };

    await service.runChat(request);
    const again = await service.runChat(request);

    expect(again.cached).toBe(false);
    expect(vectorSearch.calls).toHaveLength(2);
    expect(answerGenerator.calls[0]).toHaveLength(4);
  });

  it('does not cache requests whose history holds only empty turns', async () => {
    const request = {
      query: 'vpn',
      chatHistory: [{ role: 'user' as const, content: '' }],
    };

    await service.runChat(request);
    const again = await service.runChat(request);

    expect(again.cached).toBe(false);
    expect(vectorSearch.calls).toHaveLength(2);
    expect(cache.getStats().chatMisses).toBe(0);
  });

  it('falls back to the web when retrieval is weak', async () => {
    vectorSearch.hits = [handbookHit(0.1)];

    const result = await service.runChat({ query: 'vpn', maxWebResults: 3 });

    expect(result.webFallbackUsed).toBe(true);
    expect(webSearch.calls).toEqual([{ query: 'vpn', maxResults: 3 }]);
    expect(result.sources).toHaveLength(2);
    expect(result.sources[1]).toEqual({
      source: 'web',
      title: 'VPN guide',
      url: 'https://docs.example/vpn',
      score: 0,
      chunkText: 'Public VPN instructions.',
    });
  });

  it('falls back to the web when nothing was retrieved', async () => {
    vectorSearch.hits = [];

    const result = await service.runChat({ query: 'vpn' });

    expect(result.webFallbackUsed).toBe(true);
    expect(result.topScore).toBe(0);
    expect(result.sources.map((source) => source.source)).toEqual(['web']);
  });

  it('skips the web when the caller opts out or the tool is missing', async () => {
    vectorSearch.hits = [];

    const optedOut = await service.runChat({
      query: 'vpn',
      useWebFallback: false,
    });
    webSearch.available = false;
    const unavailable = await service.runChat({ query: 'other' });

    expect(optedOut.webFallbackUsed).toBe(false);
    expect(unavailable.webFallbackUsed).toBe(false);
    expect(webSearch.calls).toHaveLength(0);
    expect(unavailable.sources).toEqual([]);
  });

  it('leaves no cache entry or timing sample when generation fails', async () => {
    answerGenerator.error = httpError(500, 'model unavailable');

    await expect(service.runChat({ query: 'vpn' })).rejects.toBeInstanceOf(
      UpstreamServiceError,
    );
    expect(metrics.snapshot().sampleCount).toBe(0);

    answerGenerator.error = null;
    const retried = await service.runChat({ query: 'vpn' });

    expect(retried.cached).toBe(false);
    expect(vectorSearch.calls).toHaveLength(2);
  });

  it('reports which capability failed', async () => {
    vectorSearch.error = httpError(404);

    await expect(service.runChat({ query: 'vpn' })).rejects.toMatchObject({
      service: 'vector-search',
      status: 404,
    });
    expect(answerGenerator.calls).toHaveLength(0);
  });

  it('rejects a blank query before touching the cache or any capability', async () => {
    await expect(service.runChat({ query: '   ' })).rejects.toBeInstanceOf(
      PipelineValidationError,
    );
    expect(vectorSearch.calls).toHaveLength(0);
    expect(cache.getStats().chatMisses).toBe(0);
  });

  it('reports tracing metadata from configuration', async () => {
    build({ LANGCHAIN_TRACING_V2: 'true', LANGCHAIN_PROJECT: 'rag-dev' });

    const result = await service.runChat({ query: 'vpn' });

    expect(result.trace).toEqual({ enabled: true, project: 'rag-dev' });
  });

  it('splits answers into whitespace-delimited tokens', () => {
    expect(service.tokenize(' Install  the\nclient [1]. ')).toEqual([
      'Install',
      'the',
      'client',
      '[1].',
    ]);
  });
});
