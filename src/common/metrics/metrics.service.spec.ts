import { ConfigService } from '@nestjs/config';
import { ResponseCacheService } from '../cache/response-cache.service';
import { MetricsService, TIMING_BUFFER_SIZE } from './metrics.service';

describe('MetricsService', () => {
  let cache: ResponseCacheService;
  let metrics: MetricsService;

  beforeEach(() => {
    cache = new ResponseCacheService(new ConfigService({}));
    metrics = new MetricsService(cache);
  });

  it('reports zeros before any sample', () => {
    const snapshot = metrics.snapshot();

    expect(snapshot.sampleCount).toBe(0);
    expect(snapshot.samples).toEqual([]);
    expect(snapshot.timings.averageMs.totalMs).toBe(0);
    expect(snapshot.timings.p95Ms.totalMs).toBe(0);
  });

  it('counts requests and errors per path', () => {
    metrics.recordRequest('/chat', false);
    metrics.recordRequest('/chat', true);
    metrics.recordRequest('/search', false);

    const snapshot = metrics.snapshot();
    expect(snapshot.requestsByPath).toEqual({ '/chat': 2, '/search': 1 });
    expect(snapshot.errorsByPath).toEqual({ '/chat': 1 });
  });

  it('computes p50 and p95 over recorded totals', () => {
    for (const totalMs of [10, 20, 30, 40, 50]) {
      metrics.recordTiming({ totalMs });
    }

    const { timings } = metrics.snapshot();
    expect(timings.p50Ms.totalMs).toBe(30);
    expect(timings.p95Ms.totalMs).toBe(50);
    expect(timings.averageMs.totalMs).toBe(30);
  });

  it('keeps the latest samples in the buffer and averages over all of them', () => {
    for (let totalMs = 1; totalMs <= 21; totalMs++) {
      metrics.recordTiming({ retrieveMs: 1, totalMs });
    }

    const snapshot = metrics.snapshot();
    expect(snapshot.sampleCount).toBe(21);
    expect(snapshot.samples).toHaveLength(TIMING_BUFFER_SIZE);
    expect(snapshot.samples[0]).toEqual({
      retrieveMs: 1,
      webMs: 0,
      generateMs: 0,
      totalMs: 2,
    });
    // (1 + … + 21) / 21
    expect(snapshot.timings.averageMs.totalMs).toBe(11);
    expect(snapshot.timings.averageMs.retrieveMs).toBe(1);
    // buffer holds 2..21
    expect(snapshot.timings.p50Ms.totalMs).toBe(12);
    expect(snapshot.timings.p95Ms.totalMs).toBe(20);
  });

  it('embeds cache counters', () => {
    cache.getSearch({ namespace: 'dev', query: 'vpn', topK: 5 });

    expect(metrics.snapshot().cache.searchMisses).toBe(1);
  });

  it('returns copies that do not alias internal state', () => {
    metrics.recordTiming({ totalMs: 5 });
    const snapshot = metrics.snapshot();
    snapshot.samples[0] = { retrieveMs: 9, webMs: 9, generateMs: 9, totalMs: 9 };

    expect(metrics.snapshot().samples[0]?.totalMs).toBe(5);
  });

  it('reset() clears everything', () => {
    metrics.recordRequest('/chat', true);
    metrics.recordTiming({ totalMs: 5 });
    metrics.reset();

    const snapshot = metrics.snapshot();
    expect(snapshot.requestsByPath).toEqual({});
    expect(snapshot.sampleCount).toBe(0);
  });
});
