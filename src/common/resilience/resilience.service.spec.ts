import { ConfigService } from '@nestjs/config';
import { EmbeddingProviderFactory } from '../../chat/providers/embedding-provider.factory';
import {
  CapabilityTimeoutError,
  ConfigurationError,
  PipelineValidationError,
  UpstreamServiceError,
} from '../errors';
import { ResilienceService } from './resilience.service';
import { computeBackoffDelay } from './retry-policy';

/**
 * Records backoff delays instead of waiting
 */
class RecordingResilienceService extends ResilienceService {
  readonly delays: number[] = [];

  protected sleep(ms: number): Promise<void> {
    this.delays.push(ms);
    return Promise.resolve();
  }
}

const withStatus = (status: number) =>
  Object.assign(new Error(`HTTP ${status}`), { status });

const captureRejection = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected promise to reject');
};

describe('computeBackoffDelay', () => {
  const policy = { baseDelayMs: 1000, maxDelayMs: 8000 };

  it('doubles per retry up to the cap', () => {
    expect(computeBackoffDelay(1, policy)).toBe(1000);
    expect(computeBackoffDelay(2, policy)).toBe(2000);
    expect(computeBackoffDelay(3, policy)).toBe(4000);
    expect(computeBackoffDelay(4, policy)).toBe(8000);
    expect(computeBackoffDelay(5, policy)).toBe(8000);
  });
});

describe('ResilienceService', () => {
  let service: RecordingResilienceService;

  beforeEach(() => {
    service = new RecordingResilienceService(new ConfigService({}));
  });

  it('reads its default policy from configuration', () => {
    expect(service.getDefaultPolicy()).toEqual({
      maxAttempts: 3,
      baseDelayMs: 1000,
      maxDelayMs: 8000,
      timeoutMs: 10000,
    });
  });

  it('retries a 500 with growing backoff, then raises UpstreamServiceError', async () => {
    const original = withStatus(500);
    const fn = jest.fn().mockRejectedValue(original);

    const error = await captureRejection(service.call('vector-search', fn));

    expect(fn).toHaveBeenCalledTimes(3);
    expect(service.delays).toEqual([1000, 2000]);
    expect(error).toBeInstanceOf(UpstreamServiceError);
    if (error instanceof UpstreamServiceError) {
      expect(error.service).toBe('vector-search');
      expect(error.status).toBe(500);
      expect(error.originalError).toBe(original);
      expect(error.message).toBe(
        'Upstream vector-search call failed after 3 attempt(s). Please try again later.',
      );
    }
  });

  it.each([404, 400])('raises immediately on %p', async (status) => {
    const fn = jest.fn().mockRejectedValue(withStatus(status));

    const error = await captureRejection(service.call('web-search', fn));

    expect(fn).toHaveBeenCalledTimes(1);
    expect(service.delays).toEqual([]);
    expect(error).toBeInstanceOf(UpstreamServiceError);
    if (error instanceof UpstreamServiceError) {
      expect(error.status).toBe(status);
    }
  });

  it('returns the first success after a rate limit', async () => {
    const fn = jest
      .fn()
      .mockRejectedValueOnce(withStatus(429))
      .mockResolvedValueOnce('ok');

    await expect(service.call('answer-generation', fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(service.delays).toEqual([1000]);
  });

  it('times out slow attempts and retries them', async () => {
    const fn = jest.fn(() => new Promise<string>(() => undefined));

    const error = await captureRejection(
      service.call('web-search', fn, { timeoutMs: 10, maxAttempts: 2 }),
    );

    expect(fn).toHaveBeenCalledTimes(2);
    expect(service.delays).toEqual([1000]);
    expect(error).toBeInstanceOf(UpstreamServiceError);
    if (error instanceof UpstreamServiceError) {
      expect(error.originalError).toBeInstanceOf(CapabilityTimeoutError);
    }
  });

  it('passes through errors that are already classified', async () => {
    const upstream = new UpstreamServiceError('web-search', 'down');
    const invalid = new PipelineValidationError('bad filter', 'filters');

    await expect(
      service.call('vector-search', () => Promise.reject(upstream)),
    ).rejects.toBe(upstream);
    await expect(
      service.call('vector-search', () => Promise.reject(invalid)),
    ).rejects.toBe(invalid);
    expect(service.delays).toEqual([]);
  });

  it('lets a configuration error raised at first use propagate', async () => {
    const factory = new EmbeddingProviderFactory(
      new ConfigService({ EMBEDDING_PROVIDER: 'openai' }),
    );

    const error = await captureRejection(
      service.call('vector-search', () =>
        factory.createEmbeddingModel().embedQuery('vpn'),
      ),
    );

    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      expect(error.keys).toEqual(['OPENAI_API_KEY']);
    }
    expect(service.delays).toEqual([]);
  });
});
