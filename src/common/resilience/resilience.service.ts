/**
 * Resilience Service
 * Single retry/backoff/timeout wrapper used by every external capability call
 * (vector search, web search, answer generation).
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CapabilityTimeoutError,
  ConfigurationError,
  PipelineValidationError,
  UpstreamServiceError,
} from '../errors';
import { readPipelineSettings } from '../../config/pipeline.settings';
import {
  classifyError,
  describeError,
  extractStatus,
} from './error-classifier';
import { computeBackoffDelay, type RetryPolicy } from './retry-policy';

@Injectable()
export class ResilienceService {
  private readonly logger = new Logger(ResilienceService.name);
  private readonly defaultPolicy: RetryPolicy;

  constructor(configService: ConfigService) {
    const settings = readPipelineSettings(configService);

    this.defaultPolicy = {
      maxAttempts: settings.maxAttempts,
      baseDelayMs: settings.baseDelayMs,
      maxDelayMs: settings.maxDelayMs,
      timeoutMs: settings.httpTimeoutMs,
    };

    this.logger.log(
      `Initialized with max attempts: ${this.defaultPolicy.maxAttempts}, ` +
        `backoff: ${this.defaultPolicy.baseDelayMs}-${this.defaultPolicy.maxDelayMs}ms, ` +
        `timeout: ${this.defaultPolicy.timeoutMs}ms`,
    );
  }

  getDefaultPolicy(): RetryPolicy {
    return { ...this.defaultPolicy };
  }

  /**
   * Invoke `fn` under the retry policy.
   * Throws UpstreamServiceError naming `capability` on permanent failure
   * or once attempts are exhausted. Validation and configuration errors
   * propagate unchanged.
   */
  async call<T>(
    capability: string,
    fn: () => Promise<T>,
    overrides?: Partial<RetryPolicy>,
  ): Promise<T> {
    const policy: RetryPolicy = { ...this.defaultPolicy, ...overrides };
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
      try {
        return await this.withTimeout(capability, fn, policy.timeoutMs);
      } catch (error) {
        // Already classified, or a local error raised before any I/O
        if (
          error instanceof UpstreamServiceError ||
          error instanceof PipelineValidationError ||
          error instanceof ConfigurationError
        ) {
          throw error;
        }
        lastError = error;

        if (classifyError(error) === 'permanent') {
          this.logger.error(
            `[Resilience] capability=${capability} status=permanent_failure attempt=${attempt}/${policy.maxAttempts} error=${describeError(error)}`,
          );
          throw this.toUpstreamError(capability, error, attempt);
        }

        if (attempt < policy.maxAttempts) {
          const delay = computeBackoffDelay(attempt, policy);
          this.logger.warn(
            `[Resilience] capability=${capability} status=retrying attempt=${attempt}/${policy.maxAttempts} delay=${delay}ms error=${describeError(error)}`,
          );
          await this.sleep(delay);
        }
      }
    }

    this.logger.error(
      `[Resilience] capability=${capability} status=exhausted attempts=${policy.maxAttempts} error=${describeError(lastError)}`,
    );
    throw this.toUpstreamError(capability, lastError, policy.maxAttempts);
  }

  protected sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  private async withTimeout<T>(
    capability: string,
    fn: () => Promise<T>,
    timeoutMs: number,
  ): Promise<T> {
    if (timeoutMs <= 0) {
      return fn();
    }

    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        fn(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new CapabilityTimeoutError(capability, timeoutMs)),
            timeoutMs,
          );
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private toUpstreamError(
    capability: string,
    error: unknown,
    attempts: number,
  ): UpstreamServiceError {
    return new UpstreamServiceError(
      capability,
      `Upstream ${capability} call failed after ${attempts} attempt(s). Please try again later.`,
      extractStatus(error),
      error,
    );
  }
}
