/**
 * Metrics Service
 * Process-lifetime counters and timing statistics for the chat pipeline.
 *
 * - request/error counters per HTTP path
 * - ring buffer of the most recent TIMING_BUFFER_SIZE samples (percentiles)
 * - running sums and count over every sample ever recorded (averages)
 */

import { Injectable, Logger } from '@nestjs/common';
import { ResponseCacheService } from '../cache/response-cache.service';
import { percentile } from './percentile';
import {
  TIMING_FIELDS,
  type MetricsSnapshot,
  type TimingSample,
} from './metrics.types';

export const TIMING_BUFFER_SIZE = 20;

const zeroSample = (): TimingSample => ({
  retrieveMs: 0,
  webMs: 0,
  generateMs: 0,
  totalMs: 0,
});

@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);

  private requestCounts = new Map<string, number>();
  private errorCounts = new Map<string, number>();
  private samples: TimingSample[] = [];
  private sums: TimingSample = zeroSample();
  private sampleCount = 0;

  constructor(private readonly cacheService: ResponseCacheService) {}

  recordRequest(path: string, isError: boolean): void {
    this.requestCounts.set(path, (this.requestCounts.get(path) ?? 0) + 1);
    if (isError) {
      this.errorCounts.set(path, (this.errorCounts.get(path) ?? 0) + 1);
    }
  }

  recordTiming(timings: Partial<TimingSample>): void {
    const sample = zeroSample();
    for (const field of TIMING_FIELDS) {
      const value = timings[field];
      sample[field] = typeof value === 'number' && Number.isFinite(value) ? value : 0;
    }

    this.samples.push(sample);
    if (this.samples.length > TIMING_BUFFER_SIZE) {
      this.samples.shift();
    }
    for (const field of TIMING_FIELDS) {
      this.sums[field] += sample[field];
    }
    this.sampleCount += 1;

    this.logger.debug(
      `[Metrics] sample recorded count=${this.sampleCount} total=${sample.totalMs.toFixed(2)}ms`,
    );
  }

  snapshot(): MetricsSnapshot {
    // Copy first; everything below works on the copies
    const requestsByPath = Object.fromEntries(this.requestCounts);
    const errorsByPath = Object.fromEntries(this.errorCounts);
    const samples = this.samples.map((sample) => ({ ...sample }));
    const sums = { ...this.sums };
    const count = this.sampleCount;

    const averageMs = zeroSample();
    const p50Ms = zeroSample();
    const p95Ms = zeroSample();

    for (const field of TIMING_FIELDS) {
      averageMs[field] = count > 0 ? sums[field] / count : 0;
      const values = samples.map((sample) => sample[field]);
      p50Ms[field] = percentile(values, 50);
      p95Ms[field] = percentile(values, 95);
    }

    return {
      requestsByPath,
      errorsByPath,
      timings: { averageMs, p50Ms, p95Ms },
      cache: this.cacheService.getStats(),
      sampleCount: count,
      samples,
    };
  }

  /**
   * Test-only: forget every counter and sample
   */
  reset(): void {
    this.requestCounts = new Map();
    this.errorCounts = new Map();
    this.samples = [];
    this.sums = zeroSample();
    this.sampleCount = 0;
  }
}
