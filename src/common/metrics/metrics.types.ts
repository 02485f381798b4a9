import type { CacheStats } from '../cache/response-cache.service';

export const TIMING_FIELDS = [
  'retrieveMs',
  'webMs',
  'generateMs',
  'totalMs',
] as const;

export type TimingField = (typeof TIMING_FIELDS)[number];

/**
 * One chat request's stage durations, in milliseconds
 */
export type TimingSample = Record<TimingField, number>;

export interface TimingStatistics {
  averageMs: TimingSample;
  p50Ms: TimingSample;
  p95Ms: TimingSample;
}

export interface MetricsSnapshot {
  requestsByPath: Record<string, number>;
  errorsByPath: Record<string, number>;
  timings: TimingStatistics;
  cache: CacheStats;
  /** Samples recorded since process start */
  sampleCount: number;
  /** Ring buffer contents, oldest first */
  samples: TimingSample[];
}
