import { Controller, Get } from '@nestjs/common';
import { MetricsService } from './metrics.service';
import type { MetricsSnapshot } from './metrics.types';

@Controller('metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  /**
   * GET /metrics
   * Request/error counts by path, chat timing statistics (average, p50, p95),
   * cache hit/miss counters and the most recent timing samples.
   */
  @Get()
  getMetrics(): MetricsSnapshot {
    return this.metricsService.snapshot();
  }
}
