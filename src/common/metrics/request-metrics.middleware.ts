import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { MetricsService } from './metrics.service';

/**
 * Counts every HTTP request once per path when the response is done.
 * Status >= 400, or a connection closed before the response finished,
 * counts as an error.
 */
@Injectable()
export class RequestMetricsMiddleware implements NestMiddleware {
  constructor(private readonly metricsService: MetricsService) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const path = (req.originalUrl || req.url || '/').split('?')[0] || '/';
    let recorded = false;

    const record = (isError: boolean) => {
      if (recorded) {
        return;
      }
      recorded = true;
      this.metricsService.recordRequest(path, isError);
    };

    res.on('finish', () => record(res.statusCode >= 400));
    res.on('close', () => record(!res.writableFinished));
    next();
  }
}
