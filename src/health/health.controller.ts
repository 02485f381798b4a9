/**
 * Health HTTP Controller
 * GET /health - liveness plus the optional features currently in effect
 */

import { Controller, Get, Inject } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ResponseCacheService } from '../common/cache/response-cache.service';
import { WEB_SEARCH, type WebSearchCapability } from '../chat/types';

export interface HealthResponse {
  status: 'ok';
  service: string;
  version: string;
  webSearchAvailable: boolean;
  cacheEnabled: boolean;
}

@Controller('health')
export class HealthController {
  constructor(
    private readonly configService: ConfigService,
    private readonly cacheService: ResponseCacheService,
    @Inject(WEB_SEARCH) private readonly webSearch: WebSearchCapability,
  ) {}

  @Get()
  check(): HealthResponse {
    return {
      status: 'ok',
      service: this.configService.get<string>('SERVICE_NAME', 'rag-chat-service'),
      version: this.configService.get<string>('APP_VERSION', '0.1.0'),
      webSearchAvailable: this.webSearch.isAvailable(),
      cacheEnabled: this.cacheService.isEnabled(),
    };
  }
}
