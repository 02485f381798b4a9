/**
 * Response Cache Module
 * Global singleton so the chat and search modules share one set of caches.
 */

import { Global, Module } from '@nestjs/common';
import { ResponseCacheService } from './response-cache.service';

@Global()
@Module({
  providers: [ResponseCacheService],
  exports: [ResponseCacheService],
})
export class ResponseCacheModule {}
