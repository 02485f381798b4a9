import { Module, NestModule, MiddlewareConsumer } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import { RequestIdMiddleware } from './shared/middleware/request-id.middleware';
import { pinoConfig } from './shared/logging/pino.config';
import { validateEnvironment } from './config/env.validation';
import { PipelineExceptionFilter } from './common/filters/pipeline-exception.filter';
import { ResponseCacheModule } from './common/cache/cache.module';
import { MetricsModule } from './common/metrics/metrics.module';
import { ResilienceModule } from './common/resilience/resilience.module';
import { ChatModule } from './chat/chat.module';
import { SearchModule } from './search/search.module';
import { HealthModule } from './health/health.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnvironment,
    }),
    LoggerModule.forRoot(pinoConfig),
    ResponseCacheModule,
    MetricsModule,
    ResilienceModule,
    ChatModule,
    SearchModule,
    HealthModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: PipelineExceptionFilter }],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestIdMiddleware).forRoutes('*');
  }
}
