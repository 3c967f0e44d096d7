import { type MiddlewareConsumer, Module, type NestModule } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { CorrelationIdMiddleware } from './shared/logging/correlation-id.middleware';
import { ConversionModule } from './conversion/conversion.module';
import { DomainExceptionFilter } from './conversion/filters/domain-exception.filter';
import { HealthModule } from './health/health.module';

/**
 * Application Module
 * HTTP service that converts presentations into page images
 */
@Module({
  imports: [ConfigModule, SharedModule, ConversionModule, HealthModule],
  providers: [
    {
      provide: APP_FILTER,
      useClass: DomainExceptionFilter,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
