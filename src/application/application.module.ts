import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { ConversionPoolModule } from '../conversion-pool/conversion-pool.module';

// Use Cases
import {
  SubmitConversionUseCase,
  RunConversionUseCase,
  GetJobUseCase,
  ListJobsUseCase,
  DeleteJobUseCase,
} from './use-cases';

/**
 * Application Module
 * Contains all use cases and application services
 *
 * Use cases depend on output ports (interfaces) only. The implementations
 * come from InfrastructureModule and ConversionPoolModule through their tokens.
 */
@Module({
  imports: [ConfigModule, InfrastructureModule, ConversionPoolModule],
  providers: [
    // Use Cases
    SubmitConversionUseCase,
    RunConversionUseCase,
    GetJobUseCase,
    ListJobsUseCase,
    DeleteJobUseCase,
  ],
  exports: [
    // Export use cases so they can be used by driving adapters (controllers)
    SubmitConversionUseCase,
    RunConversionUseCase,
    GetJobUseCase,
    ListJobsUseCase,
    DeleteJobUseCase,
  ],
})
export class ApplicationModule {}
