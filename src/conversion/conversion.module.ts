import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { ConversionController } from './controllers/conversion.controller';
import { ImagesController } from './controllers/images.controller';
import { JobRetentionService } from './services/job-retention.service';

/**
 * HTTP surface for submitting and inspecting conversion jobs.
 */
@Module({
  imports: [ApplicationModule, InfrastructureModule],
  controllers: [ConversionController, ImagesController],
  providers: [JobRetentionService],
})
export class ConversionModule {}
