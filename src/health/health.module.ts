import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { ToolsHealthIndicator } from './indicators/tools.health';
import { ConversionPoolHealthIndicator } from './indicators/conversion-pool.health';
import { DiskSpaceHealthIndicator } from './indicators/disk-space.health';
import { SharedModule } from '../shared/shared.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { ConversionPoolModule } from '../conversion-pool/conversion-pool.module';

@Module({
  imports: [TerminusModule, SharedModule, InfrastructureModule, ConversionPoolModule],
  controllers: [HealthController],
  providers: [ToolsHealthIndicator, ConversionPoolHealthIndicator, DiskSpaceHealthIndicator],
})
export class HealthModule {}
