import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { CONVERSION_POOL_PORT } from '../application/ports/output/injection-tokens';
import { ConversionPoolService } from './conversion-pool.service';

@Module({
  imports: [ConfigModule],
  providers: [
    ConversionPoolService,
    {
      provide: CONVERSION_POOL_PORT,
      useExisting: ConversionPoolService,
    },
  ],
  exports: [ConversionPoolService, CONVERSION_POOL_PORT],
})
export class ConversionPoolModule {}
