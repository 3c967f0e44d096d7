import { Module } from '@nestjs/common';
import { LoggingModule } from './logging/logging.module';
import { ProcessRunnerService } from './process/process-runner.service';
import { ToolLocatorService } from './process/tool-locator.service';

@Module({
  imports: [LoggingModule],
  providers: [ProcessRunnerService, ToolLocatorService],
  exports: [LoggingModule, ProcessRunnerService, ToolLocatorService],
})
export class SharedModule {}
