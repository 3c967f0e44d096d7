import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthCheckError,
  HealthIndicator,
  type HealthIndicatorResult,
} from '@nestjs/terminus';
import type { AppConfig } from '../../config/configuration';
import { ToolLocatorService } from '../../shared/process/tool-locator.service';

export interface ToolStatus {
  available: boolean;
  command: string | null;
  path: string | null;
}

export interface ToolsStatus {
  converter: ToolStatus;
  rasterizer: ToolStatus;
}

/**
 * Reports whether the converter and rasterizer binaries can be found.
 * Looked up on every call.
 */
@Injectable()
export class ToolsHealthIndicator extends HealthIndicator {
  private readonly converterCandidates: string[];
  private readonly rasterizerCommand: string;

  constructor(
    @Inject(ToolLocatorService) private readonly toolLocator: ToolLocatorService,
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
  ) {
    super();

    this.converterCandidates = configService.get('converter.candidates', { infer: true });
    this.rasterizerCommand = configService.get('rasterizer.command', { infer: true });
  }

  async detect(): Promise<ToolsStatus> {
    const [converter, rasterizerPath] = await Promise.all([
      this.toolLocator.resolveFirst(this.converterCandidates),
      this.toolLocator.locate(this.rasterizerCommand),
    ]);

    return {
      converter: {
        available: converter !== null,
        command: converter?.command ?? null,
        path: converter?.path ?? null,
      },
      rasterizer: {
        available: rasterizerPath !== null,
        command: this.rasterizerCommand,
        path: rasterizerPath,
      },
    };
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const tools = await this.detect();
    const details = { converter: tools.converter, rasterizer: tools.rasterizer };

    if (tools.converter.available && tools.rasterizer.available) {
      return this.getStatus(key, true, details);
    }

    const missing = [
      !tools.converter.available && `converter (${this.converterCandidates.join(' or ')})`,
      !tools.rasterizer.available && `rasterizer (${this.rasterizerCommand})`,
    ].filter((entry): entry is string => typeof entry === 'string');

    throw new HealthCheckError(
      `Missing external tools: ${missing.join(', ')}`,
      this.getStatus(key, false, details),
    );
  }
}
